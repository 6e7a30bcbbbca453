import { AxiosInstance, AxiosRequestConfig } from 'axios';
import { POSTMAN_ECHO_URL } from '~/config';
import { Echo, EchoResponse, onlyStringValues } from '~/echo/Echo';
import { ProbeError } from '~/proxy_checker/errors';

interface PostmanEchoResponse {
    args: Record<string, unknown>,
    url: string,
    headers: Record<string, unknown>,
}

export class PostmanEcho extends Echo {
    public readonly url = POSTMAN_ECHO_URL;

    public async headers(client: AxiosInstance, options?: AxiosRequestConfig): Promise<EchoResponse> {
        const data = await client
        .get<PostmanEchoResponse | string>(this.url, options)
        .then((r) => r.data);

        return Mapper.toEchoResponse(data);
    }
}

class Mapper {
    public static toEchoResponse(echo: PostmanEchoResponse | string): EchoResponse {
        if (typeof echo !== 'object' || echo === null || typeof echo.headers !== 'object' || echo.headers === null) {
            throw new ProbeError('postman-echo answered without a headers object');
        }

        return {
            headers: onlyStringValues(echo.headers),
        };
    }
}
