import { AxiosInstance, AxiosRequestConfig } from 'axios';
import { HTTPBIN_HEADERS_URL } from '~/config';
import { Echo, EchoResponse, onlyStringValues } from '~/echo/Echo';
import { ProbeError } from '~/proxy_checker/errors';

interface HttpbinHeadersResponse {
    headers: Record<string, unknown>,
}

export class HttpbinEcho extends Echo {
    public readonly url = HTTPBIN_HEADERS_URL;

    public async headers(client: AxiosInstance, options?: AxiosRequestConfig): Promise<EchoResponse> {
        const data = await client
        .get<HttpbinHeadersResponse | string>(this.url, options)
        .then((r) => r.data);

        return Mapper.toEchoResponse(data);
    }
}

class Mapper {
    public static toEchoResponse(echo: HttpbinHeadersResponse | string): EchoResponse {
        if (typeof echo !== 'object' || echo === null || typeof echo.headers !== 'object' || echo.headers === null) {
            throw new ProbeError('httpbin answered without a headers object');
        }

        return {
            headers: onlyStringValues(echo.headers),
        };
    }
}
