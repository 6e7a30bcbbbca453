import { AxiosInstance, AxiosRequestConfig } from 'axios';

export interface EchoResponse {
    headers: Record<string, string>,
}

/**
 * An endpoint that answers with the request headers it received.
 * The client decides the route, so passing a proxied client echoes what the proxy forwarded.
 */
export abstract class Echo {
    public abstract readonly url: string;

    public abstract headers(client: AxiosInstance, options?: AxiosRequestConfig): Promise<EchoResponse>;
}

export function onlyStringValues(headers: Record<string, unknown>): Record<string, string> {
    const result: Record<string, string> = {};

    for (const [ name, value ] of Object.entries(headers)) {
        if (typeof value === 'string') result[name] = value;
        else if (Array.isArray(value)) result[name] = value.filter((v) => typeof v === 'string').join(', ');
    }

    return result;
}
