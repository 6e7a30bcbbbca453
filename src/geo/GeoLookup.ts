import { AxiosInstance, AxiosRequestConfig } from 'axios';
import { ProxyLocation } from '~/proxy_checker/types';

export interface GeoLookupResponse {
    // The address the request came from, i.e. the proxy egress IP.
    ip: string,
    location: ProxyLocation,
}

export abstract class GeoLookup {
    public abstract readonly url: string;

    public abstract lookup(client: AxiosInstance, options?: AxiosRequestConfig): Promise<GeoLookupResponse>;
}
