import axios, { AxiosInstance, AxiosProxyConfig } from 'axios';
import { HttpsProxyAgent } from 'hpagent';
import { SocksProxyAgent } from 'socks-proxy-agent';
import { InvalidProxyError } from '~/proxy_checker/errors';
import { isValidProxy } from '~/proxy_parser/normalizer';
import { CandidateAddress, ProxyFamily } from '~/types';
import { parseProxyToUrl } from '~/utils';

export interface TransportOptions {
    // milliseconds, whole request
    timeout: number,
    // milliseconds, establishing the connection to the proxy
    connectTimeout: number,
}

export type ClientFactory = (family: ProxyFamily, proxy: CandidateAddress, options: TransportOptions) => AxiosInstance;

/**
 * Proxy settings axios applies to one request through an HTTP proxy.
 * Plain http targets are sent to the proxy in absolute form; https targets are left to
 * the CONNECT agent, so axios must not apply its own proxying to them.
 */
export function forwardProxyFor(targetUrl: string | undefined, proxy: CandidateAddress): AxiosProxyConfig | false {
    if (targetUrl && /^https:/i.test(targetUrl)) return false;

    const [ host, port ] = proxy.split(':');

    return { protocol: 'http', host, port: +port };
}

/**
 * Creates an axios instance whose every request goes through `proxy`.
 * SOCKS5 proxies resolve target hostnames on the proxy side and use no authentication.
 */
export const createProxyClient: ClientFactory = (family, proxy, options) => {
    if (!isValidProxy(proxy)) throw new InvalidProxyError(proxy);

    if (family === 'HTTP') {
        const client = axios.create({
            httpsAgent: new HttpsProxyAgent({
                proxy: parseProxyToUrl(proxy, family),
                timeout: options.connectTimeout,
            }),
            timeout: options.timeout,
        });

        client.interceptors.request.use((config) => {
            config.proxy = forwardProxyFor(config.url, proxy);

            return config;
        });

        return client;
    }

    const agent = new SocksProxyAgent(`socks5h://${ proxy }`, { timeout: options.connectTimeout });

    return axios.create({
        httpAgent: agent,
        httpsAgent: agent,
        proxy: false,
        timeout: options.timeout,
    });
};
