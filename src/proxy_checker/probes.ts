import { AxiosInstance, AxiosRequestConfig } from 'axios';
import { Echo } from '~/echo/Echo';
import { GeoLookup } from '~/geo/GeoLookup';
import { ProbeOutcome } from '~/proxy_checker/types';

// milliseconds since some fixed point
export type Clock = () => number;

export interface Probe {
    readonly name: string;

    run(client: AxiosInstance): Promise<ProbeOutcome>;
}

/**
 * Liveness only: one GET to the test URL, working on status 200.
 */
export class BasicProbe implements Probe {
    public readonly name = 'basic';

    private readonly _testUrl: string;
    private readonly _userAgent: string;
    private readonly _now: Clock;

    constructor(testUrl: string, userAgent: string, now: Clock = Date.now) {
        this._testUrl = testUrl;
        this._userAgent = userAgent;
        this._now = now;
    }

    public async run(client: AxiosInstance): Promise<ProbeOutcome> {
        const start = this._now();

        const response = await client.get<string>(this._testUrl, {
            headers: { 'User-Agent': this._userAgent },
            responseType: 'text',
            validateStatus: () => true,
        });

        return {
            working: response.status === 200,
            proxyIp: '',
            speed: this._now() - start,
            anonymous: false,
            location: null,
        };
    }
}

/**
 * Geolocation lookup followed by a headers echo through the same client.
 * The proxy is anonymous when no echoed header carries its egress IP, and working
 * only when the lookup yielded an IP and both requests together took less than MAX_LATENCY.
 */
export class StrictProbe implements Probe {
    public static MAX_LATENCY = 2000;

    public readonly name = 'strict';

    private readonly _geo: GeoLookup;
    private readonly _echo: Echo;
    private readonly _userAgent: string;
    private readonly _now: Clock;

    constructor(geo: GeoLookup, echo: Echo, userAgent: string, now: Clock = Date.now) {
        this._geo = geo;
        this._echo = echo;
        this._userAgent = userAgent;
        this._now = now;
    }

    public async run(client: AxiosInstance): Promise<ProbeOutcome> {
        const options: AxiosRequestConfig = {
            headers: { 'User-Agent': this._userAgent },
        };

        const start = this._now();

        const { ip, location } = await this._geo.lookup(client, options);
        const { headers } = await this._echo.headers(client, options);

        const speed = this._now() - start;
        const anonymous = !Object.values(headers).some((value) => value.includes(ip));

        return {
            working: ip !== '' && speed < StrictProbe.MAX_LATENCY,
            proxyIp: ip,
            speed,
            anonymous,
            location,
        };
    }
}
