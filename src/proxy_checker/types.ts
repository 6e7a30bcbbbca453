import { CandidateAddress, ProxyFamily } from '~/types';

export interface ProxyLocation {
    country: string,
    countryCode: string,
    city: string,
    region: string,
}

export interface CheckResult {
    proxy: CandidateAddress,
    working: boolean,
    family: ProxyFamily,
    // Egress IP seen by the geolocation endpoint, strict mode only.
    proxyIp: string,
    // milliseconds
    speed: number,
    anonymous: boolean,
    location: ProxyLocation | null,
}

export type ProbeOutcome = Omit<CheckResult, 'proxy' | 'family'>;
