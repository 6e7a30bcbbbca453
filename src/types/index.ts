export const PROXY_FAMILIES = [ 'HTTP', 'SOCKS5' ] as const;

export type ProxyFamily = typeof PROXY_FAMILIES[number];

// Canonical `ip:port` string produced by the normalizer.
export type CandidateAddress = string;

export interface FamilyCounters {
    total: number,
    checked: number,
    working: number,
}

export type ProgressSnapshot = Record<ProxyFamily, FamilyCounters>;

export interface ScrapeSnapshot {
    family: ProxyFamily,
    found: number,
    completed: number,
    total: number,
}
