import { CandidateAddress } from '~/types';

export interface NormalizeOptions {
    /**
     * Combine the first dotted quad and the first run of digits found anywhere in the line
     * when no `ip:port` pair is present. May pair up unrelated substrings.
     */
    looseMatch?: boolean,
    // Require octets <= 255 and a port within 1-65535.
    strictRanges?: boolean,
}

interface ProxyListPayload {
    data?: Array<Record<string, unknown>>,
}

const SCHEME_PREFIXES = [ 'http://', 'https://', 'socks4://', 'socks5://' ];

const PORT_FIELDS = [ 'port', 'proxy_port', 'port_num', 'port_number' ];

const DEFAULT_PORT = '80';

const IP_PORT_PATTERN = /(\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}):(\d+)/;
const IP_PATTERN = /\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}/;
const DIGITS_PATTERN = /\d{1,5}/;

const HOST_PATTERN = /^\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}$/;
const PORT_PATTERN = /^[0-9]{1,5}$/;

/**
 * Converts a raw source line (`ip:port`, a scheme-prefixed URL or a JSON payload
 * with a `data` array) to `ip:port`. Returns null when nothing usable is found.
 * The result is not validated, see {@link isValidProxy}.
 */
export function normalizeProxy(raw: string, options: NormalizeOptions = {}): string | null {
    let proxy = raw;

    for (const prefix of SCHEME_PREFIXES) {
        if (proxy.startsWith(prefix)) proxy = proxy.slice(prefix.length);
    }

    if (proxy.startsWith('{')) {
        const fromJson = fromProxyListPayload(proxy);

        if (fromJson) return fromJson;
    }

    const matched = proxy.match(IP_PORT_PATTERN);

    if (matched) return `${ matched[1] }:${ matched[2] }`;

    if (options.looseMatch ?? true) {
        const ip = proxy.match(IP_PATTERN)?.[0];
        const port = proxy.match(DIGITS_PATTERN)?.[0];

        if (ip && port) return `${ ip }:${ port }`;
    }

    return null;
}

/**
 * Checks the canonical form: exactly one colon, a dotted quad host and a port of 1-5 digits.
 * Ranges are only checked with `strictRanges`, so `1.2.3.4:99999` passes by default.
 */
export function isValidProxy(candidate: string, options: NormalizeOptions = {}): boolean {
    const parts = candidate.split(':');

    if (parts.length !== 2) return false;

    const [ host, port ] = parts;

    if (!HOST_PATTERN.test(host) || !PORT_PATTERN.test(port)) return false;

    if (options.strictRanges) {
        const octetsInRange = host.split('.').every((octet) => +octet <= 255);
        const portInRange = +port >= 1 && +port <= 65535;

        return octetsInRange && portInRange;
    }

    return true;
}

// Trims, normalizes and validates a single line.
export function parseProxy(line: string, options: NormalizeOptions = {}): CandidateAddress | null {
    const trimmed = line.trim();

    if (!trimmed) return null;

    const normalized = normalizeProxy(trimmed, options);

    if (normalized === null || !isValidProxy(normalized, options)) return null;

    return normalized;
}

export function parseProxies(text: string, options: NormalizeOptions = {}): CandidateAddress[] {
    return text.split('\n').reduce<CandidateAddress[]>((acc, line) => {
        const proxy = parseProxy(line, options);

        if (proxy) acc.push(proxy);

        return acc;
    }, []);
}

function fromProxyListPayload(text: string): string | null {
    let payload: unknown;

    try {
        payload = JSON.parse(text);
    } catch {
        return null;
    }

    if (!isProxyListPayload(payload)) return null;

    const entry = payload.data?.[0];

    if (!entry) return null;

    const ip = readField(entry.ip) ?? '';

    const port = PORT_FIELDS.reduce<string | undefined>((found, field) => found ?? readField(entry[field]), undefined);

    return `${ ip }:${ port ?? DEFAULT_PORT }`;
}

function isProxyListPayload(value: unknown): value is ProxyListPayload {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;

    if (!('data' in value)) return false;

    const data = value.data;

    return Array.isArray(data) && data.every((item) => typeof item === 'object' && item !== null);
}

// Ports show up both as strings and as numbers in the wild.
function readField(value: unknown): string | undefined {
    if (typeof value === 'string' && value !== '') return value;
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);

    return undefined;
}
