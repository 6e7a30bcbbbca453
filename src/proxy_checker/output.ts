import * as path from 'path';
import { FileSystem } from '~/FileSystem';
import { CheckerConfig } from '~/config';
import { CheckResult, ProxyLocation } from '~/proxy_checker/types';
import { Mutex } from '~/semaphore';
import { ProxyFamily } from '~/types';

export const DETAILED_HEADER = 'Proxy|IP|Location|Response Time|Anonymous';

export const OUTPUT_FILE_NAMES: Record<ProxyFamily, string> = {
    HTTP: 'http.txt',
    SOCKS5: 'socks5.txt',
};

export type OutputFormat = Pick<CheckerConfig, 'strictCheck' | 'detailedOutput'>;

export function formatLocation(location: ProxyLocation | null): string {
    if (!location) return 'Unknown';

    if (location.city) return `${ location.city }, ${ location.country }`;

    return location.country || 'Unknown';
}

/**
 * Latency rounded to the millisecond: `640ms` below one second, then `1.5s`, `1m2.25s`, `1h0m3s`.
 * Zero is `0s`.
 */
export function formatSpeed(milliseconds: number): string {
    const rounded = Math.max(Math.round(milliseconds), 0);

    if (rounded === 0) return '0s';
    if (rounded < 1_000) return `${ rounded }ms`;

    const hours = Math.floor(rounded / 3_600_000);
    const minutes = Math.floor(rounded % 3_600_000 / 60_000);
    const seconds = Math.floor(rounded % 60_000 / 1_000);
    const fraction = String(rounded % 1_000).padStart(3, '0').replace(/0+$/, '');

    const secondsPart = fraction ? `${ seconds }.${ fraction }s` : `${ seconds }s`;

    if (hours > 0) return `${ hours }h${ minutes }m${ secondsPart }`;
    if (minutes > 0) return `${ minutes }m${ secondsPart }`;

    return secondsPart;
}

export function isDetailed(format: OutputFormat): boolean {
    return format.strictCheck && format.detailedOutput;
}

/**
 * The line persisted for a working proxy: the bare address, or in strict detailed mode
 * `proxy|ip|location|speed|Yes/No`.
 */
export function formatProxyOutput(result: CheckResult, format: OutputFormat): string {
    if (!isDetailed(format)) return result.proxy;

    return [
        result.proxy,
        result.proxyIp,
        formatLocation(result.location),
        formatSpeed(result.speed),
        result.anonymous ? 'Yes' : 'No',
    ].join('|');
}

export interface ResultWriter {
    // Empties the family output, writing `header` as the first line when given.
    prepare(family: ProxyFamily, header?: string): Promise<void>;

    append(family: ProxyFamily, line: string): Promise<void>;
}

/**
 * One line-delimited file per family. Writes to the same file are serialized.
 */
export class FileResultWriter implements ResultWriter {
    private readonly _paths: Record<ProxyFamily, string>;
    private readonly _locks: Record<ProxyFamily, Mutex> = {
        HTTP: new Mutex(),
        SOCKS5: new Mutex(),
    };

    constructor(outDir: string) {
        this._paths = {
            HTTP: path.resolve(outDir, OUTPUT_FILE_NAMES.HTTP),
            SOCKS5: path.resolve(outDir, OUTPUT_FILE_NAMES.SOCKS5),
        };
    }

    public pathOf(family: ProxyFamily): string {
        return this._paths[family];
    }

    public prepare(family: ProxyFamily, header?: string): Promise<void> {
        return this._locks[family].runExclusive(() => {
            return FileSystem.writeLines(this._paths[family], header ? [ header ] : []);
        });
    }

    public append(family: ProxyFamily, line: string): Promise<void> {
        return this._locks[family].runExclusive(() => FileSystem.appendLine(this._paths[family], line));
    }
}
