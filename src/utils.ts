import { CandidateAddress, ProxyFamily } from '~/types';

/**
 * Keeps the first occurrence of every item, in order.
 * Items are compared by `key` with SameValueZero equality, so strings compare exactly.
 */
export function deleteDuplicates<T>(array: T[], key: (item: T) => unknown = (item) => item): T[] {
    const seen = new Set<unknown>();

    return array.filter((item) => {
        const k = key(item);

        if (seen.has(k)) return false;

        seen.add(k);
        return true;
    });
}

export function parseProxyToUrl(proxy: CandidateAddress, family: ProxyFamily): string {
    const protocol = family === 'SOCKS5' ? 'socks5' : 'http';

    return `${ protocol }://${ proxy }`;
}

export function progressBar(percentage: number, width: number): string {
    const filled = Math.min(Math.max(Math.floor(percentage / 100 * width), 0), width);

    return `[${ '█'.repeat(filled) }${ '░'.repeat(width - filled) }]`;
}

export function percentage(done: number, total: number): number {
    if (total === 0) return 100;

    return done / total * 100;
}

export function truncateUrl(url: string, maxLength: number): string {
    if (url.length <= maxLength) return url;

    return url.slice(0, maxLength - 3) + '...';
}
