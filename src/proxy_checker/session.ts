import { FamilyCounters, PROXY_FAMILIES, ProgressSnapshot, ProxyFamily } from '~/types';

export function isCheckComplete(snapshot: ProgressSnapshot): boolean {
    return PROXY_FAMILIES.every((family) => snapshot[family].checked >= snapshot[family].total);
}

/**
 * Per-family counters of one checking run, shared by both pools.
 * Updates are synchronous, readers get a copy.
 */
export class CheckingSession {
    private _counters: Record<ProxyFamily, FamilyCounters> = CheckingSession._empty();

    public start(totals: Record<ProxyFamily, number>): void {
        this._counters = CheckingSession._empty();

        for (const family of PROXY_FAMILIES) {
            this._counters[family].total = totals[family];
        }
    }

    public record(family: ProxyFamily, working: boolean): void {
        const counters = this._counters[family];

        counters.checked++;

        if (working) counters.working++;
    }

    public snapshot(): ProgressSnapshot {
        return {
            HTTP: { ...this._counters.HTTP },
            SOCKS5: { ...this._counters.SOCKS5 },
        };
    }

    public get isComplete(): boolean {
        return isCheckComplete(this._counters);
    }

    private static _empty(): Record<ProxyFamily, FamilyCounters> {
        return {
            HTTP: { total: 0, checked: 0, working: 0 },
            SOCKS5: { total: 0, checked: 0, working: 0 },
        };
    }
}
