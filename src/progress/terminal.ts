import chalk from 'chalk';
import readline from 'readline';
import { ProgressRenderer } from '~/progress';
import { FamilyCounters, PROXY_FAMILIES, ProgressSnapshot, ProxyFamily, ScrapeSnapshot } from '~/types';
import { percentage, progressBar } from '~/utils';

const BAR_WIDTH = 30;

export function formatFamilyLine(family: ProxyFamily, counters: FamilyCounters, width: number = BAR_WIDTH): string {
    const pct = percentage(counters.checked, counters.total);

    return `${ family } [${ counters.checked }/${ counters.total }] - Working: ${ counters.working } ${ progressBar(pct, width) } ${ pct.toFixed(0) }%`;
}

export function formatFamilySummary(family: ProxyFamily, counters: FamilyCounters): string {
    return `✓ Found ${ counters.working } working ${ family } proxies`;
}

export function formatScrapeLine(snapshot: ScrapeSnapshot): string {
    return `✓ Scraped ${ snapshot.found } ${ snapshot.family } proxies [${ snapshot.completed }/${ snapshot.total }]`;
}

/**
 * Two status lines, one per family, redrawn in place.
 */
export class TerminalCheckRenderer implements ProgressRenderer<ProgressSnapshot> {
    private readonly _out: NodeJS.WritableStream;
    private _drawn = false;

    constructor(out: NodeJS.WritableStream = process.stdout) {
        this._out = out;
    }

    public render(snapshot: ProgressSnapshot): void {
        this._rewind();

        this._out.write(PROXY_FAMILIES.map((family) => formatFamilyLine(family, snapshot[family])).join('\n'));
        this._drawn = true;
    }

    public finish(snapshot: ProgressSnapshot): void {
        this.render(snapshot);
        this._out.write('\n');

        for (const family of PROXY_FAMILIES) {
            this._out.write(chalk.green(formatFamilySummary(family, snapshot[family])) + '\n');
        }

        this._drawn = false;
    }

    private _rewind(): void {
        if (this._drawn) {
            readline.moveCursor(this._out, 0, -(PROXY_FAMILIES.length - 1));
        }

        readline.cursorTo(this._out, 0);
        readline.clearScreenDown(this._out);
    }
}

export class TerminalScrapeRenderer implements ProgressRenderer<ScrapeSnapshot> {
    private readonly _out: NodeJS.WritableStream;

    constructor(out: NodeJS.WritableStream = process.stdout) {
        this._out = out;
    }

    public render(snapshot: ScrapeSnapshot): void {
        readline.cursorTo(this._out, 0);
        readline.clearLine(this._out, 0);
        this._out.write(formatScrapeLine(snapshot));
    }

    public finish(snapshot: ScrapeSnapshot): void {
        this.render(snapshot);
        this._out.write('\n');
    }
}
