import axios, { AxiosInstance } from 'axios';
import * as path from 'path';
import { Config } from '~/config';
import { FileSystem } from '~/FileSystem';
import { Logger } from '~/logger';
import { ProgressRenderer, ProgressReporter } from '~/progress';
import { ProxyChecker } from '~/proxy_checker';
import { FileResultWriter, OUTPUT_FILE_NAMES } from '~/proxy_checker/output';
import { Probe } from '~/proxy_checker/probes';
import { isCheckComplete } from '~/proxy_checker/session';
import { ClientFactory } from '~/proxy_checker/transport';
import { CheckResult } from '~/proxy_checker/types';
import { parseProxies } from '~/proxy_parser/normalizer';
import { ProxySourceScraper } from '~/proxy_parser/scraper';
import { CandidateAddress, PROXY_FAMILIES, ProgressSnapshot, ProxyFamily, ScrapeSnapshot } from '~/types';
import { deleteDuplicates } from '~/utils';

export const SOURCE_FILE_NAMES: Record<ProxyFamily, string> = {
    HTTP: 'http.txt',
    SOCKS5: 'socks5.txt',
};

export interface PipelinePaths {
    sourcesDir: string,
    outDir: string,
}

export interface PipelineOptions {
    config: Config,
    paths: PipelinePaths,
    // Client used to download the source lists.
    sourceClient?: AxiosInstance,
    clientFactory?: ClientFactory,
    probe?: Probe,
    scrapeRenderer?: ProgressRenderer<ScrapeSnapshot>,
    checkRenderer?: ProgressRenderer<ProgressSnapshot>,
    onResult?: (result: CheckResult) => void,
    // User-facing status lines.
    notify?: (message: string) => void,
}

/**
 * One full run: scrape both families, merge the previous results back in, deduplicate,
 * then check everything and rewrite the output lists.
 */
export class ProxyPipeline {
    private readonly _options: PipelineOptions;
    private readonly _logger = new Logger('ProxyPipeline');

    constructor(options: PipelineOptions) {
        this._options = options;
    }

    public async run(): Promise<ProgressSnapshot> {
        const { config, paths } = this._options;

        // Unreadable source lists stop the run before any request is made.
        const sources = await this.readSources();

        const candidates: Record<ProxyFamily, CandidateAddress[]> = { HTTP: [], SOCKS5: [] };

        for (const family of PROXY_FAMILIES) {
            const scraped = await this._scrape(family, sources[family]);
            const existing = await this._readExisting(family);

            if (existing.length > 0) this._notify(`ℹ️ Found ${ existing.length } existing ${ family } proxies`);

            candidates[family] = deleteDuplicates(scraped.concat(existing));
        }

        await FileSystem.ensureDir(paths.outDir);

        for (const family of PROXY_FAMILIES) {
            this._notify(`✅ Total ${ candidates[family].length } ${ family } proxies to check`);
        }

        this._notify('🔍 Checking proxies...');

        const checker = new ProxyChecker({
            config: config.checker,
            writer: new FileResultWriter(paths.outDir),
            probe: this._options.probe,
            clientFactory: this._options.clientFactory,
        });

        const checking = checker.checkProxies(candidates.HTTP, candidates.SOCKS5);
        const work: Promise<unknown>[] = [ checking, this._consume(checker) ];

        if (this._options.checkRenderer) {
            const reporter = new ProgressReporter({
                snapshot: () => checker.snapshot,
                isComplete: isCheckComplete,
                renderer: this._options.checkRenderer,
            });

            work.push(reporter.run());
        }

        await Promise.all(work);

        return checker.snapshot;
    }

    public async readSources(): Promise<Record<ProxyFamily, string[]>> {
        const { sourcesDir } = this._options.paths;

        const [ http, socks5 ] = await Promise.all([
            FileSystem.readLines(path.resolve(sourcesDir, SOURCE_FILE_NAMES.HTTP)),
            FileSystem.readLines(path.resolve(sourcesDir, SOURCE_FILE_NAMES.SOCKS5)),
        ]);

        return { HTTP: http, SOCKS5: socks5 };
    }

    private async _scrape(family: ProxyFamily, urls: string[]): Promise<CandidateAddress[]> {
        const { scraper, parser } = this._options.config;

        this._notify(`Starting ${ family } proxy scraping...`);

        const source_scraper = new ProxySourceScraper(
            {
                urls,
                userAgents: scraper.userAgents,
                timeout: scraper.timeout,
                family,
                concurrent: scraper.concurrent,
                parser,
            },
            this._options.sourceClient ?? axios.create(),
            this._options.scrapeRenderer,
        );

        return source_scraper.load();
    }

    // Previous results are checked again, never trusted. Detailed records are reduced to their address.
    private async _readExisting(family: ProxyFamily): Promise<CandidateAddress[]> {
        const file = path.resolve(this._options.paths.outDir, OUTPUT_FILE_NAMES[family]);

        if (!await FileSystem.exists(file)) return [];

        try {
            const lines = await FileSystem.readLines(file);

            return parseProxies(lines.join('\n'), this._options.config.parser);
        } catch (e) {
            this._logger.warning(`failed reading existing ${ family } proxies:`, e instanceof Error ? e.message : e);

            return [];
        }
    }

    private async _consume(checker: ProxyChecker): Promise<void> {
        const { onResult } = this._options;

        if (!onResult) {
            await checker.results.drain();
            return;
        }

        for await (const result of checker.results) {
            onResult(result);
        }
    }

    private _notify(message: string): void {
        this._logger.log(message);
        this._options.notify?.(message);
    }
}
