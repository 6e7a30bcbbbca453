import axios, { AxiosInstance } from 'axios';
import { Logger } from '~/logger';
import { ProgressRenderer, ProgressReporter } from '~/progress';
import { common_headers } from '~/proxy_parser/common_headers';
import { NormalizeOptions, parseProxies } from '~/proxy_parser/normalizer';
import { Semaphore } from '~/semaphore';
import { CandidateAddress, ProxyFamily, ScrapeSnapshot } from '~/types';
import { truncateUrl } from '~/utils';

export interface ScrapeOptions {
    urls: string[],
    userAgents: string[],
    // milliseconds
    timeout: number,
    family: ProxyFamily,
    concurrent: number,
    parser?: NormalizeOptions,
}

/**
 * Downloads every source list of one proxy family and collects the proxies found in them.
 * A failing source is logged and skipped.
 */
export class ProxySourceScraper {
    private static URL_LOG_LENGTH = 80;

    private readonly _options: ScrapeOptions;
    private readonly _client: AxiosInstance;
    private readonly _renderer: ProgressRenderer<ScrapeSnapshot> | undefined;
    private readonly _logger: Logger;

    private _proxies: CandidateAddress[] = [];
    private _completed = 0;

    constructor(options: ScrapeOptions, client: AxiosInstance = axios.create(), renderer?: ProgressRenderer<ScrapeSnapshot>) {
        this._options = options;
        this._client = client;
        this._renderer = renderer;
        this._logger = new Logger('ProxySourceScraper').createChild(options.family);
    }

    public get snapshot(): ScrapeSnapshot {
        return {
            family: this._options.family,
            found: this._proxies.length,
            completed: this._completed,
            total: this._options.urls.length,
        };
    }

    public async load(): Promise<CandidateAddress[]> {
        const { urls, concurrent } = this._options;
        const semaphore = new Semaphore(concurrent);
        const counter = this._logger.createCounter(urls.length);

        this._proxies = [];
        this._completed = 0;

        const fetches = urls.map((url, i) => semaphore.use(async () => {
            const _url = truncateUrl(url, ProxySourceScraper.URL_LOG_LENGTH);

            try {
                const found = await this._fetchSource(url, i);

                this._proxies = this._proxies.concat(found);
                counter.happy(`${ found.length } proxies from`, Logger.makeUnderline(_url));
            } catch (e) {
                counter.error('failed fetching', Logger.makeUnderline(_url), e instanceof Error ? e.message : e);
            } finally {
                this._completed++;
            }
        }));

        const work = Promise.all(fetches);

        if (this._renderer) {
            const reporter = new ProgressReporter({
                snapshot: () => this.snapshot,
                isComplete: (s) => s.completed === s.total,
                renderer: this._renderer,
            });

            await Promise.all([ work, reporter.run() ]);
        } else {
            await work;
        }

        this._logger.log(`scraped ${ this._proxies.length } proxies from ${ urls.length } sources`);

        return this._proxies;
    }

    private async _fetchSource(url: string, index: number): Promise<CandidateAddress[]> {
        const { userAgents, timeout, parser } = this._options;
        const userAgent = userAgents[index % userAgents.length];

        const body = await this._client.get<string>(url, {
            headers: {
                ...common_headers,
                'User-Agent': userAgent,
            },
            timeout,
            responseType: 'text',
            // The body is read whatever the status, like a plain GET would.
            validateStatus: () => true,
        })
        .then((r) => typeof r.data === 'string' ? r.data : JSON.stringify(r.data));

        return parseProxies(body, parser);
    }
}
