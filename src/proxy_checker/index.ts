import { AxiosInstance } from 'axios';
import { ResultChannel } from '~/channel';
import { CheckerConfig } from '~/config';
import { Echo } from '~/echo/Echo';
import { HttpbinEcho } from '~/echo/httpbin.echo';
import { PostmanEcho } from '~/echo/postman.echo';
import { IpApiGeo } from '~/geo/ip-api.geo';
import { Logger } from '~/logger';
import { DETAILED_HEADER, formatProxyOutput, isDetailed, ResultWriter } from '~/proxy_checker/output';
import { BasicProbe, Probe, StrictProbe } from '~/proxy_checker/probes';
import { CheckingSession } from '~/proxy_checker/session';
import { ClientFactory, createProxyClient } from '~/proxy_checker/transport';
import { CheckResult } from '~/proxy_checker/types';
import { Semaphore } from '~/semaphore';
import { CandidateAddress, PROXY_FAMILIES, ProgressSnapshot, ProxyFamily } from '~/types';
import { parseProxyToUrl } from '~/utils';

export interface ProxyCheckerOptions {
    config: CheckerConfig,
    writer: ResultWriter,
    // Defaults to the probe matching `config.strictCheck`.
    probe?: Probe,
    clientFactory?: ClientFactory,
    // Results buffered on `results` before producers wait for a consumer.
    resultBuffer?: number,
}

export function createProbe(config: CheckerConfig): Probe {
    if (!config.strictCheck) return new BasicProbe(config.testUrl, config.userAgent);

    const echo: Echo = config.echo === 'postman' ? new PostmanEcho() : new HttpbinEcho();

    return new StrictProbe(new IpApiGeo(), echo, config.userAgent);
}

/**
 * Checks HTTP and SOCKS5 proxies in two independent pools, persists the working ones
 * as they are confirmed and publishes every result on `results`.
 *
 * Each proxy gets exactly one attempt. Any failure while building the transport or probing
 * marks it as not working; nothing is thrown to the caller.
 */
export class ProxyChecker {
    public static DEFAULT_RESULT_BUFFER = 100;

    public readonly results: ResultChannel<CheckResult>;

    private readonly _config: CheckerConfig;
    private readonly _writer: ResultWriter;
    private readonly _probe: Probe;
    private readonly _clientFactory: ClientFactory;
    private readonly _session = new CheckingSession();
    private readonly _logger: Logger;

    private _started = false;

    constructor(options: ProxyCheckerOptions) {
        this._config = options.config;
        this._writer = options.writer;
        this._probe = options.probe ?? createProbe(options.config);
        this._clientFactory = options.clientFactory ?? createProxyClient;
        this.results = new ResultChannel<CheckResult>(options.resultBuffer ?? ProxyChecker.DEFAULT_RESULT_BUFFER);
        this._logger = new Logger('ProxyChecker');
    }

    public get snapshot(): ProgressSnapshot {
        return this._session.snapshot();
    }

    public get isComplete(): boolean {
        return this._session.isComplete;
    }

    /**
     * Runs once per checker: `results` is closed when every proxy has been checked.
     */
    public async checkProxies(httpProxies: CandidateAddress[], socks5Proxies: CandidateAddress[]): Promise<void> {
        if (this._started) throw new Error('checkProxies can only run once per ProxyChecker');

        this._started = true;

        const proxies: Record<ProxyFamily, CandidateAddress[]> = {
            HTTP: httpProxies,
            SOCKS5: socks5Proxies,
        };

        this._session.start({ HTTP: httpProxies.length, SOCKS5: socks5Proxies.length });

        this._logger.log(
            `checking ${ httpProxies.length } HTTP and ${ socks5Proxies.length } SOCKS5 proxies with the ${ this._probe.name } probe`
        );

        await this._prepareOutputs();

        const pools: Record<ProxyFamily, Semaphore> = {
            HTTP: new Semaphore(this._config.concurrentHttp),
            SOCKS5: new Semaphore(this._config.concurrentSocks5),
        };

        const tasks = PROXY_FAMILIES.flatMap((family) => {
            return proxies[family].map((proxy) => this._check(family, proxy, pools[family]));
        });

        const settled = await Promise.allSettled(tasks);

        this.results.close();

        settled.forEach((s) => {
            if (s.status === 'rejected') {
                this._logger.error('check task failed:', s.reason instanceof Error ? s.reason.message : s.reason);
            }
        });

        const { HTTP, SOCKS5 } = this._session.snapshot();

        this._logger.happy(`done: ${ HTTP.working }/${ HTTP.total } HTTP and ${ SOCKS5.working }/${ SOCKS5.total } SOCKS5 proxies work`);
    }

    private async _prepareOutputs(): Promise<void> {
        const header = isDetailed(this._config) ? DETAILED_HEADER : undefined;

        await Promise.all(PROXY_FAMILIES.map((family) => {
            return this._writer.prepare(family, header).catch((e) => {
                this._logger.error(`failed preparing ${ family } output:`, e instanceof Error ? e.message : e);
            });
        }));
    }

    private async _check(family: ProxyFamily, proxy: CandidateAddress, pool: Semaphore): Promise<void> {
        // The pool slot covers dialing and probing only.
        const result = await pool.use(() => this._verify(family, proxy));

        await this.results.send(result);

        if (result.working) await this._persist(result);

        this._session.record(family, result.working);
    }

    private async _verify(family: ProxyFamily, proxy: CandidateAddress): Promise<CheckResult> {
        const logger = this._logger.createChild(family);
        const proxy_url = parseProxyToUrl(proxy, family);

        let client: AxiosInstance;

        try {
            client = this._clientFactory(family, proxy, {
                timeout: this._config.timeout,
                connectTimeout: this._config.connectTimeout,
            });
        } catch (e) {
            logger.error('failed creating transport for', proxy_url, e instanceof Error ? e.message : e);

            return ProxyChecker._rejected(family, proxy);
        }

        try {
            const outcome = await this._probe.run(client);

            if (outcome.working) logger.happy(Logger.makeUnderline(proxy_url), 'works', `${ outcome.speed }ms`);

            return { proxy, family, ...outcome };
        } catch (e) {
            logger.error(Logger.makeUnderline(proxy_url), 'does not work:', e instanceof Error ? e.message.trim() : e);

            return ProxyChecker._rejected(family, proxy);
        }
    }

    private async _persist(result: CheckResult): Promise<void> {
        try {
            await this._writer.append(result.family, formatProxyOutput(result, this._config));
        } catch (e) {
            this._logger.error(`failed saving ${ result.family } proxy ${ result.proxy }:`, e instanceof Error ? e.message : e);
        }
    }

    private static _rejected(family: ProxyFamily, proxy: CandidateAddress): CheckResult {
        return {
            proxy,
            family,
            working: false,
            proxyIp: '',
            speed: 0,
            anonymous: false,
            location: null,
        };
    }
}
