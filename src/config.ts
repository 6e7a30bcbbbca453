import appRootPath from 'app-root-path';
import * as path from 'path';
import { FileSystem } from '~/FileSystem';

export const SOURCES_DIR = path.resolve(appRootPath.path, 'sources');

export const OUT_DIR = path.resolve(appRootPath.path, 'out');

export const LOG_FILE_PATH = path.resolve(appRootPath.path, 'proxy_checker.log');

export const ENV_PATH = path.resolve(appRootPath.path, '.env');

export const ENV_EXAMPLE_PATH = path.resolve(appRootPath.path, '.env.example');

export const IP_API_URL = 'http://ip-api.com/json';

export const HTTPBIN_HEADERS_URL = 'https://httpbin.org/headers';

export const POSTMAN_ECHO_URL = 'https://postman-echo.com/get';

export const DEFAULT_USER_AGENT =
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36';

export const DEFAULT_CHECK_URL = 'http://checkip.amazonaws.com';

/**
 * The env file to load: the local `.env` when there is one, otherwise the example,
 * whose empty values select the defaults.
 */
export async function resolveEnvPath(envPath: string = ENV_PATH, examplePath: string = ENV_EXAMPLE_PATH): Promise<string> {
    return await FileSystem.exists(envPath) ? envPath : examplePath;
}

export type EchoProvider = 'httpbin' | 'postman';

export interface ScraperConfig {
    // milliseconds
    timeout: number,
    userAgents: string[],
    concurrent: number,
}

export interface CheckerConfig {
    // milliseconds, time to receive a complete response
    timeout: number,
    // milliseconds, time to establish the proxy connection
    connectTimeout: number,
    concurrentHttp: number,
    concurrentSocks5: number,
    checkUrls: string[],
    testUrl: string,
    userAgent: string,
    strictCheck: boolean,
    // Only effective together with strictCheck.
    detailedOutput: boolean,
    echo: EchoProvider,
}

export interface ParserConfig {
    looseMatch: boolean,
    strictRanges: boolean,
}

export interface Config {
    scraper: ScraperConfig,
    checker: CheckerConfig,
    parser: ParserConfig,
}

export interface ConfigOverrides {
    strict?: boolean,
    detailed?: boolean,
}

type EnvSource = Record<string, string | undefined>;

/**
 * Builds the runtime configuration from environment variables.
 * Overrides (CLI flags) are applied before the mode-dependent defaults are derived,
 * so `--strict` also selects the strict timeouts.
 */
export function loadConfig(source: EnvSource, overrides: ConfigOverrides = {}): Config {
    const userAgents = readList(source.SCRAPER_USER_AGENTS);
    const scraper: ScraperConfig = {
        timeout: readPositive(source.SCRAPER_TIMEOUT) ?? 10_000,
        userAgents: userAgents.length > 0 ? userAgents : [ DEFAULT_USER_AGENT ],
        concurrent: readPositive(source.SCRAPER_CONCURRENT) ?? 10,
    };

    const strictCheck = overrides.strict ?? readBoolean(source.CHECKER_STRICT) ?? false;
    const detailedOutput = overrides.detailed ?? readBoolean(source.CHECKER_DETAILED) ?? false;
    const concurrent = readPositive(source.CHECKER_CONCURRENT) ?? 100;

    const listedUrls = readList(source.CHECKER_CHECK_URLS);
    const checkUrls = listedUrls.length > 0 ? listedUrls : [ DEFAULT_CHECK_URL ];

    const checker: CheckerConfig = {
        timeout: readPositive(source.CHECKER_TIMEOUT) ?? (strictCheck ? 3_000 : 10_000),
        connectTimeout: readPositive(source.CHECKER_CONNECT_TIMEOUT) ?? (strictCheck ? 3_000 : 5_000),
        concurrentHttp: readPositive(source.CHECKER_CONCURRENT_HTTP) ?? concurrent,
        concurrentSocks5: readPositive(source.CHECKER_CONCURRENT_SOCKS5) ?? concurrent,
        checkUrls,
        testUrl: source.CHECKER_TEST_URL?.trim() || checkUrls[0],
        userAgent: source.CHECKER_USER_AGENT?.trim() || scraper.userAgents[0],
        strictCheck,
        detailedOutput: strictCheck && detailedOutput,
        echo: source.CHECKER_ECHO?.trim().toLowerCase() === 'postman' ? 'postman' : 'httpbin',
    };

    const parser: ParserConfig = {
        looseMatch: readBoolean(source.PARSER_LOOSE_MATCH) ?? true,
        strictRanges: readBoolean(source.PARSER_STRICT_RANGES) ?? false,
    };

    return { scraper, checker, parser };
}

function readPositive(value: string | undefined): number | undefined {
    if (!value?.trim()) return undefined;

    const parsed = Math.floor(+value);

    return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined;
}

function readBoolean(value: string | undefined): boolean | undefined {
    const normalized = value?.trim().toLowerCase();

    if (normalized === 'true' || normalized === '1' || normalized === 'yes') return true;
    if (normalized === 'false' || normalized === '0' || normalized === 'no') return false;

    return undefined;
}

function readList(value: string | undefined): string[] {
    if (!value) return [];

    return value.split('|').map((item) => item.trim()).filter((item) => item.length > 0);
}
