declare global {
    namespace NodeJS {
        interface ProcessEnv {
            SCRAPER_TIMEOUT?: string,
            SCRAPER_USER_AGENTS?: string,
            SCRAPER_CONCURRENT?: string,

            CHECKER_TIMEOUT?: string,
            CHECKER_CONNECT_TIMEOUT?: string,
            CHECKER_CONCURRENT?: string,
            CHECKER_CONCURRENT_HTTP?: string,
            CHECKER_CONCURRENT_SOCKS5?: string,
            CHECKER_CHECK_URLS?: string,
            CHECKER_TEST_URL?: string,
            CHECKER_USER_AGENT?: string,
            CHECKER_STRICT?: string,
            CHECKER_DETAILED?: string,
            CHECKER_ECHO?: string,

            PARSER_LOOSE_MATCH?: string,
            PARSER_STRICT_RANGES?: string,
        }
    }
}

export {};
