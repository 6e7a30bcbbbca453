#!/usr/bin/env node
import chalk from 'chalk';
import { Command } from 'commander';
import dotenv from 'dotenv-safe';
import fs from 'fs';
import { env } from 'process';
import { ENV_EXAMPLE_PATH, LOG_FILE_PATH, loadConfig, OUT_DIR, resolveEnvPath, SOURCES_DIR } from '~/config';
import { Logger } from '~/logger';
import { ProxyPipeline } from '~/pipeline';
import { TerminalCheckRenderer, TerminalScrapeRenderer } from '~/progress/terminal';

interface CliOptions {
    strict: boolean,
    detailed: boolean,
    sources: string,
    out: string,
    log: string,
}

const program = new Command();

program
.name('proxy-harvester')
.description('Scrape public proxy lists and keep the HTTP and SOCKS5 proxies that work')
.version('1.0.0')
.option('--strict', 'enable strict checking (geolocation, anonymity, latency under 2s)', false)
.option('--detailed', 'write detailed records (only with --strict)', false)
.option('--sources <dir>', 'directory with http.txt and socks5.txt source lists', SOURCES_DIR)
.option('--out <dir>', 'directory for the working proxy lists', OUT_DIR)
.option('--log <file>', 'log file', LOG_FILE_PATH)
.action(async (options: CliOptions) => {
    // Every variable of .env.example has to be present, empty values select the defaults.
    dotenv.config({ path: await resolveEnvPath(), example: ENV_EXAMPLE_PATH, allowEmptyValues: true });

    const logStream = fs.createWriteStream(options.log, { flags: 'a' });

    logStream.on('error', (e) => {
        console.error(chalk.red(`Cannot write log file ${ options.log }: ${ e.message }`));
    });

    Logger.setSink((line) => logStream.write(line + '\n'));

    const config = loadConfig(env, {
        strict: options.strict || undefined,
        detailed: options.detailed || undefined,
    });

    console.log('🚀 Proxy Scraper and Checker Started');

    if (config.checker.strictCheck || options.detailed) {
        console.log('Active parameters:');

        if (config.checker.strictCheck) console.log('  • Strict checking mode enabled');
        if (config.checker.detailedOutput) console.log('  • Detailed output mode enabled');
        else if (options.detailed) console.log(chalk.yellow('  • Detailed output ignored without strict checking'));

        console.log();
    }

    const pipeline = new ProxyPipeline({
        config,
        paths: { sourcesDir: options.sources, outDir: options.out },
        scrapeRenderer: new TerminalScrapeRenderer(),
        checkRenderer: new TerminalCheckRenderer(),
        notify: (message) => console.log(message),
    });

    try {
        await pipeline.run();
        console.log(chalk.greenBright('\n✨ Proxy scraping and checking completed'));
    } catch (e) {
        const message = e instanceof Error ? e.message : String(e);

        new Logger('main').error('run aborted:', message);
        console.error(chalk.red(`Run aborted: ${ message }`));
        process.exitCode = 1;
    } finally {
        logStream.end();
    }
});

program.parseAsync(process.argv).catch((e) => {
    console.error(chalk.red(e instanceof Error ? e.message : String(e)));
    process.exitCode = 1;
});
