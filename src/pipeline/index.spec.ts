import fs from 'fs';
import os from 'os';
import path from 'path';
import { loadConfig } from '~/config';
import { Logger } from '~/logger';
import { ProxyPipeline, PipelineOptions } from '~/pipeline';
import { ProgressRenderer } from '~/progress';
import { DETAILED_HEADER } from '~/proxy_checker/output';
import { ClientFactory } from '~/proxy_checker/transport';
import { CheckResult } from '~/proxy_checker/types';
import { createStubClient } from '~/testing/axios-stub';
import { ProgressSnapshot } from '~/types';

const LISTS: Record<string, string> = {
    'http://lists.test/http': '1.1.1.1:80\n2.2.2.2:8080\n1.1.1.1:80\n',
    'http://lists.test/socks': '',
};

const answering = (working: string[]): ClientFactory => (_family, proxy) => {
    return createStubClient(() => ({ status: working.includes(proxy) ? 200 : 502 }));
};

describe('ProxyPipeline', () => {
    let root: string;
    let sourcesDir: string;
    let outDir: string;
    let requested: string[];

    const sourceClient = createStubClient((config) => {
        requested.push(config.url ?? '');

        return { data: LISTS[config.url ?? ''] ?? '' };
    });

    const pipeline = (overrides: Partial<PipelineOptions> = {}) => new ProxyPipeline({
        config: loadConfig({}),
        paths: { sourcesDir, outDir },
        sourceClient,
        clientFactory: answering([ '2.2.2.2:8080' ]),
        ...overrides,
    });

    beforeAll(() => {
        Logger.setSink(() => undefined);
    });

    beforeEach(async () => {
        requested = [];
        root = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'pipeline-'));
        sourcesDir = path.join(root, 'sources');
        outDir = path.join(root, 'out');

        await fs.promises.mkdir(sourcesDir);
        await fs.promises.writeFile(path.join(sourcesDir, 'http.txt'), '# http lists\nhttp://lists.test/http\n');
        await fs.promises.writeFile(path.join(sourcesDir, 'socks5.txt'), 'http://lists.test/socks\n');
    });

    afterEach(async () => {
        await fs.promises.rm(root, { recursive: true, force: true });
    });

    it('scrapes, merges previous results, checks and rewrites the lists', async () => {
        await fs.promises.mkdir(outDir);
        await fs.promises.writeFile(path.join(outDir, 'http.txt'), '3.3.3.3:8080\n');

        const messages: string[] = [];
        const snapshot = await pipeline({ notify: (m) => messages.push(m) }).run();

        expect(snapshot).toEqual({
            HTTP: { total: 3, checked: 3, working: 1 },
            SOCKS5: { total: 0, checked: 0, working: 0 },
        });
        expect(await fs.promises.readFile(path.join(outDir, 'http.txt'), 'utf8')).toBe('2.2.2.2:8080\n');
        expect(await fs.promises.readFile(path.join(outDir, 'socks5.txt'), 'utf8')).toBe('');
        expect(messages).toEqual([
            'Starting HTTP proxy scraping...',
            'ℹ️ Found 1 existing HTTP proxies',
            'Starting SOCKS5 proxy scraping...',
            '✅ Total 3 HTTP proxies to check',
            '✅ Total 0 SOCKS5 proxies to check',
            '🔍 Checking proxies...',
        ]);
    });

    it('creates the output directory', async () => {
        await pipeline().run();

        expect(await fs.promises.readFile(path.join(outDir, 'http.txt'), 'utf8')).toBe('2.2.2.2:8080\n');
    });

    it('reduces detailed previous records to their address', async () => {
        await fs.promises.mkdir(outDir);
        await fs.promises.writeFile(
            path.join(outDir, 'http.txt'),
            `${ DETAILED_HEADER }\n4.4.4.4:3128|203.0.113.9|Unknown|900ms|Yes\n`,
        );

        const checked: string[] = [];

        await pipeline({ onResult: (r) => checked.push(r.proxy) }).run();

        expect(checked.sort()).toEqual([ '1.1.1.1:80', '2.2.2.2:8080', '4.4.4.4:3128' ]);
    });

    it('hands every result to onResult', async () => {
        const results: CheckResult[] = [];

        await pipeline({ onResult: (r) => results.push(r) }).run();

        expect(results.map((r) => `${ r.proxy } ${ r.working }`).sort()).toEqual([
            '1.1.1.1:80 false',
            '2.2.2.2:8080 true',
        ]);
    });

    it('finishes the check progress with the final counters', async () => {
        const finished: ProgressSnapshot[] = [];
        const checkRenderer: ProgressRenderer<ProgressSnapshot> = {
            render: () => undefined,
            finish: (s) => finished.push(s),
        };

        await pipeline({ checkRenderer }).run();

        expect(finished).toEqual([ {
            HTTP: { total: 2, checked: 2, working: 1 },
            SOCKS5: { total: 0, checked: 0, working: 0 },
        } ]);
    });

    it('stops before any request when a source list is missing', async () => {
        await fs.promises.rm(path.join(sourcesDir, 'socks5.txt'));

        await expect(pipeline().run()).rejects.toMatchObject({ code: 'ENOENT' });
        expect(requested).toEqual([]);
    });
});
