import fs from 'fs';
import os from 'os';
import path from 'path';
import { FileSystem } from '~/FileSystem';

describe('FileSystem', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'file-system-'));
    });

    afterEach(async () => {
        await fs.promises.rm(dir, { recursive: true, force: true });
    });

    it('reads trimmed lines without blanks and comments', async () => {
        const file = path.join(dir, 'list.txt');

        await fs.promises.writeFile(file, '# sources\r\n  http://a.test/list  \n\n#http://b.test\nhttp://c.test\n');

        await expect(FileSystem.readLines(file)).resolves.toEqual([ 'http://a.test/list', 'http://c.test' ]);
    });

    it('rejects when the file is missing', async () => {
        await expect(FileSystem.readLines(path.join(dir, 'missing.txt'))).rejects.toMatchObject({ code: 'ENOENT' });
    });

    it('writes and appends newline-terminated lines', async () => {
        const file = path.join(dir, 'out.txt');

        await FileSystem.writeLines(file, [ 'a', 'b' ]);
        await FileSystem.appendLine(file, 'c');

        expect(await fs.promises.readFile(file, 'utf8')).toBe('a\nb\nc\n');
    });

    it('writes an empty file for no lines', async () => {
        const file = path.join(dir, 'empty.txt');

        await FileSystem.writeLines(file, []);

        expect(await fs.promises.readFile(file, 'utf8')).toBe('');
    });

    it('creates nested directories and reports existence', async () => {
        const nested = path.join(dir, 'a', 'b');

        expect(await FileSystem.exists(nested)).toBe(false);

        await FileSystem.ensureDir(nested);
        await FileSystem.ensureDir(nested);

        expect(await FileSystem.exists(nested)).toBe(true);
    });
});
