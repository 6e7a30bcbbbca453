import fs from 'fs';
import readline from 'readline';

export class FileSystem {
    /**
     * Reads a line-delimited list. Lines are trimmed; blank lines and `#` comments are skipped.
     */
    public static readLines(path: string): Promise<string[]> {
        return new Promise((resolve, reject) => {
            const readStream = fs.createReadStream(path, { autoClose: true });

            const rl = readline.createInterface({
                input: readStream,
                crlfDelay: Infinity,
            });

            readStream.on('error', (e) => {
                reject(e);
            });

            rl.on('error', (e) => {
                reject(e);
            });

            const lines: string[] = [];

            rl.on('line', (line) => {
                const _line = line.trim();

                if (_line && !_line.startsWith('#')) lines.push(_line);
            });

            rl.on('close', () => {
                resolve(lines);
            });
        });
    }

    public static writeLines(path: string, lines: string[]): Promise<void> {
        return new Promise((resolve, reject) => {
            const writer = fs.createWriteStream(path, { autoClose: true });

            writer.on('error', (e) => {
                reject(e);
            });

            writer.on('finish', () => {
                resolve();
            });

            for (const line of lines) {
                writer.write(line + '\n');
            }

            writer.end();
        });
    }

    public static appendLine(path: string, line: string): Promise<void> {
        return fs.promises.appendFile(path, line + '\n');
    }

    public static async ensureDir(path: string): Promise<void> {
        await fs.promises.mkdir(path, { recursive: true });
    }

    public static async exists(path: string): Promise<boolean> {
        return fs.promises.access(path).then(() => true, () => false);
    }
}
