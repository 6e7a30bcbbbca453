import { Mutex, Semaphore } from '~/semaphore';

function deferred() {
    let resolve: () => void = () => undefined;
    const promise = new Promise<void>((r) => {
        resolve = r;
    });

    return { promise, resolve };
}

describe('Semaphore', () => {
    it('never runs more than the limit at once', async () => {
        const semaphore = new Semaphore(2);
        let running = 0;
        let peak = 0;

        const task = async () => {
            running++;
            peak = Math.max(peak, running);
            await new Promise((r) => setImmediate(r));
            running--;
        };

        await Promise.all(Array.from({ length: 7 }, () => semaphore.use(task)));

        expect(peak).toBe(2);
        expect(semaphore.active).toBe(0);
        expect(semaphore.queued).toBe(0);
    });

    it('queues waiting tasks without giving them a slot', async () => {
        const semaphore = new Semaphore(1);
        const gate = deferred();

        const first = semaphore.use(() => gate.promise);
        const second = semaphore.use(async () => 'second');

        expect(semaphore.active).toBe(1);
        expect(semaphore.queued).toBe(1);

        gate.resolve();

        await first;
        await expect(second).resolves.toBe('second');
    });

    it('frees the slot when a task throws', async () => {
        const semaphore = new Semaphore(1);

        await expect(semaphore.use(async () => {
            throw new Error('boom');
        })).rejects.toThrow('boom');

        await expect(semaphore.use(async () => 42)).resolves.toBe(42);
    });

    it('treats limits below one as one', async () => {
        const semaphore = new Semaphore(0);
        const gate = deferred();

        const first = semaphore.use(() => gate.promise);
        const second = semaphore.use(async () => undefined);

        expect(semaphore.active).toBe(1);
        expect(semaphore.queued).toBe(1);

        gate.resolve();
        await Promise.all([ first, second ]);
    });
});

describe('Mutex', () => {
    it('runs critical sections one after another', async () => {
        const mutex = new Mutex();
        const events: string[] = [];

        const section = (name: string) => mutex.runExclusive(async () => {
            events.push(`${ name }:start`);
            await new Promise((r) => setImmediate(r));
            events.push(`${ name }:end`);
        });

        await Promise.all([ section('a'), section('b') ]);

        expect(events).toEqual([ 'a:start', 'a:end', 'b:start', 'b:end' ]);
    });
});
