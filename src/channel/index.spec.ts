import { ChannelClosedError, ResultChannel } from '~/channel';

describe('ResultChannel', () => {
    it('delivers values in send order', async () => {
        const channel = new ResultChannel<number>(10);

        await channel.send(1);
        await channel.send(2);
        channel.close();

        const received: number[] = [];

        for await (const value of channel) received.push(value);

        expect(received).toEqual([ 1, 2 ]);
    });

    it('hands a value straight to a waiting receiver', async () => {
        const channel = new ResultChannel<string>(1);
        const pending = channel.receive();

        await channel.send('a');

        await expect(pending).resolves.toEqual({ value: 'a', done: false });
        expect(channel.size).toBe(0);
    });

    it('makes senders wait while the buffer is full', async () => {
        const channel = new ResultChannel<number>(1);
        let sent = false;

        await channel.send(1);
        const second = channel.send(2).then(() => {
            sent = true;
        });

        await new Promise((r) => setImmediate(r));
        expect(sent).toBe(false);

        await expect(channel.receive()).resolves.toEqual({ value: 1, done: false });
        await second;

        expect(sent).toBe(true);
        await expect(channel.receive()).resolves.toEqual({ value: 2, done: false });
    });

    it('keeps every parked sender moving with a single slot', async () => {
        const channel = new ResultChannel<number>(1);
        const sends = [ 1, 2, 3, 4 ].map((n) => channel.send(n));

        const received: number[] = [];

        for (let i = 0; i < 4; i++) {
            const next = await channel.receive();

            if (!next.done) received.push(next.value);
        }

        await Promise.all(sends);

        expect(received).toEqual([ 1, 2, 3, 4 ]);
    });

    it('ends pending receivers on close', async () => {
        const channel = new ResultChannel<number>();
        const pending = channel.receive();

        channel.close();

        await expect(pending).resolves.toEqual({ value: undefined, done: true });
    });

    it('throws on a second close', () => {
        const channel = new ResultChannel<number>();

        channel.close();

        expect(channel.isClosed).toBe(true);
        expect(() => channel.close()).toThrow(ChannelClosedError);
    });

    it('rejects sends after close', async () => {
        const channel = new ResultChannel<number>();

        channel.close();

        await expect(channel.send(1)).rejects.toThrow('ChannelClosedError: send on closed channel');
    });

    it('drains buffered values and counts them', async () => {
        const channel = new ResultChannel<number>(5);

        await channel.send(1);
        await channel.send(2);
        await channel.send(3);
        channel.close();

        await expect(channel.drain()).resolves.toBe(3);
    });
});
