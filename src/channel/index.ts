export class ChannelClosedError extends Error {
    constructor(message: string) {
        super(`${ ChannelClosedError.name }: ${ message }`);
    }
}

/**
 * Bounded multi-producer channel. `send` waits while the buffer is full,
 * consumers read with `receive` or `for await`. Closing twice, or sending after close, throws.
 */
export class ResultChannel<T> implements AsyncIterable<T> {
    private readonly _capacity: number;
    private readonly _buffer: T[] = [];
    private readonly _senders: Array<() => void> = [];
    private readonly _receivers: Array<(result: IteratorResult<T>) => void> = [];
    private _closed = false;

    constructor(capacity: number = 100) {
        this._capacity = Math.max(1, Math.floor(capacity));
    }

    public get isClosed(): boolean {
        return this._closed;
    }

    public get size(): number {
        return this._buffer.length;
    }

    public async send(value: T): Promise<void> {
        if (this._closed) throw new ChannelClosedError('send on closed channel');

        // A receiver may have started waiting while this sender was parked.
        for (;;) {
            const receiver = this._receivers.shift();

            if (receiver) {
                receiver({ value, done: false });
                return;
            }

            if (this._buffer.length < this._capacity) {
                this._buffer.push(value);
                return;
            }

            await new Promise<void>((resolve) => this._senders.push(resolve));

            if (this._closed) throw new ChannelClosedError('channel closed while waiting to send');
        }
    }

    public receive(): Promise<IteratorResult<T>> {
        if (this._buffer.length > 0) {
            const [ value ] = this._buffer.splice(0, 1);

            this._senders.shift()?.();

            return Promise.resolve({ value, done: false });
        }

        if (this._closed) return Promise.resolve({ value: undefined, done: true });

        return new Promise((resolve) => {
            this._receivers.push(resolve);
            this._senders.shift()?.();
        });
    }

    public close(): void {
        if (this._closed) throw new ChannelClosedError('close of closed channel');

        this._closed = true;

        this._receivers.splice(0).forEach((receiver) => receiver({ value: undefined, done: true }));
        this._senders.splice(0).forEach((sender) => sender());
    }

    // Reads and discards everything until the channel is closed.
    public async drain(): Promise<number> {
        let count = 0;

        for await (const _ of this) count++;

        return count;
    }

    public [Symbol.asyncIterator](): AsyncIterator<T> {
        return {
            next: () => this.receive(),
        };
    }
}
