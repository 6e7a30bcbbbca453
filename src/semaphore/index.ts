/**
 * Counting semaphore. Tasks beyond `limit` wait in FIFO order until a slot frees up;
 * waiting does not occupy a slot.
 */
export class Semaphore {
    private _active = 0;
    private readonly _queue: Array<() => void> = [];
    private readonly _limit: number;

    constructor(limit: number) {
        this._limit = Math.max(1, Math.floor(limit));
    }

    public get active(): number {
        return this._active;
    }

    public get queued(): number {
        return this._queue.length;
    }

    public async use<T>(task: () => Promise<T>): Promise<T> {
        await this._acquire();

        try {
            return await task();
        } finally {
            this._release();
        }
    }

    private async _acquire(): Promise<void> {
        if (this._active < this._limit) {
            this._active += 1;
            return;
        }

        await new Promise<void>((resolve) => {
            this._queue.push(() => {
                this._active += 1;
                resolve();
            });
        });
    }

    private _release(): void {
        this._active = Math.max(0, this._active - 1);

        while (this._active < this._limit) {
            const next = this._queue.shift();

            if (!next) return;

            next();
        }
    }
}

// One-slot semaphore guarding a critical section.
export class Mutex {
    private readonly _semaphore = new Semaphore(1);

    public runExclusive<T>(task: () => Promise<T>): Promise<T> {
        return this._semaphore.use(task);
    }
}
