export interface ProgressRenderer<T> {
    render(snapshot: T): void;

    finish(snapshot: T): void;
}

export interface ProgressReporterOptions<T> {
    snapshot: () => T,
    isComplete: (snapshot: T) => boolean,
    renderer: ProgressRenderer<T>,
    // milliseconds
    interval?: number,
}

/**
 * Polls a snapshot at a fixed interval and hands it to a renderer
 * until the snapshot reports completion, then renders the final state once.
 */
export class ProgressReporter<T> {
    public static DEFAULT_INTERVAL = 100;

    private readonly _options: ProgressReporterOptions<T>;
    private _timer: NodeJS.Timeout | undefined;
    private _resolve: (() => void) | undefined;

    constructor(options: ProgressReporterOptions<T>) {
        this._options = options;
    }

    public run(): Promise<void> {
        const { snapshot, isComplete, renderer } = this._options;
        const interval = this._options.interval ?? ProgressReporter.DEFAULT_INTERVAL;

        return new Promise((resolve) => {
            this._resolve = resolve;

            const tick = () => {
                this._timer = undefined;

                const current = snapshot();

                if (isComplete(current)) {
                    renderer.finish(current);
                    this._settle();
                    return;
                }

                renderer.render(current);
                this._timer = setTimeout(tick, interval);
            };

            tick();
        });
    }

    // Stops polling without rendering the final state; the promise returned by `run` resolves.
    public stop(): void {
        if (this._timer) clearTimeout(this._timer);

        this._settle();
    }

    private _settle(): void {
        const resolve = this._resolve;

        this._timer = undefined;
        this._resolve = undefined;
        resolve?.();
    }
}
