import chalk, { ChalkFunction } from 'chalk';
import { inspect } from 'util';

export type LogSink = (line: string) => void;

export class Logger {
    protected static _chalk: chalk.Chalk = new chalk.Instance({ level: 1 });
    protected static _sink: LogSink = (line) => console.log(line);
    protected static _timestamps = false;

    private readonly _location_value: string;

    protected get _location(): string {
        return this._location_value;
    }

    protected _previousLocations: string[];

    protected get _fullLocation(): string[] {
        return this._previousLocations.concat(this._location);
    }

    constructor(location: string, previousLocations: string[] = []) {
        this._location_value = location;
        this._previousLocations = previousLocations;
    }

    /**
     * Redirects every logger to `sink`. Colors are dropped and lines get an ISO timestamp
     * unless `colored` is set, which suits log files.
     */
    public static setSink(sink: LogSink, colored: boolean = false): void {
        Logger._sink = sink;
        Logger._chalk = new chalk.Instance({ level: colored ? 1 : 0 });
        Logger._timestamps = !colored;
    }

    public static makeUnderline(message: string): string {
        return Logger._chalk.underline(message);
    }

    public createChild(location: string): Logger {
        return new Logger(location, this._fullLocation);
    }

    public createCounter(max: number): LoggerCounter {
        return new LoggerCounter(this._fullLocation, max);
    }

    public log(...messages: unknown[]): void {
        Logger._log(this._fullLocation, messages);
    }

    public error(...messages: unknown[]): void {
        Logger._log(this._fullLocation, messages, Logger._chalk.redBright);
    }

    public happy(...messages: unknown[]): void {
        Logger._log(this._fullLocation, messages, Logger._chalk.greenBright);
    }

    public warning(...messages: unknown[]): void {
        Logger._log(this._fullLocation, messages, Logger._chalk.yellow);
    }

    protected static _log(locations: string | string[], messages: unknown[], colorFn?: ChalkFunction): void {
        const _messages = messages.map((m) => {
            let msg = typeof m === 'object' ? inspect(m, { depth: 2 }) : String(m);

            if (colorFn) {
                msg = colorFn(msg);
            }

            return msg;
        });

        let _location: string;

        if (typeof locations === 'string') _location = `[${ locations }]`;
        else {
            _location = locations.reduce((acc, item) => {
                return acc + `[${ item }]`;
            }, '');
        }

        const prefix = Logger._timestamps ? `${ new Date().toISOString() } ` : '';

        Logger._sink(`${ prefix }${ _location }: ${ _messages.join(' ') }`);
    }
}

export class LoggerCounter extends Logger {
    private _count: number;
    private readonly _max: number;

    constructor(previousLocations: string[], max: number) {
        super('', previousLocations);

        this._count = 0;
        this._max = max;
    }

    protected override get _location() {
        return `${ ++this._count }/${ this._max }`;
    }
}
