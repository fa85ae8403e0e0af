export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';
export type LogEntryLevel = Exclude<LogLevel, 'silent'>;

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const SEVERITY: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

export function isLogLevel(value: string): value is LogLevel {
    return (LOG_LEVELS as readonly string[]).includes(value);
}

export interface LogEntry {
    level: LogEntryLevel;
    message: string;
    /** The fully formatted line, tag and timestamp included. */
    line: string;
}

export interface LogSink {
    write(entry: LogEntry): void;
    output(text: string): void;
}

export const consoleSink: LogSink = {
    write(entry) {
        console[entry.level](entry.line);
    },
    output(text) {
        console.log(text);
    },
};

export interface LoggerOptions {
    tag?: string;
    level?: LogLevel;
    timestamps?: boolean;
    sink?: LogSink;
}

export class Logger {
    level: LogLevel;
    timestamps: boolean;
    private readonly tag: string;
    private readonly sink: LogSink;

    constructor(options: LoggerOptions = {}) {
        this.tag = options.tag ?? '[pipewright]';
        this.level = options.level ?? 'info';
        this.timestamps = options.timestamps ?? false;
        this.sink = options.sink ?? consoleSink;
    }

    isEnabled(level: LogEntryLevel): boolean {
        return SEVERITY[level] >= SEVERITY[this.level];
    }

    debug(message: string): void {
        this.write('debug', message);
    }

    info(message: string): void {
        this.write('info', message);
    }

    warn(message: string): void {
        this.write('warn', message);
    }

    error(message: string): void {
        this.write('error', message);
    }

    /** Raw process output. Printed at every level except `silent`. */
    output(text: string): void {
        if (this.level === 'silent') return;
        this.sink.output(text);
    }

    private write(level: LogEntryLevel, message: string): void {
        if (!this.isEnabled(level)) return;
        const prefix = this.timestamps ? `${new Date().toISOString()} ${this.tag}` : this.tag;
        this.sink.write({ level, message, line: `${prefix} ${message}` });
    }
}
