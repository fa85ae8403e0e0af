import path from 'path';
import { ExecutionContext, WorkingDirectory } from './context';
import { Environment, EnvironmentVariables } from './environment';
import { LogEntry, LogEntryLevel, Logger, LogLevel, LogSink } from './logger';
import { Platform } from './platform';
import { ProcessOptions, ProcessResult } from './shell';

// In-process stand-ins for pipelines under test: no console, no real
// directory changes, no child processes.

export class MemoryLogSink implements LogSink {
    readonly entries: LogEntry[] = [];
    readonly outputs: string[] = [];

    write(entry: LogEntry): void {
        this.entries.push(entry);
    }

    output(text: string): void {
        this.outputs.push(text);
    }

    messages(level?: LogEntryLevel): string[] {
        return this.entries.filter((entry) => !level || entry.level === level).map((entry) => entry.message);
    }
}

export class FakeDirectory implements WorkingDirectory {
    private readonly directories: Set<string>;
    private current: string;

    constructor(initial: string = '/', directories: string[] = []) {
        this.current = path.posix.resolve(initial);
        this.directories = new Set([this.current, ...directories.map((dir) => path.posix.resolve(dir))]);
    }

    cwd(): string {
        return this.current;
    }

    chdir(directory: string): void {
        const target = path.posix.resolve(this.current, directory);
        if (!this.directories.has(target)) {
            const err: NodeJS.ErrnoException = new Error(`ENOENT: no such file or directory, chdir '${target}'`);
            err.code = 'ENOENT';
            throw err;
        }
        this.current = target;
    }

    add(directory: string): void {
        this.directories.add(path.posix.resolve(this.current, directory));
    }

    remove(directory: string): void {
        this.directories.delete(path.posix.resolve(this.current, directory));
    }
}

export interface ProcessCall {
    command: string;
    args: string[];
    cwd: string;
    input?: string;
}

export type ScriptedResponse = Partial<ProcessResult> | ((call: ProcessCall) => Partial<ProcessResult>);

/** Records every invocation and answers from a script keyed by `command args...`. */
export class FakeProcessRunner {
    readonly calls: ProcessCall[] = [];
    private readonly responses = new Map<string, ScriptedResponse>();

    respond(commandLine: string, response: ScriptedResponse): this {
        this.responses.set(commandLine, response);
        return this;
    }

    commandLines(): string[] {
        return this.calls.map((call) => [call.command, ...call.args].join(' '));
    }

    readonly run = async (command: string, args: readonly string[], options: ProcessOptions): Promise<ProcessResult> => {
        const call: ProcessCall = { command, args: [...args], cwd: options.cwd, input: options.input };
        this.calls.push(call);

        const scripted = this.responses.get([command, ...args].join(' '));
        const response = typeof scripted === 'function' ? scripted(call) : scripted;
        return { exitCode: 0, signal: null, stdout: '', stderr: '', ...response };
    };
}

export interface TestContextOptions {
    cwd?: string;
    directories?: string[];
    env?: EnvironmentVariables;
    level?: LogLevel;
    platform?: Platform;
}

export interface TestContext {
    context: ExecutionContext;
    sink: MemoryLogSink;
    directory: FakeDirectory;
    runner: FakeProcessRunner;
    env: EnvironmentVariables;
}

export function createTestContext(options: TestContextOptions = {}): TestContext {
    const sink = new MemoryLogSink();
    const directory = new FakeDirectory(options.cwd ?? '/', options.directories ?? []);
    const runner = new FakeProcessRunner();
    const env: EnvironmentVariables = { ...options.env };

    const context = new ExecutionContext({
        logger: new Logger({ sink, level: options.level ?? 'debug' }),
        environment: new Environment(env),
        directory,
        processRunner: runner.run,
        platform: options.platform,
    });

    return { context, sink, directory, runner, env };
}
