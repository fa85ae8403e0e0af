import { spawn } from 'child_process';
import { ShellError } from './errors';
import { Environment } from './environment';
import { Logger } from './logger';

export interface ProcessResult {
    exitCode: number | null;
    signal: string | null;
    stdout: string;
    stderr: string;
}

export interface ProcessOptions {
    cwd: string;
    env: Record<string, string>;
    input?: string;
}

export type ProcessRunner = (command: string, args: readonly string[], options: ProcessOptions) => Promise<ProcessResult>;

export const spawnProcess: ProcessRunner = (command, args, options) =>
    new Promise((resolve, reject) => {
        const child = spawn(command, [...args], { cwd: options.cwd, env: options.env, stdio: 'pipe' });
        let stdout = '';
        let stderr = '';

        child.stdout.setEncoding('utf8');
        child.stderr.setEncoding('utf8');
        child.stdout.on('data', (chunk: string) => (stdout += chunk));
        child.stderr.on('data', (chunk: string) => (stderr += chunk));

        child.on('error', reject);
        child.on('close', (exitCode, signal) => resolve({ exitCode, signal, stdout, stderr }));

        // A child may exit without reading its input; its exit status decides the result.
        child.stdin.on('error', (err: NodeJS.ErrnoException) => {
            if (err.code !== 'EPIPE') reject(err);
        });
        child.stdin.end(options.input);
    });

/** The slice of the execution context a shell needs. */
export interface ShellHost {
    readonly workingDirectory: string;
    readonly logger: Logger;
    readonly environment: Environment;
}

export interface ShellOptions {
    /** Don't echo stdout through the logger. */
    quiet?: boolean;
    input?: string;
}

export function quoteArgument(arg: string): string {
    if (arg !== '' && /^[\w@%+=:,./-]+$/.test(arg)) return arg;
    return `'${arg.replace(/'/g, `'\\''`)}'`;
}

export class Shell {
    constructor(
        private readonly host: ShellHost,
        private readonly runner: ProcessRunner = spawnProcess,
    ) {}

    async run(command: string, args: readonly string[] = [], options: ShellOptions = {}): Promise<string> {
        const cwd = this.host.workingDirectory;
        const rendered = [command, ...args.map(quoteArgument)].join(' ');
        this.host.logger.debug(`Shell (at: ${cwd}): ${rendered}`);

        const result = await this.runner(command, args, {
            cwd,
            env: this.host.environment.toRecord(),
            input: options.input,
        });

        if (result.exitCode !== 0) {
            throw new ShellError(command, args, result.exitCode, result.stdout, result.stderr, result.signal);
        }

        const output = result.stdout.replace(/\r?\n$/, '');
        if (!options.quiet && output !== '') {
            this.host.logger.output(output);
        }
        return output;
    }
}
