import { inspect } from 'util';

/** Convenience failure for step authors; the engine treats it like any other error. */
export class StepError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'StepError';
    }
}

// Raised by the engine itself (workspace setup, configuration). Always fatal.
export class InternalWorkflowError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(`Internal Workflow Error: ${message}`, options);
        this.name = 'InternalWorkflowError';
    }
}

export class RetryExhaustedError extends Error {
    constructor(public readonly attempts: number) {
        super(`Retry failed after ${attempts} attempt(s)`);
        this.name = 'RetryExhaustedError';
    }
}

export class MissingEnvironmentVariableError extends Error {
    constructor(public readonly key: string) {
        super(`Missing required environment variable ${key}`);
        this.name = 'MissingEnvironmentVariableError';
    }
}

export class MissingEnvironmentSecretError extends Error {
    constructor(public readonly key: string) {
        super(`Secret environment variable ${key} is not set`);
        this.name = 'MissingEnvironmentSecretError';
    }
}

export class SecretDecodingError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'SecretDecodingError';
    }
}

export class ShellError extends Error {
    constructor(
        public readonly command: string,
        public readonly args: readonly string[],
        public readonly exitCode: number | null,
        public readonly stdout: string,
        public readonly stderr: string,
        signal?: string | null,
    ) {
        const invocation = [command, ...args].join(' ');
        const reason = signal ? `was terminated by ${signal}` : `failed with exit code ${exitCode}`;
        const detail = stderr.trim();
        super(detail ? `Command ${reason}: ${invocation}\n${detail}` : `Command ${reason}: ${invocation}`);
        this.name = 'ShellError';
    }
}

/** Renders an error as `Name: message`, following `cause` links. */
export function describeError(err: unknown): string {
    if (err instanceof Error) {
        const line = `${err.name}: ${err.message}`;
        return err.cause === undefined ? line : `${line}\nCaused by: ${describeError(err.cause)}`;
    }
    if (typeof err === 'string') return err;
    return inspect(err);
}

export function formatError(err: unknown): string {
    return `Exiting on error:\n${describeError(err)}`;
}
