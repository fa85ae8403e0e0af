import { AsyncLocalStorage } from 'async_hooks';
import { CleanupStack } from './cleanup-stack';
import { Environment } from './environment';
import { Logger } from './logger';
import { Platform } from './platform';
import { ProcessRunner, Shell } from './shell';
import type { Step } from './step';
import type { Workflow } from './workflow';

/** Anything that can report and change the current directory. `process` qualifies. */
export interface WorkingDirectory {
    cwd(): string;
    chdir(directory: string): void;
}

export interface ExecutionContextOptions {
    logger?: Logger;
    environment?: Environment;
    directory?: WorkingDirectory;
    processRunner?: ProcessRunner;
    platform?: Platform;
}

export class ExecutionContext {
    readonly logger: Logger;
    readonly environment: Environment;
    readonly shell: Shell;
    readonly cleanupStack = new CleanupStack();

    platform: Platform | undefined;
    runId: string | undefined;

    // Diagnostics only; never used for ownership.
    currentStep: Step<unknown> | undefined;
    currentWorkflow: Workflow | undefined;

    private readonly directory: WorkingDirectory;

    constructor(options: ExecutionContextOptions = {}) {
        this.logger = options.logger ?? new Logger();
        this.environment = options.environment ?? new Environment();
        this.directory = options.directory ?? process;
        this.platform = options.platform;
        this.shell = new Shell(this, options.processRunner);
    }

    get workingDirectory(): string {
        return this.directory.cwd();
    }

    set workingDirectory(directory: string) {
        this.directory.chdir(directory);
    }

    changeDirectory(directory: string): void {
        this.logger.debug(`Changing directory: ${directory}`);
        this.directory.chdir(directory);
    }

    /** Runs `fn` inside a collapsible log group when the platform has them. */
    async withLogGroup<T>(name: string, fn: () => Promise<T>): Promise<T> {
        const platform = this.platform;
        if (!platform?.supportsLogGroups) {
            return fn();
        }

        platform.startLogGroup(name, this.logger);
        try {
            return await fn();
        } finally {
            platform.endLogGroup(this.logger);
        }
    }
}

const storage = new AsyncLocalStorage<ExecutionContext>();
let shared: ExecutionContext | undefined;

/** The context of the running pipeline, or the process-wide one outside any run. */
export function currentContext(): ExecutionContext {
    const scoped = storage.getStore();
    if (scoped) return scoped;
    if (!shared) shared = new ExecutionContext();
    return shared;
}

export function withContext<T>(context: ExecutionContext, fn: () => T): T {
    return storage.run(context, fn);
}
