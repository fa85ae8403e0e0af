import { Command, CommanderError } from 'commander';
import { config as loadDotenv } from 'dotenv';
import { v7 as uuid } from 'uuid';
import type { UnwindResult } from './cleanup-stack';
import { loadConfig } from './config';
import { currentContext, ExecutionContext, withContext } from './context';
import { describeError, formatError, InternalWorkflowError } from './errors';
import { detectPlatform, Platform } from './platform';
import type { WorkflowClass } from './workflow';

export interface RunOptions {
    /** Defaults to the process-wide context. */
    context?: ExecutionContext;
    /** Defaults to `process.argv`. */
    argv?: readonly string[];
    platforms?: readonly Platform[];
}

export interface RunResult {
    runId: string;
    exitCode: 0 | 1;
    error?: unknown;
    unwind: UnwindResult;
}

export function parseWorkspaceOption(argv: readonly string[]): string {
    const program = new Command()
        .option('--workspace <path>', 'The root directory of the package.')
        .helpOption(false)
        .allowUnknownOption()
        .exitOverride()
        .configureOutput({ writeOut: () => undefined, writeErr: () => undefined });

    try {
        program.parse([...argv], { from: 'node' });
    } catch (err) {
        if (err instanceof CommanderError) {
            throw new InternalWorkflowError(err.message, { cause: err });
        }
        throw err;
    }

    const { workspace } = program.opts<{ workspace?: string }>();
    if (!workspace) {
        throw new InternalWorkflowError('Missing required option --workspace <path> (the root directory of the package)');
    }
    return workspace;
}

function setUpWorkspace(context: ExecutionContext, options: RunOptions): void {
    const { logger, environment } = context;

    const config = loadConfig(environment);
    if (config.logLevel) logger.level = config.logLevel;
    logger.timestamps = config.timestamps;

    if (!context.platform) {
        context.platform = detectPlatform(environment, options.platforms);
    }

    let workspace: string;
    if (context.platform) {
        logger.debug(`Detected platform: ${context.platform.name}`);
        workspace = context.platform.workspace(environment);
    } else {
        workspace = parseWorkspaceOption(options.argv ?? process.argv);
    }

    logger.debug(`Setting current directory: ${workspace}`);
    try {
        context.workingDirectory = workspace;
    } catch (err) {
        throw new InternalWorkflowError(`Failed to set current directory to ${workspace} (${describeError(err)})`, { cause: err });
    }
}

/**
 * Sets up the workspace, runs the root workflow and unwinds the cleanup stack.
 * Never throws: the outcome is reported through the result.
 */
export function runWorkflow(Root: WorkflowClass, options: RunOptions = {}): Promise<RunResult> {
    const context = options.context ?? currentContext();

    return withContext(context, async (): Promise<RunResult> => {
        const { logger } = context;
        const runId = uuid();
        context.runId = runId;
        logger.level = Root.logLevel;

        let failure: { error: unknown } | undefined;
        let rootName = Root.name;
        try {
            setUpWorkspace(context, options);

            const root = new Root();
            rootName = root.name;
            context.currentWorkflow = root;
            logger.info(`Starting Workflow: ${rootName} (run ${runId})`);
            await root.run();
        } catch (error) {
            failure = { error };
        }

        const unwind = await context.cleanupStack.unwind(failure?.error, context);
        context.currentWorkflow = undefined;

        if (failure) {
            logger.error(formatError(failure.error));
            return { runId, exitCode: 1, error: failure.error, unwind };
        }

        logger.info(`Workflow finished: ${rootName} (run ${runId})`);
        return { runId, exitCode: 0, unwind };
    });
}

export async function main(Root: WorkflowClass, options: RunOptions = {}): Promise<never> {
    loadDotenv();
    const result = await runWorkflow(Root, options);
    return process.exit(result.exitCode);
}
