import { currentContext } from './context';
import { describeError } from './errors';
import type { Step } from './step';
import { summarize } from './utils/serialization';
import type { Workflow } from './workflow';

export type StepInput<Output> = Step<Output> | (() => Step<Output>);
export type WorkflowInput = Workflow | (() => Workflow);

function resolveStep<Output>(input: StepInput<Output>): Step<Output> {
    return typeof input === 'function' ? input() : input;
}

function resolveWorkflow(input: WorkflowInput): Workflow {
    return typeof input === 'function' ? input() : input;
}

/**
 * Registers the step for cleanup, then runs it. Cleanup itself is left to the
 * unwind at the end of the run so that ordering is global across the tree.
 */
export async function dispatchStep<Output>(input: StepInput<Output>, name?: string): Promise<Output> {
    const context = currentContext();
    const step = resolveStep(input);
    const displayName = name ?? step.name;

    context.cleanupStack.push(step, displayName);
    context.currentStep = step;
    context.logger.info(`Step: ${displayName}`);

    const started = Date.now();
    try {
        const output = await step.run();
        context.logger.debug(`Step finished: ${displayName} (${Date.now() - started}ms)`);
        if (output !== undefined && context.logger.isEnabled('debug')) {
            context.logger.debug(`Step output: ${summarize(output)}`);
        }
        return output;
    } finally {
        // Steps never run side by side, so there is nothing to restore.
        context.currentStep = undefined;
    }
}

/** Runs a child workflow and puts the working directory back afterwards. */
export async function dispatchWorkflow(input: WorkflowInput): Promise<void> {
    const context = currentContext();
    const child = resolveWorkflow(input);
    const directory = context.workingDirectory;
    const parent = context.currentWorkflow;

    context.logger.info(`Workflow: ${child.name}`);
    context.currentWorkflow = child;
    try {
        await child.run();
    } finally {
        context.currentWorkflow = parent;
        try {
            if (context.workingDirectory !== directory) {
                context.changeDirectory(directory);
            }
        } catch (err) {
            context.logger.warn(`Failed to restore working directory ${directory}: ${describeError(err)}`);
        }
    }
}

export function runStepInput<Output>(nameOrStep: string | StepInput<Output>, input?: StepInput<Output>): Promise<Output> {
    if (typeof nameOrStep !== 'string') {
        return dispatchStep(nameOrStep);
    }
    if (input === undefined) {
        return Promise.reject(new TypeError(`step "${nameOrStep}" was given nothing to run`));
    }
    return dispatchStep(input, nameOrStep);
}

/** Dispatch a step from anywhere inside a running pipeline. */
export function step<Output>(input: StepInput<Output>): Promise<Output>;
export function step<Output>(name: string, input: StepInput<Output>): Promise<Output>;
export function step<Output>(nameOrStep: string | StepInput<Output>, input?: StepInput<Output>): Promise<Output> {
    return runStepInput(nameOrStep, input);
}

export function workflow(input: WorkflowInput): Promise<void> {
    return dispatchWorkflow(input);
}
