import { currentContext, ExecutionContext } from './context';
import { dispatchWorkflow, runStepInput, StepInput, WorkflowInput } from './dispatch';
import { Logger, LogLevel } from './logger';
import { main, RunOptions } from './run';

export type WorkflowClass<W extends Workflow = Workflow> = (new () => W) & { readonly logLevel: LogLevel };
export type WorkflowHandler = (workflow: Workflow) => Promise<void>;

const MAX_NAME_LENGTH = 100;

function validateName(name: string): string {
    if (!name || name.trim().length === 0) {
        throw new Error('Workflow name cannot be empty');
    }
    if (name.length > MAX_NAME_LENGTH) {
        throw new Error(`Workflow name exceeds maximum length of ${MAX_NAME_LENGTH} characters`);
    }
    return name;
}

/**
 * A named unit that sequences steps and child workflows.
 *
 * @example
 * class Ci extends Workflow {
 *   static logLevel: LogLevel = 'debug';
 *   async run() {
 *     await this.workflow(new Build());
 *     await this.step(new ShellCommand('npm', ['test']));
 *   }
 * }
 *
 * Ci.main();
 */
export abstract class Workflow {
    /** Minimum log level applied when this workflow is the root of a run. */
    static logLevel: LogLevel = 'info';

    readonly name: string;

    constructor(name?: string) {
        this.name = validateName(name ?? this.constructor.name);
    }

    get context(): ExecutionContext {
        return currentContext();
    }

    get logger(): Logger {
        return this.context.logger;
    }

    abstract run(): Promise<void>;

    workflow(child: WorkflowInput): Promise<void> {
        return dispatchWorkflow(child);
    }

    step<O>(step: StepInput<O>): Promise<O>;
    step<O>(name: string, step: StepInput<O>): Promise<O>;
    step<O>(nameOrStep: string | StepInput<O>, step?: StepInput<O>): Promise<O> {
        return runStepInput(nameOrStep, step);
    }

    static main(this: WorkflowClass, options?: RunOptions): Promise<never> {
        return main(this, options);
    }
}

/**
 * Build a workflow class from a handler, for pipelines that don't need their
 * own subclass.
 */
export function defineWorkflow(name: string, handler: WorkflowHandler, options: { logLevel?: LogLevel } = {}): WorkflowClass {
    validateName(name);
    return class extends Workflow {
        static logLevel: LogLevel = options.logLevel ?? 'info';

        constructor() {
            super(name);
        }

        run(): Promise<void> {
            return handler(this);
        }
    };
}
