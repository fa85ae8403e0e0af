import { currentContext, ExecutionContext } from './context';
import { runStepInput, StepInput } from './dispatch';
import { Logger } from './logger';

/**
 * Unit of work. `run` may dispatch nested steps; `cleanup` is deferred until the
 * whole run has finished and receives its terminal error (`undefined` on success).
 */
export interface Step<Output = unknown> {
    readonly name: string;
    run(): Promise<Output>;
    cleanup?(error: unknown): Promise<void>;
}

export type CleanupFn = (error: unknown) => Promise<void>;

export interface CreateStepOptions {
    cleanup?: CleanupFn;
}

export abstract class BaseStep<Output = void> implements Step<Output> {
    readonly name: string;

    constructor(name?: string) {
        this.name = name ?? this.constructor.name;
    }

    protected get context(): ExecutionContext {
        return currentContext();
    }

    protected get logger(): Logger {
        return this.context.logger;
    }

    abstract run(): Promise<Output>;

    protected step<O>(step: StepInput<O>): Promise<O>;
    protected step<O>(name: string, step: StepInput<O>): Promise<O>;
    protected step<O>(nameOrStep: string | StepInput<O>, step?: StepInput<O>): Promise<O> {
        return runStepInput(nameOrStep, step);
    }
}

/**
 * Build a step from a closure.
 *
 * @example
 * await wf.step(createStep('upload', async () => upload(artifact), {
 *   cleanup: async (error) => { if (error) await deleteUpload(); },
 * }));
 */
export function createStep<Output>(name: string, run: () => Promise<Output>, options: CreateStepOptions = {}): Step<Output> {
    const { cleanup } = options;
    return cleanup ? { name, run, cleanup } : { name, run };
}
