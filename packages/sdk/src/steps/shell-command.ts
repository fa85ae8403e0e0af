import { BaseStep } from '../step';

export interface ShellCommandOptions {
    name?: string;
    quiet?: boolean;
    input?: string;
}

/** Runs a single command in the current working directory; the output is its stdout. */
export class ShellCommand extends BaseStep<string> {
    constructor(
        private readonly command: string,
        private readonly args: readonly string[] = [],
        private readonly options: ShellCommandOptions = {},
    ) {
        super(options.name ?? [command, ...args].join(' '));
    }

    run(): Promise<string> {
        const { quiet, input } = this.options;
        return this.context.shell.run(this.command, this.args, { quiet, input });
    }
}
