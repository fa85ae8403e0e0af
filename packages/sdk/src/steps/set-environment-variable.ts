import { BaseStep } from '../step';

/** Sets a variable for the rest of the run; cleanup puts the previous value back. */
export class SetEnvironmentVariable extends BaseStep {
    private applied = false;
    private previous: string | undefined;

    constructor(
        private readonly key: string,
        private readonly value: string,
    ) {
        super(`Set ${key}`);
    }

    async run(): Promise<void> {
        const { environment } = this.context;
        this.previous = environment.get(this.key);
        environment.set(this.key, this.value);
        this.applied = true;
    }

    async cleanup(): Promise<void> {
        if (!this.applied) return;

        const { environment } = this.context;
        if (this.previous === undefined) {
            environment.unset(this.key);
        } else {
            environment.set(this.key, this.previous);
        }
        this.applied = false;
    }
}
