import { describeError } from './errors';
import type { ExecutionContext } from './context';
import type { Step } from './step';

export interface CleanupEntry {
    name: string;
    step: Step<unknown>;
}

export interface UnwindResult {
    total: number;
    cleaned: number;
    skipped: number;
    failed: number;
}

const TAG = 'Unwind:';

// Steps are pushed as they start and popped LIFO once the root workflow has
// finished, so innermost/latest work is torn down first.
export class CleanupStack {
    private entries: CleanupEntry[] = [];

    push(step: Step<unknown>, name: string = step.name): void {
        this.entries.push({ name, step });
    }

    get size(): number {
        return this.entries.length;
    }

    list(): string[] {
        return this.entries.map((entry) => entry.name);
    }

    async unwind(error: unknown, context: ExecutionContext): Promise<UnwindResult> {
        const { logger } = context;
        const result: UnwindResult = { total: 0, cleaned: 0, skipped: 0, failed: 0 };

        if (this.entries.length > 0) {
            logger.debug(`${TAG} cleaning up ${this.entries.length} step(s) (LIFO)`);
        }

        let entry = this.entries.pop();
        while (entry) {
            result.total++;
            const { name, step } = entry;

            if (!step.cleanup) {
                result.skipped++;
            } else {
                context.currentStep = step;
                try {
                    logger.debug(`${TAG} ${name}`);
                    await step.cleanup(error);
                    result.cleaned++;
                } catch (err) {
                    logger.error(`${TAG} cleanup failed for step ${name}: ${describeError(err)}`);
                    result.failed++;
                } finally {
                    context.currentStep = undefined;
                }
            }

            entry = this.entries.pop();
        }

        if (result.total > 0) {
            logger.debug(`${TAG} ${result.cleaned} cleaned, ${result.skipped} without cleanup, ${result.failed} failed`);
        }
        return result;
    }
}
