import { MissingEnvironmentVariableError } from './errors';

export type EnvironmentVariables = Record<string, string | undefined>;

/**
 * Facade over the process environment. Writes go straight to the backing map,
 * so with the default (`process.env`) they are visible to spawned commands.
 */
export class Environment {
    constructor(private readonly vars: EnvironmentVariables = process.env) {}

    get(key: string): string | undefined {
        return this.vars[key];
    }

    has(key: string): boolean {
        return this.vars[key] !== undefined;
    }

    require(key: string): string {
        const value = this.vars[key];
        if (value === undefined) {
            throw new MissingEnvironmentVariableError(key);
        }
        return value;
    }

    set(key: string, value: string): void {
        this.vars[key] = value;
    }

    unset(key: string): void {
        delete this.vars[key];
    }

    toRecord(): Record<string, string> {
        const record: Record<string, string> = {};
        for (const [key, value] of Object.entries(this.vars)) {
            if (value !== undefined) record[key] = value;
        }
        return record;
    }
}
