import { Environment } from './environment';
import { InternalWorkflowError } from './errors';
import { isLogLevel, LOG_LEVELS, LogLevel } from './logger';

export interface EngineConfig {
    /** Overrides the root workflow's declared level when set. */
    logLevel?: LogLevel;
    timestamps: boolean;
}

function parseBoolean(value: string | undefined): boolean {
    return value === 'true' || value === '1';
}

export function loadConfig(env: Environment): EngineConfig {
    const rawLevel = env.get('PIPEWRIGHT_LOG_LEVEL')?.trim().toLowerCase();
    let logLevel: LogLevel | undefined;
    if (rawLevel) {
        if (!isLogLevel(rawLevel)) {
            throw new InternalWorkflowError(
                `Invalid PIPEWRIGHT_LOG_LEVEL "${rawLevel}" (expected one of ${LOG_LEVELS.join(', ')})`,
            );
        }
        logLevel = rawLevel;
    }

    return {
        logLevel,
        timestamps: parseBoolean(env.get('PIPEWRIGHT_LOG_TIMESTAMPS')),
    };
}
