import { Environment } from './environment';
import { Logger } from './logger';

export interface Platform {
    readonly name: string;
    readonly supportsLogGroups: boolean;
    detect(env: Environment): boolean;
    /** Root directory of the checked-out repository. */
    workspace(env: Environment): string;
    startLogGroup(name: string, logger: Logger): void;
    endLogGroup(logger: Logger): void;
}

// https://docs.github.com/en/actions/using-workflows/workflow-commands-for-github-actions#grouping-log-lines
export const GitHubPlatform: Platform = {
    name: 'GitHub Actions',
    supportsLogGroups: true,

    detect(env) {
        return env.get('GITHUB_ACTIONS') === 'true';
    },

    workspace(env) {
        return env.require('GITHUB_WORKSPACE');
    },

    startLogGroup(name, logger) {
        logger.output(`::group::${name}`);
    },

    endLogGroup(logger) {
        logger.output('::endgroup::');
    },
};

export const knownPlatforms: readonly Platform[] = [GitHubPlatform];

export function detectPlatform(env: Environment, platforms: readonly Platform[] = knownPlatforms): Platform | undefined {
    return platforms.find((platform) => platform.detect(env));
}
