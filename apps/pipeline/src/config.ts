import { Environment } from '@pipewright/sdk';

export interface PipelineConfig {
    /** Package root, relative to the workspace. */
    packageDir: string;
    skipTests: boolean;
}

export function loadPipelineConfig(env: Environment): PipelineConfig {
    const skip = env.get('PIPELINE_SKIP_TESTS')?.trim().toLowerCase();
    return {
        packageDir: env.get('PIPELINE_PACKAGE_DIR') || '.',
        skipTests: skip === 'true' || skip === '1',
    };
}
