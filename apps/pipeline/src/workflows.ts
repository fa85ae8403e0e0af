import { LogLevel, ShellCommand, Workflow } from '@pipewright/sdk';
import { loadPipelineConfig, PipelineConfig } from './config';

abstract class PackageWorkflow extends Workflow {
    constructor(protected readonly config: PipelineConfig) {
        super();
    }

    protected enterPackage(): void {
        this.context.changeDirectory(this.config.packageDir);
    }
}

export class Install extends PackageWorkflow {
    async run(): Promise<void> {
        this.enterPackage();
        await this.step(new ShellCommand('npm', ['ci']));
    }
}

export class Build extends PackageWorkflow {
    async run(): Promise<void> {
        this.enterPackage();
        await this.step(new ShellCommand('npm', ['run', 'build']));
    }
}

export class Test extends PackageWorkflow {
    async run(): Promise<void> {
        if (this.config.skipTests) {
            this.logger.info('Skipping tests (PIPELINE_SKIP_TESTS is set)');
            return;
        }
        this.enterPackage();
        await this.step(new ShellCommand('npm', ['test']));
    }
}

// Install, build and test a Node.js package checked out in the workspace.
export class NodePackageCi extends Workflow {
    static logLevel: LogLevel = 'info';

    async run(): Promise<void> {
        const config = loadPipelineConfig(this.context.environment);

        for (const child of [new Install(config), new Build(config), new Test(config)]) {
            await this.context.withLogGroup(child.name, () => this.workflow(child));
        }
    }
}
