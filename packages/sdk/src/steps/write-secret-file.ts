import { mkdtemp, rm, writeFile } from 'fs/promises';
import os from 'os';
import path from 'path';
import type { Secret } from '../secret';
import { BaseStep } from '../step';

export interface SecretFile {
    filePath: string;
    contents: Buffer;
}

export interface WriteSecretFileOptions {
    /** Defaults to a fresh directory under the OS temp dir, removed on cleanup. */
    directory?: string;
}

/**
 * Materialises a secret as a file (mode 0600) for tools that only take paths,
 * such as signing keys. Everything it creates is removed on cleanup.
 */
export class WriteSecretFile extends BaseStep<SecretFile> {
    private createdFile: string | undefined;
    private createdDirectory: string | undefined;

    constructor(
        private readonly secret: Secret,
        private readonly fileName: string,
        private readonly options: WriteSecretFileOptions = {},
    ) {
        super(`Write secret file ${fileName}`);
    }

    async run(): Promise<SecretFile> {
        const contents = await this.secret.get();

        let directory = this.options.directory;
        if (!directory) {
            directory = await mkdtemp(path.join(os.tmpdir(), 'pipewright-'));
            this.createdDirectory = directory;
        }

        const filePath = path.resolve(this.context.workingDirectory, directory, this.fileName);
        await writeFile(filePath, contents, { mode: 0o600 });
        this.createdFile = filePath;
        this.logger.debug(`Wrote ${this.secret.description} to ${filePath}`);

        return { filePath, contents };
    }

    async cleanup(): Promise<void> {
        if (this.createdFile) {
            await rm(this.createdFile, { force: true });
            this.createdFile = undefined;
        }
        if (this.createdDirectory) {
            await rm(this.createdDirectory, { recursive: true, force: true });
            this.createdDirectory = undefined;
        }
    }
}
