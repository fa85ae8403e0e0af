import { readFile } from 'fs/promises';
import path from 'path';
import { currentContext } from './context';
import { MissingEnvironmentSecretError, SecretDecodingError } from './errors';

export interface Secret {
    /** Human-readable origin, safe to log. */
    readonly description: string;
    get(): Promise<Buffer>;
}

export type SecretTransform = (value: Buffer) => Buffer | Promise<Buffer>;

const BASE64_ALPHABET = /[^A-Za-z0-9+/=]/g;

export function decodeBase64(value: string): Buffer {
    const cleaned = value.replace(BASE64_ALPHABET, '');
    if (cleaned.length % 4 !== 0 || /=[^=]/.test(cleaned)) {
        throw new SecretDecodingError('Failed to base64-decode secret');
    }
    return Buffer.from(cleaned, 'base64');
}

export class EnvironmentSecret implements Secret {
    constructor(
        public readonly key: string,
        private readonly transform: SecretTransform = (value) => value,
    ) {}

    static value(key: string): EnvironmentSecret {
        return new EnvironmentSecret(key);
    }

    static base64EncodedValue(key: string): EnvironmentSecret {
        return new EnvironmentSecret(key, (value) => decodeBase64(value.toString('utf8')));
    }

    get description(): string {
        return `environment variable ${this.key}`;
    }

    async get(): Promise<Buffer> {
        const value = currentContext().environment.get(this.key);
        if (value === undefined) {
            throw new MissingEnvironmentSecretError(this.key);
        }
        return this.transform(Buffer.from(value, 'utf8'));
    }
}

export class FileSecret implements Secret {
    constructor(public readonly filePath: string) {}

    get description(): string {
        return `file ${this.filePath}`;
    }

    async get(): Promise<Buffer> {
        const resolved = path.resolve(currentContext().workingDirectory, this.filePath);
        return readFile(resolved);
    }
}

export async function loadSecretString(secret: Secret): Promise<string> {
    const data = await secret.get();
    return data.toString('utf8');
}
