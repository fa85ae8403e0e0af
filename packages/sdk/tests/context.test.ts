import {
    createTestContext,
    currentContext,
    describeError,
    detectPlatform,
    Environment,
    ExecutionContext,
    formatError,
    GitHubPlatform,
    MissingEnvironmentVariableError,
    StepError,
    withContext,
} from '../src';

describe('ExecutionContext', () => {
    test('reads and changes the working directory through its directory facility', () => {
        const { context, directory } = createTestContext({ cwd: '/ws', directories: ['/ws/app'] });

        context.workingDirectory = 'app';

        expect(context.workingDirectory).toBe('/ws/app');
        expect(directory.cwd()).toBe('/ws/app');
    });

    test('is scoped per run and falls back to a shared instance', async () => {
        const { context } = createTestContext();

        const inside = await withContext(context, async () => {
            await Promise.resolve();
            return currentContext();
        });

        expect(inside).toBe(context);
        expect(currentContext()).not.toBe(context);
        expect(currentContext()).toBe(currentContext());
        expect(currentContext()).toBeInstanceOf(ExecutionContext);
    });

    test('wraps log groups on GitHub Actions', async () => {
        const { context, sink } = createTestContext({ platform: GitHubPlatform });

        const value = await context.withLogGroup('Build', async () => {
            sink.output('compiling');
            return 42;
        });

        expect(value).toBe(42);
        expect(sink.outputs).toEqual(['::group::Build', 'compiling', '::endgroup::']);
    });

    test('closes the log group when the body fails', async () => {
        const { context, sink } = createTestContext({ platform: GitHubPlatform });

        await expect(context.withLogGroup('Test', async () => Promise.reject(new Error('red')))).rejects.toThrow('red');
        expect(sink.outputs).toEqual(['::group::Test', '::endgroup::']);
    });

    test('runs the body without markers elsewhere', async () => {
        const { context, sink } = createTestContext();

        await context.withLogGroup('Build', async () => undefined);

        expect(sink.outputs).toEqual([]);
    });
});

describe('Environment', () => {
    test('gets, sets and unsets variables on the backing map', () => {
        const vars: Record<string, string | undefined> = { HOME: '/home/ci' };
        const env = new Environment(vars);

        env.set('CI', 'true');
        env.unset('HOME');

        expect(vars).toEqual({ CI: 'true' });
        expect(env.has('HOME')).toBe(false);
        expect(env.toRecord()).toEqual({ CI: 'true' });
    });

    test('require throws a named error for missing variables', () => {
        const env = new Environment({});

        expect(() => env.require('GITHUB_SHA')).toThrow(MissingEnvironmentVariableError);
        expect(() => env.require('GITHUB_SHA')).toThrow('Missing required environment variable GITHUB_SHA');
    });
});

describe('detectPlatform', () => {
    test('detects GitHub Actions', () => {
        expect(detectPlatform(new Environment({ GITHUB_ACTIONS: 'true' }))).toBe(GitHubPlatform);
    });

    test('returns undefined for local runs', () => {
        expect(detectPlatform(new Environment({ CI: 'true' }))).toBeUndefined();
    });
});

describe('error formatting', () => {
    test('renders name, message and cause chain', () => {
        const error = new StepError('upload failed', { cause: new Error('503 Service Unavailable') });

        expect(formatError(error)).toBe('Exiting on error:\nStepError: upload failed\nCaused by: Error: 503 Service Unavailable');
    });

    test('renders non-error values', () => {
        expect(describeError('plain failure')).toBe('plain failure');
        expect(describeError({ code: 7 })).toBe('{ code: 7 }');
    });
});
