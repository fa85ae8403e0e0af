import { createTestContext, quoteArgument, ShellError } from '../src';

describe('Shell', () => {
    test('runs the command in the current working directory', async () => {
        const { context, runner } = createTestContext({ cwd: '/ws' });

        await context.shell.run('npm', ['run', 'build']);

        expect(runner.calls).toEqual([{ command: 'npm', args: ['run', 'build'], cwd: '/ws', input: undefined }]);
    });

    test('logs the invocation before running it', async () => {
        const { context, sink } = createTestContext({ cwd: '/ws' });

        await context.shell.run('echo', ['hello world', "it's"]);

        expect(sink.messages('debug')).toEqual(["Shell (at: /ws): echo 'hello world' 'it'\\''s'"]);
    });

    test('returns stdout without the trailing newline and prints it', async () => {
        const { context, runner, sink } = createTestContext();
        runner.respond('git rev-parse HEAD', { stdout: 'abc123\n' });

        const output = await context.shell.run('git', ['rev-parse', 'HEAD']);

        expect(output).toBe('abc123');
        expect(sink.outputs).toEqual(['abc123']);
    });

    test('does not print output when quiet', async () => {
        const { context, runner, sink } = createTestContext();
        runner.respond('git status --short', { stdout: ' M README.md\n' });

        const output = await context.shell.run('git', ['status', '--short'], { quiet: true });

        expect(output).toBe(' M README.md');
        expect(sink.outputs).toEqual([]);
    });

    test('passes input through to the process', async () => {
        const { context, runner } = createTestContext();

        await context.shell.run('ssh-add', ['-'], { input: 'test-key\n' });

        expect(runner.calls[0].input).toBe('test-key\n');
    });

    test('throws a ShellError on a non-zero exit', async () => {
        const { context, runner } = createTestContext();
        runner.respond('npm test', { exitCode: 2, stdout: 'FAIL src/a.test.ts\n', stderr: 'tests failed\n' });

        const error = await context.shell.run('npm', ['test']).catch((err: unknown) => err);

        expect(error).toBeInstanceOf(ShellError);
        expect(error).toMatchObject({
            message: 'Command failed with exit code 2: npm test\ntests failed',
            exitCode: 2,
            stdout: 'FAIL src/a.test.ts\n',
            stderr: 'tests failed\n',
        });
    });

    test('reports a process killed by a signal', async () => {
        const { context, runner } = createTestContext();
        runner.respond('npm test', { exitCode: null, signal: 'SIGTERM' });

        await expect(context.shell.run('npm', ['test'])).rejects.toThrow('Command was terminated by SIGTERM: npm test');
    });
});

describe('quoteArgument', () => {
    test('leaves plain arguments alone', () => {
        expect(quoteArgument('--depth=1')).toBe('--depth=1');
        expect(quoteArgument('HEAD:feature/x')).toBe('HEAD:feature/x');
    });

    test('quotes empty strings and whitespace', () => {
        expect(quoteArgument('')).toBe("''");
        expect(quoteArgument('Update files')).toBe("'Update files'");
    });
});
