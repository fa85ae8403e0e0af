import { Environment, InternalWorkflowError, isLogLevel, loadConfig, Logger, MemoryLogSink } from '../src';

describe('Logger', () => {
    test('drops messages below the minimum level', () => {
        const sink = new MemoryLogSink();
        const logger = new Logger({ sink, level: 'warn' });

        logger.debug('resolving workspace');
        logger.info('Step: build');
        logger.warn('cache miss');
        logger.error('build failed');

        expect(sink.entries.map((entry) => entry.level)).toEqual(['warn', 'error']);
    });

    test('prefixes lines with the tag', () => {
        const sink = new MemoryLogSink();
        const logger = new Logger({ sink, tag: '[ci]' });

        logger.info('Workflow: Release');

        expect(sink.entries).toEqual([{ level: 'info', message: 'Workflow: Release', line: '[ci] Workflow: Release' }]);
    });

    test('adds ISO timestamps when enabled', () => {
        const sink = new MemoryLogSink();
        const logger = new Logger({ sink, timestamps: true });

        logger.info('Step: test');

        expect(sink.entries[0].line).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z \[pipewright\] Step: test$/);
    });

    test('prints command output unless silent', () => {
        const sink = new MemoryLogSink();
        const logger = new Logger({ sink, level: 'error' });

        logger.output('v20.11.0');
        logger.level = 'silent';
        logger.output('hidden');

        expect(sink.outputs).toEqual(['v20.11.0']);
    });

    test('recognises level names', () => {
        expect(isLogLevel('debug')).toBe(true);
        expect(isLogLevel('trace')).toBe(false);
    });
});

describe('loadConfig', () => {
    test('defaults to no override and no timestamps', () => {
        expect(loadConfig(new Environment({}))).toEqual({ logLevel: undefined, timestamps: false });
    });

    test('reads the level override case-insensitively', () => {
        expect(loadConfig(new Environment({ PIPEWRIGHT_LOG_LEVEL: ' Warn ' })).logLevel).toBe('warn');
    });

    test('reads the timestamp switch', () => {
        expect(loadConfig(new Environment({ PIPEWRIGHT_LOG_TIMESTAMPS: '1' })).timestamps).toBe(true);
        expect(loadConfig(new Environment({ PIPEWRIGHT_LOG_TIMESTAMPS: 'yes' })).timestamps).toBe(false);
    });

    test('rejects unknown levels', () => {
        expect(() => loadConfig(new Environment({ PIPEWRIGHT_LOG_LEVEL: 'verbose' }))).toThrow(InternalWorkflowError);
        expect(() => loadConfig(new Environment({ PIPEWRIGHT_LOG_LEVEL: 'verbose' }))).toThrow(
            'Internal Workflow Error: Invalid PIPEWRIGHT_LOG_LEVEL "verbose" (expected one of debug, info, warn, error, silent)',
        );
    });
});
