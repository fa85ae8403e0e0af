import superjson from 'superjson';
import { summarize } from '../src/utils/serialization';

describe('summarize', () => {
    test('renders primitives and plain objects as superjson', () => {
        expect(summarize(123)).toBe('{"json":123}');
        expect(summarize({ files: ['a.ts'] })).toBe('{"json":{"files":["a.ts"]}}');
        expect(summarize(undefined)).toBe('');
    });

    test('keeps rich types readable by superjson', () => {
        const date = new Date('2024-03-01T12:00:00.000Z');
        const map = new Map([['a', 1]]);

        const output = superjson.parse<{ date: Date; map: Map<string, number> }>(summarize({ date, map }, Infinity));

        expect(output.date).toBeInstanceOf(Date);
        expect(output.date.toISOString()).toBe('2024-03-01T12:00:00.000Z');
        expect(output.map.get('a')).toBe(1);
    });

    test('returns short values as is', () => {
        expect(summarize('built')).toBe('{"json":"built"}');
    });

    test('truncates long values and reports the full length', () => {
        expect(summarize('x'.repeat(600), 20)).toBe('{"json":"xxxxxxxxxxx… (611 chars)');
    });

    test('truncates outputs larger than a megabyte', () => {
        const summary = summarize('a'.repeat(1024 * 1024 + 1));

        expect(summary).toBe(`{"json":"${'a'.repeat(491)}… (1048588 chars)`);
    });
});
