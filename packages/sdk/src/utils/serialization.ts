import superjson from 'superjson';

const DEFAULT_SUMMARY_LENGTH = 500;

/** One-line rendering of a step output for debug logs. */
export function summarize(value: unknown, maxLength: number = DEFAULT_SUMMARY_LENGTH): string {
    if (value === undefined) return '';

    let text: string;
    try {
        text = superjson.stringify(value);
    } catch (err) {
        return `<unserializable: ${err instanceof Error ? err.message : String(err)}>`;
    }
    return text.length > maxLength ? `${text.slice(0, maxLength)}… (${text.length} chars)` : text;
}
