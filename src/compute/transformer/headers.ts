import { RequestSnapshot } from './requestSnapshot.js';

/**
 * Folds multi-valued headers into single strings.
 * Repeated values are joined with comma in the order they were received.
 * Headers without any value are left out.
 * @example
 * foldHeaders({ 'x-tag': ['a', 'b', 'c'] }) => { 'x-tag': 'a,b,c' }
 */
export function foldHeaders(headers: RequestSnapshot['headers']): Record<string, string> {
    const folded: Record<string, string> = {};
    for (const [name, values] of Object.entries(headers)) {
        if (!values || values.length === 0) continue;
        folded[name] = values.join(',');
    }
    return folded;
}

/**
 * Returns the first value of the header with case-insensitive name match,
 * or empty string if the header is not present.
 */
export function getFirstHeaderValue(headers: RequestSnapshot['headers'], name: string): string {
    const lowerName = name.toLowerCase();
    for (const [key, values] of Object.entries(headers)) {
        if (key.toLowerCase() !== lowerName || !values || values.length === 0) continue;
        return values[0];
    }
    return '';
}
