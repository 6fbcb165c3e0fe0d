export interface Timestamp {
    /** RFC 3339 in UTC with second precision, e.g. 2024-01-02T03:04:05Z */
    time: string;
    /** Milliseconds since the Unix epoch */
    timeEpoch: number;
}

/**
 * Formats the one captured instant in both forms used by the event envelope.
 * @example
 * captureTimestamp(new Date(Date.UTC(2024, 0, 2, 3, 4, 5, 678))) => { time: '2024-01-02T03:04:05Z', timeEpoch: 1704164645678 }
 */
export function captureTimestamp(now: Date = new Date()): Timestamp {
    return {
        time: now.toISOString().replace(/\.\d+Z$/, 'Z'),
        timeEpoch: now.getTime(),
    };
}
