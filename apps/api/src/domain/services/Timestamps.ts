import { format, parseISO } from 'date-fns';

const TIMESTAMP_FORMAT = "yyyy-MM-dd'T'HH:mm:ss.SSSXXX";

// Date-time part followed by a UTC designator or a numeric offset.
const WITH_OFFSET = /^(.+T\d{2}:\d{2}(?::\d{2}(?:[.,]\d+)?)?)(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;

/**
 * Reads an ISO-8601 timestamp as local wall-clock time. A trailing offset is
 * dropped rather than applied, so the calendar date as written decides the period.
 * Unparseable input yields an Invalid Date.
 */
export function parseTimestamp(value: string): Date {
    const trimmed = value.trim();
    const match = WITH_OFFSET.exec(trimmed);
    return parseISO(match ? match[1] : trimmed);
}

/** Local wall-clock time with milliseconds and the local offset. */
export function formatTimestamp(timestamp: Date): string {
    return format(timestamp, TIMESTAMP_FORMAT);
}
