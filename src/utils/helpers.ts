import { DateRange } from '../types';

const MS_PER_HOUR = 60 * 60 * 1000;

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const TIME_PATTERN = /^(\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?$/;

/**
 * YYYY-MM-DD naming a day that exists. `Date.parse` rolls 2024-02-31 over
 * into March, so the parsed day must round-trip.
 */
export const isCalendarDate = (date: string): boolean => {
    if (!DATE_PATTERN.test(date)) return false;
    const parsed = Date.parse(`${date}T00:00:00Z`);
    return !Number.isNaN(parsed) && new Date(parsed).toISOString().slice(0, 10) === date;
};

/**
 * HH:MM[:SS[.fff]] within 00:00:00 to 23:59:59.
 */
export const isClockTime = (time: string): boolean => {
    const match = TIME_PATTERN.exec(time);
    if (!match) return false;
    const [, hours, minutes, seconds = '0'] = match;
    return Number(hours) <= 23 && Number(minutes) <= 59 && Number(seconds) <= 59;
};

/**
 * Epoch milliseconds for a date + time pair, read as UTC.
 * Returns NaN unless both name a real day and clock time.
 */
export const toEpochMs = (date: string, time: string): number => {
    if (!isCalendarDate(date) || !isClockTime(time)) return NaN;
    const normalizedTime = /^\d{2}:\d{2}$/.test(time) ? `${time}:00` : time;
    return Date.parse(`${date}T${normalizedTime}Z`);
};

export const hoursBetween = (fromMs: number, toMs: number): number => (toMs - fromMs) / MS_PER_HOUR;

/**
 * Inclusive on both ends; a missing bound is open.
 */
export const isWithinRange = (date: string, range: DateRange): boolean => {
    if (range.start_date && date < range.start_date) return false;
    if (range.end_date && date > range.end_date) return false;
    return true;
};

/**
 * Split an array into contiguous chunks of at most `size` items.
 */
export function chunk<T>(items: readonly T[], size: number): T[][] {
    if (!Number.isInteger(size) || size <= 0) {
        throw new RangeError(`Chunk size must be a positive integer, got ${size}`);
    }
    const chunks: T[][] = [];
    for (let i = 0; i < items.length; i += size) {
        chunks.push(items.slice(i, i + size));
    }
    return chunks;
}

/**
 * Streaming variant of `chunk` for sync or async sources.
 */
export async function* partition<T>(
    source: Iterable<T> | AsyncIterable<T>,
    size: number
): AsyncGenerator<T[]> {
    if (!Number.isInteger(size) || size <= 0) {
        throw new RangeError(`Partition size must be a positive integer, got ${size}`);
    }
    let current: T[] = [];
    for await (const item of source) {
        current.push(item);
        if (current.length === size) {
            yield current;
            current = [];
        }
    }
    if (current.length > 0) {
        yield current;
    }
}

export const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));
