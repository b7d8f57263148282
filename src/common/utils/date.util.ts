import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';

dayjs.extend(utc);

// Largest |ms| a JS Date can hold (±100,000,000 days around the epoch).
const MAX_DATE_MS = 8.64e15;

/**
 * Converts exchange epoch milliseconds to a Date.
 * Returns undefined unless the value is an integer inside the Date range.
 */
export function fromEpochMillis(value: unknown): Date | undefined {
  if (typeof value !== 'number' || !Number.isSafeInteger(value)) {
    return undefined;
  }
  if (Math.abs(value) > MAX_DATE_MS) {
    return undefined;
  }
  return new Date(value);
}

/** UTC calendar day key, e.g. 2024-03-01 */
export function toDateKey(timestamp: Date): string {
  return dayjs.utc(timestamp).format('YYYY-MM-DD');
}
