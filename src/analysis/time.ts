const TIMESTAMP_PATTERN = /^(\d{4})(\d{2})(\d{2})(\d{2})(\d{2})(\d{2})$/;

export const MS_PER_HOUR = 60 * 60 * 1000;

/**
 * Parse a `YYYYMMDDHHMMSS` timestamp into epoch milliseconds.
 *
 * Edge timestamps carry no zone; they are read as UTC so bucket arithmetic
 * never depends on the host's zone. Returns null for malformed or
 * out-of-calendar values such as `20240230120000`.
 */
export function parseTimestamp(timestamp: string): number | null {
    const match = TIMESTAMP_PATTERN.exec(timestamp);
    if (!match) {
        return null;
    }

    const [year, month, day, hour, minute, second] = match.slice(1).map(Number);
    const epoch = Date.UTC(year, month - 1, day, hour, minute, second);
    const date = new Date(epoch);

    const roundTrips =
        date.getUTCFullYear() === year &&
        date.getUTCMonth() === month - 1 &&
        date.getUTCDate() === day &&
        date.getUTCHours() === hour &&
        date.getUTCMinutes() === minute &&
        date.getUTCSeconds() === second;

    return roundTrips ? epoch : null;
}

/**
 * Hour bucket (`YYYYMMDDHH`) of a validated timestamp
 */
export function hourBucket(timestamp: string): string {
    return timestamp.slice(0, 10);
}
