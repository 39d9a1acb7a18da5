export const MS_PER_DAY = 24 * 60 * 60 * 1000;

const pad = (value: number, width: number = 2): string => String(value).padStart(width, '0');

/** Local wall-clock time without an offset, e.g. `2026-06-01T09:30:00.000`. */
export const formatLocalTimestamp = (date: Date): string => {
    const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
    const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}.${pad(date.getMilliseconds(), 3)}`;
    return `${day}T${time}`;
};

/** `TXN_YYYYMMDD_HHMMSS` in local time. */
export const formatTransactionId = (date: Date): string => {
    const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
    const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
    return `TXN_${day}_${time}`;
};

/**
 * Parses an ISO-8601 timestamp as naive local time. A UTC designator
 * (`Z` or `+00:00`) is dropped rather than honoured; any other offset is
 * rejected.
 */
export const parseNaiveTimestamp = (value: string): Date => {
    let naive = value.replace(/Z/g, '+00:00').replace(/\+00:00/g, '');

    if (/^\d{4}-\d{2}-\d{2}$/.test(naive)) {
        naive = `${naive}T00:00:00`;
    }

    const timePart = naive.split(/[T ]/)[1] ?? '';
    if (/[+-]/.test(timePart)) {
        throw new Error(`Unsupported timezone offset in timestamp: ${value}`);
    }

    const parsed = new Date(naive);
    if (Number.isNaN(parsed.getTime())) {
        throw new Error(`Invalid timestamp: ${value}`);
    }

    return parsed;
};

// local wall-clock fields read as UTC, so DST shifts drop out of the difference
const wallClock = (date: Date): number => Date.UTC(
    date.getFullYear(), date.getMonth(), date.getDate(),
    date.getHours(), date.getMinutes(), date.getSeconds(), date.getMilliseconds()
);

/** Whole days from `from` to `to` on the local wall clock, floored. */
export const daysBetween = (from: Date, to: Date): number =>
    Math.floor((wallClock(to) - wallClock(from)) / MS_PER_DAY);
