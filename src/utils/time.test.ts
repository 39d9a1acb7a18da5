import { daysBetween, formatLocalTimestamp, formatTransactionId, parseNaiveTimestamp } from './time';

describe('time helpers', () => {
    it('formats transaction ids to the second', () => {
        expect(formatTransactionId(new Date(2026, 0, 5, 7, 8, 9, 450))).toBe('TXN_20260105_070809');
    });

    it('formats local timestamps without an offset', () => {
        expect(formatLocalTimestamp(new Date(2026, 10, 3, 23, 4, 5, 6))).toBe('2026-11-03T23:04:05.006');
    });

    it('parses naive timestamps as local time', () => {
        expect(parseNaiveTimestamp('2026-03-02T10:20:30').getTime())
            .toBe(new Date(2026, 2, 2, 10, 20, 30).getTime());
    });

    it('drops a +00:00 offset', () => {
        expect(parseNaiveTimestamp('2026-03-02T10:20:30+00:00').getTime())
            .toBe(new Date(2026, 2, 2, 10, 20, 30).getTime());
    });

    it('rejects a non-UTC offset after a space separator', () => {
        expect(() => parseNaiveTimestamp('2026-06-09 12:00:00+02:00'))
            .toThrow('Unsupported timezone offset in timestamp: 2026-06-09 12:00:00+02:00');
    });

    it('parses a space separated naive timestamp as local time', () => {
        expect(parseNaiveTimestamp('2026-06-09 12:00:00').getTime())
            .toBe(new Date(2026, 5, 9, 12, 0, 0).getTime());
    });

    it('rejects unparseable values', () => {
        expect(() => parseNaiveTimestamp('yesterday')).toThrow('Invalid timestamp: yesterday');
    });

    it('floors partial days, including negative spans', () => {
        const base = new Date(2026, 6, 1, 12, 0, 0);

        expect(daysBetween(new Date(2026, 6, 1, 0, 0, 0), base)).toBe(0);
        expect(daysBetween(new Date(2026, 5, 29, 11, 0, 0), base)).toBe(2);
        expect(daysBetween(new Date(2026, 6, 1, 13, 0, 0), base)).toBe(-1);
    });

    it('counts wall-clock days across a daylight saving change', () => {
        expect(daysBetween(new Date(2026, 2, 1, 12, 0, 0), new Date(2026, 2, 15, 12, 0, 0))).toBe(14);
        expect(daysBetween(new Date(2026, 9, 20, 12, 0, 0), new Date(2026, 10, 3, 12, 0, 0))).toBe(14);
    });
});
