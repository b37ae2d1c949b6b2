import { describe, expect, it } from 'vitest';
import { extractCount, formatDuration, formatTimestamp, normalizeSiteDate, parseRatio } from '../../format.js';

// 2024-05-01 12:00:00 KST
const NOW = Date.UTC(2024, 4, 1, 3, 0, 0);

describe('formatTimestamp', () => {
    it('renders Korea Standard Time wall-clock', () => {
        expect(formatTimestamp(Date.UTC(2024, 0, 1, 15, 30, 5))).toBe('2024-01-02 00:30:05');
        expect(formatTimestamp(new Date(NOW))).toBe('2024-05-01 12:00:00');
    });
});

describe('normalizeSiteDate', () => {
    it('converts ISO timestamps with an offset to KST', () => {
        expect(normalizeSiteDate('2024-05-01T15:20:11+0900', NOW)).toBe('2024-05-01 15:20:11');
        expect(normalizeSiteDate('2024-05-01T06:20:11Z', NOW)).toBe('2024-05-01 15:20:11');
        expect(normalizeSiteDate('2024-04-30T23:00:00-01:00', NOW)).toBe('2024-05-01 09:00:00');
    });

    it('accepts the portal renderings', () => {
        expect(normalizeSiteDate('2024-05-01 15:20', NOW)).toBe('2024-05-01 15:20:00');
        expect(normalizeSiteDate('2024.05.01. 오후 3:20', NOW)).toBe('2024-05-01 15:20:00');
        expect(normalizeSiteDate('2024.05.01. 오전 12:05', NOW)).toBe('2024-05-01 00:05:00');
        expect(normalizeSiteDate('2024.05.01. 09:07:30', NOW)).toBe('2024-05-01 09:07:30');
        expect(normalizeSiteDate('2024.05.01.', NOW)).toBe('2024-05-01 00:00:00');
    });

    it('resolves relative times against now', () => {
        expect(normalizeSiteDate('방금 전', NOW)).toBe('2024-05-01 12:00:00');
        expect(normalizeSiteDate('5분 전', NOW)).toBe('2024-05-01 11:55:00');
        expect(normalizeSiteDate('3시간 전', NOW)).toBe('2024-05-01 09:00:00');
        expect(normalizeSiteDate('1일 전', NOW)).toBe('2024-04-30 12:00:00');
    });

    it('rejects days past the end of the month', () => {
        expect(normalizeSiteDate('2024-02-31 10:00', NOW)).toBeUndefined();
        expect(normalizeSiteDate('2024.04.31.', NOW)).toBeUndefined();
        expect(normalizeSiteDate('2023-02-29T10:00:00+09:00', NOW)).toBeUndefined();
        expect(normalizeSiteDate('2024-02-29 10:00', NOW)).toBe('2024-02-29 10:00:00');
    });

    it('returns undefined for anything else', () => {
        expect(normalizeSiteDate('2024-13-01 00:00', NOW)).toBeUndefined();
        expect(normalizeSiteDate('yesterday', NOW)).toBeUndefined();
        expect(normalizeSiteDate('   ', NOW)).toBeUndefined();
        expect(normalizeSiteDate(undefined, NOW)).toBeUndefined();
    });
});

describe('formatDuration', () => {
    it('renders HH:MM:SS and clamps negatives', () => {
        expect(formatDuration(3_723_000)).toBe('01:02:03');
        expect(formatDuration(-5)).toBe('00:00:00');
    });
});

describe('extractCount', () => {
    it('reads thousands separators and the 만 unit', () => {
        expect(extractCount('공감 1,234')).toBe(1234);
        expect(extractCount('1.2만')).toBe(12000);
        expect(extractCount('0')).toBe(0);
    });

    it('returns undefined without digits', () => {
        expect(extractCount('')).toBeUndefined();
        expect(extractCount('없음')).toBeUndefined();
    });
});

describe('parseRatio', () => {
    it('takes the first number within [0, 100]', () => {
        expect(parseRatio('45.5%')).toBe(45.5);
        expect(parseRatio('0%')).toBe(0);
        expect(parseRatio('100')).toBe(100);
    });

    it('rejects values outside the range or without digits', () => {
        expect(parseRatio('120%')).toBeUndefined();
        expect(parseRatio('-')).toBeUndefined();
    });
});
