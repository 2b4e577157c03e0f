// tests/services/timeNormalizer.test.ts
//
// src/main/services/timeNormalizer.ts
//
// npx jest tests/services/timeNormalizer.test.ts --runInBand --no-cache;
//
jest.mock('../../src/main/utils/logger', () => ({
    dbg: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    err: jest.fn(),
}));

import {warn} from '../../src/main/utils/logger';
import {
    addDuration,
    attachZone,
    fromUtcMs,
    localDateIso,
    normalize,
    resolveZone,
    toZone,
} from '../../src/main/services/timeNormalizer';
import {NaiveDateTime, ZonedDateTime} from '../../src/main/types/eventTypes';

const naive = (Y: number, M: number, D: number, h = 0, m = 0, sec = 0): NaiveDateTime =>
    ({kind: 'naive', wall: {Y, M, D, h, m, sec}});

describe('timeNormalizer.resolveZone', () => {
    test('returns a valid configured zone as-is', () => {
        expect(resolveZone('Europe/Berlin', () => 'Asia/Tokyo')).toBe('Europe/Berlin');
        expect(warn).not.toHaveBeenCalled();
    });

    test('falls back to the host zone when the name is unknown', () => {
        expect(resolveZone('Atlantis/Capital', () => 'Asia/Tokyo')).toBe('Asia/Tokyo');
        expect(warn).toHaveBeenCalledWith(
            'timeNormalizer',
            'Unknown time zone: "Atlantis/Capital"',
            '- falling back to host zone',
        );
    });

    test('falls back to UTC when host detection fails', () => {
        expect(resolveZone('Atlantis/Capital', () => {
            throw new Error('no Intl');
        })).toBe('UTC');
    });

    test('falls back to UTC when the host zone is unusable', () => {
        expect(resolveZone('', () => 'Also/Not_A_Zone')).toBe('UTC');
    });

    test('default host detection returns some usable zone', () => {
        expect(typeof resolveZone('Atlantis/Capital')).toBe('string');
    });
});

describe('timeNormalizer.normalize', () => {
    test('naive value keeps its wall clock exactly and gains the zone', () => {
        const t = naive(2024, 10, 21, 17, 0, 0);
        const out = normalize(t, 'Europe/Berlin');

        expect(out).toEqual({
            kind: 'zoned',
            wall: {Y: 2024, M: 10, D: 21, h: 17, m: 0, sec: 0},
            tz: 'Europe/Berlin',
            utcMs: Date.UTC(2024, 9, 21, 15, 0, 0),
        });
    });

    test('naive value inside a DST gap keeps its fields', () => {
        expect(normalize(naive(2024, 3, 31, 2, 30), 'Europe/Berlin')).toEqual({
            kind: 'zoned',
            wall: {Y: 2024, M: 3, D: 31, h: 2, m: 30, sec: 0},
            tz: 'Europe/Berlin',
            utcMs: Date.UTC(2024, 2, 31, 1, 30, 0), // pre-gap offset (+01:00)
        });
    });

    test('zone-aware value is converted keeping the instant', () => {
        const utc: ZonedDateTime = fromUtcMs(Date.UTC(2024, 9, 21, 22, 30, 0), 'UTC');
        const out = normalize(utc, 'Europe/Berlin');

        expect(out).toEqual({
            kind: 'zoned',
            wall: {Y: 2024, M: 10, D: 22, h: 0, m: 30, sec: 0},
            tz: 'Europe/Berlin',
            utcMs: Date.UTC(2024, 9, 21, 22, 30, 0),
        });
    });

    test('round trip between zones preserves the instant', () => {
        const start = attachZone({Y: 2024, M: 7, D: 1, h: 9, m: 45, sec: 10}, 'America/New_York');
        const there = toZone(start, 'Asia/Tokyo');
        const back = toZone(there, 'America/New_York');

        expect(there.wall).toEqual({Y: 2024, M: 7, D: 1, h: 22, m: 45, sec: 10});
        expect(back).toEqual(start);
    });

    test('conversion failure returns the input unchanged', () => {
        const t = naive(2024, 1, 1, 12);
        expect(normalize(t, 'Not/AZone')).toBe(t);

        const z = fromUtcMs(0, 'UTC');
        expect(normalize(z, 'Not/AZone')).toBe(z);
    });

    test('addDuration: days follow the calendar, hours are elapsed time', () => {
        const start = attachZone({Y: 2024, M: 10, D: 26, h: 10, m: 0, sec: 0}, 'Europe/Berlin');

        const nextDay = addDuration(start, {sign: 1, days: 1, timeMs: 0});
        expect(nextDay.wall).toEqual({Y: 2024, M: 10, D: 27, h: 10, m: 0, sec: 0});
        expect(nextDay.utcMs - start.utcMs).toBe(25 * 60 * 60 * 1000);

        // 24 elapsed hours land an hour earlier on the wall clock after the fall-back
        const dayOfHours = addDuration(start, {sign: 1, days: 0, timeMs: 24 * 60 * 60 * 1000});
        expect(dayOfHours.wall).toEqual({Y: 2024, M: 10, D: 27, h: 9, m: 0, sec: 0});

        const earlier = addDuration(start, {sign: -1, days: 0, timeMs: 30 * 60 * 1000});
        expect(earlier.wall).toEqual({Y: 2024, M: 10, D: 26, h: 9, m: 30, sec: 0});
        expect(earlier.tz).toBe('Europe/Berlin');
    });

    test('localDateIso formats the wall-clock date', () => {
        const z = fromUtcMs(Date.UTC(2024, 9, 20, 22, 0, 0), 'Europe/Berlin');
        expect(localDateIso(z)).toBe('2024-10-21');
    });
});
