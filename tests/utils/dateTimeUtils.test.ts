// tests/utils/dateTimeUtils.test.ts
// src/main/utils/dateTimeUtils.ts
//
// npx jest tests/utils/dateTimeUtils.test.ts --runInBand --no-cache;
//
import {
    parseIsoDuration,
    parseClockTime,
    compareClockTime,
    monthShortName,
    weekdayShortName,
} from '../../src/main/utils/dateTimeUtils';

describe('dateTimeUtils', () => {
    describe('parseIsoDuration', () => {
        test('time components are exact milliseconds', () => {
            expect(parseIsoDuration('PT1H30M')).toEqual({sign: 1, days: 0, timeMs: 90 * 60 * 1000});
            expect(parseIsoDuration('PT45S')).toEqual({sign: 1, days: 0, timeMs: 45 * 1000});
        });

        test('days and weeks are kept as calendar days', () => {
            expect(parseIsoDuration('P1D')).toEqual({sign: 1, days: 1, timeMs: 0});
            expect(parseIsoDuration('P1W2DT3H')).toEqual({sign: 1, days: 9, timeMs: 3 * 60 * 60 * 1000});
        });

        test('keeps the sign', () => {
            expect(parseIsoDuration('-PT15M')).toEqual({sign: -1, days: 0, timeMs: 15 * 60 * 1000});
        });

        test('rejects bare P/PT and garbage', () => {
            expect(parseIsoDuration('P')).toBeNull();
            expect(parseIsoDuration('PT')).toBeNull();
            expect(parseIsoDuration('1 hour')).toBeNull();
            expect(parseIsoDuration('')).toBeNull();
        });
    });

    describe('parseClockTime', () => {
        test('accepts H:MM and HH:MM', () => {
            expect(parseClockTime('8:05')).toEqual({h: 8, m: 5});
            expect(parseClockTime('16:30')).toEqual({h: 16, m: 30});
            expect(parseClockTime(' 00:00 ')).toEqual({h: 0, m: 0});
        });

        test('rejects out-of-range and malformed values', () => {
            expect(parseClockTime('24:00')).toBeNull();
            expect(parseClockTime('12:60')).toBeNull();
            expect(parseClockTime('1230')).toBeNull();
            expect(parseClockTime('12:5')).toBeNull();
        });
    });

    test('compareClockTime orders by minutes of day', () => {
        expect(compareClockTime({h: 16, m: 29}, {h: 16, m: 30})).toBeLessThan(0);
        expect(compareClockTime({h: 16, m: 30}, {h: 16, m: 30})).toBe(0);
        expect(compareClockTime({h: 17, m: 0}, {h: 16, m: 30})).toBeGreaterThan(0);
    });

    test('short names', () => {
        expect(monthShortName(10)).toBe('Oct');
        expect(monthShortName(13)).toBe('');
        expect(weekdayShortName(0)).toBe('Mon');
        expect(weekdayShortName(6)).toBe('Sun');
    });
});
