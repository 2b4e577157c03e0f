// src/main/utils/dateTimeUtils.ts

const MS_PER_SECOND = 1_000;
const MS_PER_MINUTE = 60 * MS_PER_SECOND;
const MS_PER_HOUR = 60 * MS_PER_MINUTE;

const MONTH_SHORT = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];
const WEEKDAY_SHORT_MON0 = ['Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat', 'Sun'];

export type ClockTime = { h: number; m: number };

// Days and weeks are nominal (calendar days); the time part is exact elapsed time.
export type IsoDuration = { sign: 1 | -1; days: number; timeMs: number };

export function parseIsoDuration(s: string): IsoDuration | null {
    const t = s.trim().toUpperCase();
    if (!t) return null;

    const sign = t.startsWith('-') ? -1 : 1;
    const core = t.startsWith('-') || t.startsWith('+') ? t.slice(1) : t;
    // Supported subset: PnWnDTnHnMnS (no months/years)
    const m = core.match(
        /^P(?:(\d+)W)?(?:(\d+)D)?(?:T(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)S)?)?$/
    );
    if (!m) return null;
    const parts = m.slice(1);
    // Reject bare "P" / "PT" (no components)
    if (parts.every(v => v == null)) return null;

    const w = m[1] ? Number(m[1]) : 0;
    const d = m[2] ? Number(m[2]) : 0;
    const h = m[3] ? Number(m[3]) : 0;
    const mi = m[4] ? Number(m[4]) : 0;
    const se = m[5] ? Number(m[5]) : 0;

    if (![w, d, h, mi, se].every(n => Number.isFinite(n))) return null;

    return {
        sign,
        days: w * 7 + d,
        timeMs: h * MS_PER_HOUR + mi * MS_PER_MINUTE + se * MS_PER_SECOND,
    };
}

/**
 * Parse a 24-hour "H:MM" / "HH:MM" clock reading.
 * Returns null when the text is not a clock time or is out of range.
 */
export function parseClockTime(s: string): ClockTime | null {
    const m = s.trim().match(/^(\d{1,2}):(\d{2})$/);
    if (!m) return null;
    const h = Number(m[1]);
    const mi = Number(m[2]);
    if (h > 23 || mi > 59) return null;
    return {h, m: mi};
}

export function compareClockTime(a: ClockTime, b: ClockTime): number {
    return a.h * 60 + a.m - (b.h * 60 + b.m);
}

export function monthShortName(month1: number): string {
    return MONTH_SHORT[month1 - 1] ?? '';
}

export function weekdayShortName(mon0: number): string {
    return WEEKDAY_SHORT_MON0[mon0] ?? '';
}
