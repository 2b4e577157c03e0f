// src/main/utils/dateUtils.ts

export const DAY_MS = 24 * 60 * 60 * 1000;
const HOUR_MS = 60 * 60 * 1000;

export type YmdHms = { Y: number; M: number; D: number; h: number; m: number; sec: number };

const pad2 = (n: number) => String(n).padStart(2, '0');

function assertIntInRange(name: string, v: number, min: number, max: number): void {
    if (!Number.isInteger(v) || v < min || v > max) {
        throw new Error(`${name} out of range: ${v}`);
    }
}

export function isValidUtcDate(Y: number, M: number, D: number): boolean {
    const dt = new Date(Date.UTC(Y, M - 1, D));
    return dt.getUTCFullYear() === Y && dt.getUTCMonth() + 1 === M && dt.getUTCDate() === D;
}

export function makeYmdHms(Y: number, M: number, D: number, h: number, min: number, sec: number): YmdHms {
    assertIntInRange('year', Y, 1, 9999);
    assertIntInRange('month', M, 1, 12);
    assertIntInRange('day', D, 1, 31);
    assertIntInRange('hour', h, 0, 23);
    assertIntInRange('minute', min, 0, 59);
    assertIntInRange('second', sec, 0, 59);

    if (!isValidUtcDate(Y, M, D)) {
        throw new Error(`Invalid date: ${Y}-${pad2(M)}-${pad2(D)}`);
    }

    return {Y, M, D, h, m: min, sec};
}

// Calendar arithmetic on the wall clock; time of day is kept. Throws past year 9999.
export function addDaysToWall(w: YmdHms, days: number): YmdHms {
    const dt = new Date(Date.UTC(w.Y, w.M - 1, w.D + days));
    return makeYmdHms(dt.getUTCFullYear(), dt.getUTCMonth() + 1, dt.getUTCDate(), w.h, w.m, w.sec);
}

export function formatYmd(p: { Y: number; M: number; D: number }): string {
    return `${String(p.Y).padStart(4, '0')}-${pad2(p.M)}-${pad2(p.D)}`;
}

export function formatHm(p: { h: number; m: number }): string {
    return `${pad2(p.h)}:${pad2(p.m)}`;
}

export function weekdayMon0(Y: number, M: number, D: number): number {
    // Monday=0..Sunday=6
    const dowSun0 = new Date(Date.UTC(Y, M - 1, D)).getUTCDay(); // Sun=0
    return (dowSun0 + 6) % 7;
}

export function isValidTimeZone(tz: string): boolean {
    if (!tz.trim()) return false;
    try {
        new Intl.DateTimeFormat('en-CA', {timeZone: tz});
        return true;
    } catch {
        return false;
    }
}

export function getPartsInTz(msUtc: number, tz: string): { Y: number; M: number; D: number } {
    const mp = formatToNumberParts(getFmtYmdHms(tz), msUtc);
    return {Y: mp.year, M: mp.month, D: mp.day};
}

export function getPartsInTzHms(msUtc: number, tz: string): YmdHms {
    const mp = formatToNumberParts(getFmtYmdHms(tz), msUtc);
    return {Y: mp.year, M: mp.month, D: mp.day, h: mp.hour, m: mp.minute, sec: mp.second};
}

const fmtYmdHmsByTz = new Map<string, Intl.DateTimeFormat>();

function getFmtYmdHms(tz: string): Intl.DateTimeFormat {
    const cached = fmtYmdHmsByTz.get(tz);
    if (cached) return cached;
    const fmt = new Intl.DateTimeFormat('en-CA', {
        timeZone: tz,
        year: 'numeric',
        month: '2-digit',
        day: '2-digit',
        hour: '2-digit',
        minute: '2-digit',
        second: '2-digit',
        hourCycle: 'h23',
    });
    fmtYmdHmsByTz.set(tz, fmt);
    return fmt;
}

function formatToNumberParts(fmt: Intl.DateTimeFormat, msUtc: number): Record<string, number> {
    const parts = fmt.formatToParts(new Date(msUtc));
    const mp: Record<string, number> = {};
    for (const p of parts) {
        if (p.type !== 'literal') mp[p.type] = Number(p.value);
    }
    return mp;
}

export type ZonedToUtcOptions = {
    /**
     * When the local wall-clock time is ambiguous (DST "fall back"), select which instant to use.
     * Default: 'earlier'
     */
    prefer?: 'earlier' | 'later';
    /**
     * When the local wall-clock time does not exist (DST "spring forward"):
     * 'throw' (default) or 'shift', which keeps the offset in effect before the gap.
     */
    gap?: 'throw' | 'shift';
};

/**
 * Convert "local datetime in tz" -> UTC ms.
 *
 * Notes:
 * - If the local time does not exist (DST "spring forward" gap), this function throws
 *   unless `gap: 'shift'` is given.
 * - If the local time is ambiguous (DST "fall back"), it picks the 'earlier' instant by default.
 * - An unknown tz throws a RangeError.
 */
export function zonedTimeToUtcMs(wall: YmdHms, tz: string, opts: ZonedToUtcOptions = {}): number {
    const prefer = opts.prefer ?? 'earlier';
    const fmt = getFmtYmdHms(tz);

    const wantAsUtc = Date.UTC(wall.Y, wall.M - 1, wall.D, wall.h, wall.m, wall.sec);

    const getOffsetMsAtUtc = (utcMs: number): number => {
        const mp = formatToNumberParts(fmt, utcMs);
        return Date.UTC(mp.year, mp.month - 1, mp.day, mp.hour, mp.minute, mp.second) - utcMs;
    };

    const matchesLocal = (utcMs: number): boolean => {
        const mp = formatToNumberParts(fmt, utcMs);
        return (
            mp.year === wall.Y &&
            mp.month === wall.M &&
            mp.day === wall.D &&
            mp.hour === wall.h &&
            mp.minute === wall.m &&
            mp.second === wall.sec
        );
    };

    // Two-pass (usually enough).
    const off1 = getOffsetMsAtUtc(wantAsUtc);
    const utc1 = wantAsUtc - off1;
    const off2 = getOffsetMsAtUtc(utc1);
    const utc2 = wantAsUtc - off2;

    if (matchesLocal(utc2)) {
        // DST "fall back": several instants may share this wall-clock time.
        const candidates = new Set<number>([utc2]);
        for (const d of [-2 * HOUR_MS, -HOUR_MS, HOUR_MS, 2 * HOUR_MS]) {
            const u = utc2 + d;
            if (matchesLocal(u)) candidates.add(u);
        }

        if (candidates.size === 1) return utc2;

        const arr = Array.from(candidates).sort((a, b) => a - b);
        return prefer === 'earlier' ? arr[0] : arr[arr.length - 1];
    }

    if (opts.gap === 'shift') {
        // A day earlier is always before the gap.
        return wantAsUtc - getOffsetMsAtUtc(wantAsUtc - DAY_MS);
    }

    throw new Error(
        `Non-existent local time in ${tz}: ${formatYmd(wall)} ${formatHm(wall)}:${pad2(wall.sec)}`,
    );
}
