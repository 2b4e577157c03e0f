// src/main/services/timeNormalizer.ts

import {Timestamp, ZonedDateTime} from '../types/eventTypes';
import {IsoDuration} from '../utils/dateTimeUtils';
import {addDaysToWall, formatYmd, getPartsInTzHms, isValidTimeZone, YmdHms, zonedTimeToUtcMs} from '../utils/dateUtils';
import {describeError, ZoneResolutionError} from '../utils/errors';
import {dbg, warn} from '../utils/logger';

const FALLBACK_ZONE = 'UTC';

export function detectHostZone(): string {
    return Intl.DateTimeFormat().resolvedOptions().timeZone;
}

/**
 * Named zone -> host zone -> UTC. Never throws.
 */
export function resolveZone(name: string, hostZone: () => string = detectHostZone): string {
    if (isValidTimeZone(name)) return name;

    warn('timeNormalizer', new ZoneResolutionError(name).message, '- falling back to host zone');
    try {
        const host = hostZone();
        if (host && isValidTimeZone(host)) return host;
        warn('timeNormalizer', `host zone "${host}" is unusable - falling back to ${FALLBACK_ZONE}`);
    } catch (e) {
        warn('timeNormalizer', `host zone detection failed (${describeError(e)}) - falling back to ${FALLBACK_ZONE}`);
    }
    return FALLBACK_ZONE;
}

// Wall clock read as local to `zone`. Gap times keep their fields; the instant uses the pre-gap offset.
export function attachZone(wall: YmdHms, zone: string): ZonedDateTime {
    const utcMs = zonedTimeToUtcMs(wall, zone, {gap: 'shift'});
    return {kind: 'zoned', wall: {...wall}, tz: zone, utcMs};
}

export function fromUtcMs(utcMs: number, zone: string): ZonedDateTime {
    return {kind: 'zoned', wall: getPartsInTzHms(utcMs, zone), tz: zone, utcMs};
}

// Same instant, seen from `zone`. Throws on an unknown zone.
export function toZone(zdt: ZonedDateTime, zone: string): ZonedDateTime {
    if (zdt.tz === zone) return zdt;
    return fromUtcMs(zdt.utcMs, zone);
}

// Naive -> zone attached, no shift. Zoned -> converted, instant kept. Failure -> ts unchanged.
export function normalize(ts: Timestamp, zone: string): Timestamp {
    try {
        return ts.kind === 'naive' ? attachZone(ts.wall, zone) : toZone(ts, zone);
    } catch (e) {
        dbg('timeNormalizer', `normalize to ${zone} failed, keeping value as-is:`, describeError(e));
        return ts;
    }
}

// Days move the wall clock (so P1D across a DST change keeps the hour); the time part is added as elapsed time.
export function addDuration(zdt: ZonedDateTime, dur: IsoDuration): ZonedDateTime {
    const base = dur.days ? attachZone(addDaysToWall(zdt.wall, dur.sign * dur.days), zdt.tz) : zdt;
    return dur.timeMs ? fromUtcMs(base.utcMs + dur.sign * dur.timeMs, zdt.tz) : base;
}

export function localDateIso(zdt: ZonedDateTime): string {
    return formatYmd(zdt.wall);
}
