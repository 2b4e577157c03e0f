// src/main/parsers/shiftTextParser.ts
//
// Free-text shift lists: "17:00-20:15 21.10" -> one event on 21 Oct, 17:00 to 20:15.

import {BatchResult, CalendarEvent} from '../types/eventTypes';
import {ClockTime, compareClockTime, parseClockTime} from '../utils/dateTimeUtils';
import {getPartsInTz, makeYmdHms, YmdHms} from '../utils/dateUtils';
import {describeError, MalformedRecordError} from '../utils/errors';
import {dbg, warn} from '../utils/logger';
import {attachZone} from '../services/timeNormalizer';

export const DEFAULT_CUTOFF: ClockTime = {h: 16, m: 30};
export const DEFAULT_EARLY_TITLE = 'X1';
export const DEFAULT_LATE_TITLE = 'X2';

// start-end, optional whitespace, day.month
const SHIFT_RE = /(\d{1,2}:\d{2})-(\d{1,2}:\d{2})\s*(\d{1,2}\.\d{1,2})/g;

export type ShiftExtractOptions = {
    zone: string;
    referenceYear?: number;   // default: current year in `zone`
    cutoff?: ClockTime;       // start strictly before cutoff -> early title
    earlyTitle?: string;
    lateTitle?: string;
    now?: number;             // only used to derive the default reference year
};

function clockOnDate(clock: string, day: number, month: number, year: number): YmdHms {
    const t = parseClockTime(clock);
    if (!t) throw new MalformedRecordError(`invalid time "${clock}"`);
    try {
        return makeYmdHms(year, month, day, t.h, t.m, 0);
    } catch (e) {
        throw new MalformedRecordError(describeError(e));
    }
}

export function classifyShift(start: ClockTime, cutoff: ClockTime, earlyTitle: string, lateTitle: string): string {
    return compareClockTime(start, cutoff) < 0 ? earlyTitle : lateTitle;
}

/**
 * Scan `text` for "H:MM-H:MM D.M" patterns and build one event per match, in scan order.
 * Matches that don't form a real date/time are skipped and listed in the report.
 */
export function extractShiftEvents(text: string, opts: ShiftExtractOptions): BatchResult {
    const zone = opts.zone;
    const year = opts.referenceYear ?? getPartsInTz(opts.now ?? Date.now(), zone).Y;
    const cutoff = opts.cutoff ?? DEFAULT_CUTOFF;
    const earlyTitle = opts.earlyTitle ?? DEFAULT_EARLY_TITLE;
    const lateTitle = opts.lateTitle ?? DEFAULT_LATE_TITLE;

    const events: CalendarEvent[] = [];
    const skipReasons: string[] = [];

    for (const m of text.matchAll(SHIFT_RE)) {
        const [whole, startStr, endStr, dateStr] = m;
        const [dayStr, monthStr] = dateStr.split('.');
        const day = Number(dayStr);
        const month = Number(monthStr);

        try {
            const startWall = clockOnDate(startStr, day, month, year);
            const endWall = clockOnDate(endStr, day, month, year);
            const title = classifyShift(startWall, cutoff, earlyTitle, lateTitle);
            events.push({
                title,
                begin: attachZone(startWall, zone),
                end: attachZone(endWall, zone),
            });
        } catch (e) {
            if (!(e instanceof MalformedRecordError)) throw e;
            skipReasons.push(`"${whole}": ${e.message}`);
        }
    }

    if (skipReasons.length) warn('shiftText', `skipped ${skipReasons.length} invalid pattern(s):`, skipReasons);
    dbg('shiftText', `${events.length} event(s) extracted for ${year}`);

    return {
        events,
        report: {succeeded: events.length, skipped: skipReasons.length, skipReasons},
    };
}
