// src/main/services/icsLoadService.ts

import * as fs from 'fs';

import {parseIcs, parseIcsDateTime} from '../parsers/icsParser';
import {BatchResult, CalendarEvent, ZonedDateTime} from '../types/eventTypes';
import {IcsRecord} from '../types/icsTypes';
import {parseIsoDuration} from '../utils/dateTimeUtils';
import {describeError, MalformedRecordError, NotFoundError, SourceReadError} from '../utils/errors';
import {dbg, info, warn} from '../utils/logger';
import {addDuration, normalize} from './timeNormalizer';

export const UNTITLED = 'Untitled';

export type IcsLoadOptions = {
    zone: string;
};

export type RecordOutcome =
    | { ok: true; event: CalendarEvent }
    | { ok: false; reason: string };

export function readSource(path: string): string {
    if (!fs.existsSync(path)) throw new NotFoundError(path);
    try {
        return fs.readFileSync(path, 'utf8');
    } catch (e) {
        throw new SourceReadError(path, e);
    }
}

function toZoned(rec: IcsRecord, field: 'start' | 'end', zone: string): ZonedDateTime {
    const dv = rec[field];
    if (!dv) throw new MalformedRecordError(`missing ${field === 'start' ? 'DTSTART' : 'DTEND'}`);
    const ts = normalize(parseIcsDateTime(dv), zone);
    if (ts.kind !== 'zoned') throw new MalformedRecordError(`could not place "${dv.value}" in ${zone}`);
    return ts;
}

function resolveEnd(rec: IcsRecord, begin: ZonedDateTime, zone: string, title: string): ZonedDateTime | undefined {
    if (rec.end) {
        try {
            return toZoned(rec, 'end', zone);
        } catch (e) {
            dbg('icsLoad', `"${title}": dropping end (${describeError(e)})`);
            return undefined;
        }
    }
    if (!rec.duration) return undefined;

    const dur = parseIsoDuration(rec.duration);
    if (!dur) {
        dbg('icsLoad', `"${title}": ignoring DURATION "${rec.duration}"`);
        return undefined;
    }
    try {
        return addDuration(begin, dur);
    } catch (e) {
        dbg('icsLoad', `"${title}": dropping end from DURATION "${rec.duration}" (${describeError(e)})`);
        return undefined;
    }
}

export function recordToEvent(rec: IcsRecord, zone: string): RecordOutcome {
    const title = rec.title?.trim() ? rec.title : UNTITLED;

    let begin: ZonedDateTime;
    try {
        begin = toZoned(rec, 'start', zone);
    } catch (e) {
        return {ok: false, reason: `"${title}": ${describeError(e)}`};
    }

    const end = resolveEnd(rec, begin, zone, title);
    const event: CalendarEvent = end ? {title, begin, end} : {title, begin};
    return {ok: true, event};
}

// Stable: equal begins keep file order.
export function sortByBegin(events: CalendarEvent[]): CalendarEvent[] {
    return events
        .map((e, i) => ({e, i}))
        .sort((a, b) => (a.e.begin.utcMs - b.e.begin.utcMs) || (a.i - b.i))
        .map(x => x.e);
}

export function eventsFromIcsText(text: string, opts: IcsLoadOptions): BatchResult {
    const records = parseIcs(text);
    const events: CalendarEvent[] = [];
    const skipReasons: string[] = [];

    for (const rec of records) {
        const res = recordToEvent(rec, opts.zone);
        if (res.ok) events.push(res.event);
        else skipReasons.push(res.reason);
    }

    if (skipReasons.length) warn('icsLoad', `skipped ${skipReasons.length} event(s):`, skipReasons);

    return {
        events: sortByBegin(events),
        report: {succeeded: events.length, skipped: skipReasons.length, skipReasons},
    };
}

/**
 * Load a calendar export from disk.
 * Throws NotFoundError / SourceReadError; bad records are skipped and listed in the report.
 */
export function loadIcsFile(path: string, opts: IcsLoadOptions): BatchResult {
    const text = readSource(path);
    const res = eventsFromIcsText(text, opts);
    info('icsLoad', `${path}: ${res.report.succeeded} event(s), ${res.report.skipped} skipped`);
    return res;
}
