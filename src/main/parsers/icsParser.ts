// src/main/parsers/icsParser.ts

import {IcsDateValue, IcsRecord} from '../types/icsTypes';
import {Timestamp} from '../types/eventTypes';
import {isValidTimeZone, makeYmdHms, YmdHms} from '../utils/dateUtils';
import {describeError, MalformedRecordError} from '../utils/errors';
import {dbg} from '../utils/logger';
import {attachZone} from '../services/timeNormalizer';

export function unfoldIcsLines(ics: string): string[] {
    const raw = ics.replace(/\r\n/g, '\n').replace(/\r/g, '\n').split('\n');
    const out: string[] = [];
    for (const line of raw) {
        if (!line) continue;
        // folded line: starts with space/tab
        if ((line.startsWith(' ') || line.startsWith('\t')) && out.length) {
            out[out.length - 1] += line.slice(1);
        } else {
            out.push(line);
        }
    }
    return out;
}

export function unescapeIcsText(s: string): string {
    // Protect escaped backslashes first, so "\\\\n" becomes literal "\n" not newline.
    const BS = '\u0000';
    return s
        .replace(/\\\\/g, BS)
        .replace(/\\n/gi, '\n')
        .replace(/\\,/g, ',')
        .replace(/\\;/g, ';')
        .replace(new RegExp(BS, 'g'), '\\');
}

export function parseLineValue(line: string): { key: string; value: string; params: Record<string, string> } | null {
    const i = line.indexOf(':');
    if (i < 0) return null;
    const left = line.slice(0, i);
    const value = line.slice(i + 1);

    const parts = left.split(';').map(p => p.trim()).filter(Boolean);
    const key = (parts[0] || '').toUpperCase();

    const params: Record<string, string> = {};
    for (let j = 1; j < parts.length; j++) {
        const p = parts[j];
        const eq = p.indexOf('=');
        if (eq > 0) {
            const k = p.slice(0, eq).toUpperCase();
            let v = p.slice(eq + 1).trim();
            // strip optional quotes: TZID="America/Toronto"
            if (v.startsWith('"') && v.endsWith('"') && v.length >= 2) v = v.slice(1, -1);
            params[k] = v;
        }
    }

    return {key, value, params};
}

function hasMeaningfulEvent(rec: IcsRecord): boolean {
    return !!(rec.title || rec.start || rec.end || rec.duration);
}

export function parseIcs(ics: string): IcsRecord[] {
    const lines = unfoldIcsLines(ics);
    const records: IcsRecord[] = [];
    let cur: IcsRecord | null = null;
    // VALARM and friends nested inside a VEVENT must not overwrite its fields
    let nested = 0;

    for (const line of lines) {
        const L = line.trim();
        if (!L) continue;

        if (L.toUpperCase() === 'BEGIN:VEVENT') {
            cur = {};
            nested = 0;
            continue;
        }
        if (L.toUpperCase() === 'END:VEVENT') {
            if (cur && hasMeaningfulEvent(cur)) records.push(cur);
            cur = null;
            continue;
        }
        if (!cur) continue;

        const parsed = parseLineValue(L);
        if (!parsed) continue;
        const {key, value, params} = parsed;

        if (key === 'BEGIN') {
            nested++;
            continue;
        }
        if (key === 'END') {
            if (nested > 0) nested--;
            continue;
        }
        if (nested > 0) continue;

        if (key === 'SUMMARY') cur.title = unescapeIcsText(value);
        else if (key === 'DTSTART') {
            cur.start = {value: value.trim(), params};
        } else if (key === 'DTEND') {
            cur.end = {value: value.trim(), params};
        } else if (key === 'DURATION') {
            cur.duration = value.trim();
        }
    }

    return records;
}

const BASIC_DT_RE = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})(Z?)$/;
const BASIC_DATE_RE = /^(\d{4})(\d{2})(\d{2})$/;
const ISO_DT_RE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2}))?)?\s*(Z|[+-]\d{2}:?\d{2})?$/;

function buildWall(m: RegExpMatchArray, raw: string): YmdHms {
    try {
        return makeYmdHms(
            Number(m[1]), Number(m[2]), Number(m[3]),
            Number(m[4] ?? '0'), Number(m[5] ?? '0'), Number(m[6] ?? '0'),
        );
    } catch (e) {
        throw new MalformedRecordError(`Invalid date-time "${raw}": ${describeError(e)}`);
    }
}

// "+0200" | "+02:00" | "Z" -> minutes east of UTC
function offsetMinutes(off: string): number {
    if (off === 'Z') return 0;
    const m = off.match(/^([+-])(\d{2}):?(\d{2})$/);
    if (!m) throw new MalformedRecordError(`Invalid UTC offset "${off}"`);
    const sign = m[1] === '-' ? -1 : 1;
    return sign * (Number(m[2]) * 60 + Number(m[3]));
}

function offsetLabel(minutes: number): string {
    if (minutes === 0) return 'UTC';
    const sign = minutes < 0 ? '-' : '+';
    const abs = Math.abs(minutes);
    return `${sign}${String(Math.floor(abs / 60)).padStart(2, '0')}:${String(abs % 60).padStart(2, '0')}`;
}

function withOffset(wall: YmdHms, minutes: number): Timestamp {
    const asUtc = Date.UTC(wall.Y, wall.M - 1, wall.D, wall.h, wall.m, wall.sec);
    return {kind: 'zoned', wall, tz: offsetLabel(minutes), utcMs: asUtc - minutes * 60_000};
}

function withTzid(wall: YmdHms, tzid: string | undefined): Timestamp {
    if (tzid && isValidTimeZone(tzid)) return attachZone(wall, tzid);
    if (tzid) dbg('icsParser', `unknown TZID "${tzid}", reading value as floating time`);
    return {kind: 'naive', wall};
}

/**
 * Turn a DTSTART/DTEND value into a timestamp.
 *
 * - `20250115T100000Z` and ISO forms with `Z`/offset are zone-aware.
 * - `TZID=<zone>` with a local form is zone-aware in that zone.
 * - Local forms without TZID, and dates (`20250115`), are naive.
 *
 * Throws MalformedRecordError when the value is not a date-time.
 */
export function parseIcsDateTime(dv: IcsDateValue): Timestamp {
    const raw = dv.value.trim();
    // normalize trailing "z" -> "Z"
    const v = raw.endsWith('z') ? `${raw.slice(0, -1)}Z` : raw;
    const tzid = dv.params['TZID'];

    let m = v.match(BASIC_DT_RE);
    if (m) {
        const wall = buildWall(m, raw);
        return m[7] === 'Z' ? withOffset(wall, 0) : withTzid(wall, tzid);
    }

    m = v.match(BASIC_DATE_RE);
    if (m) return {kind: 'naive', wall: buildWall(m, raw)};

    m = v.match(ISO_DT_RE);
    if (m) {
        const wall = buildWall(m, raw);
        return m[7] ? withOffset(wall, offsetMinutes(m[7])) : withTzid(wall, tzid);
    }

    throw new MalformedRecordError(`Unrecognized date-time "${raw}"`);
}
