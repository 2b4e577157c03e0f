// src/main/types/eventTypes.ts

import {YmdHms} from '../utils/dateUtils';

export type NaiveDateTime = {
    kind: 'naive';
    wall: YmdHms;
};

export type ZonedDateTime = {
    kind: 'zoned';
    wall: YmdHms;   // wall-clock reading in tz
    tz: string;     // IANA zone, or a fixed offset label ("+02:00") for offset-only sources
    utcMs: number;  // absolute instant
};

export type Timestamp = NaiveDateTime | ZonedDateTime;

export type CalendarEvent = {
    readonly title: string;
    readonly begin: ZonedDateTime;
    readonly end?: ZonedDateTime; // end >= begin is not checked
};

// ISO date ("YYYY-MM-DD") -> events of that local day, in input order.
export type EventGroup = Record<string, CalendarEvent[]>;

export type BatchReport = {
    succeeded: number;
    skipped: number;
    skipReasons: string[];
};

export type BatchResult = {
    events: CalendarEvent[];
    report: BatchReport;
};
