// src/main/services/eventGrouper.ts

import {CalendarEvent, EventGroup} from '../types/eventTypes';
import {formatYmd, getPartsInTz} from '../utils/dateUtils';
import {localDateIso, toZone} from './timeNormalizer';

function hasValidBegin(ev: CalendarEvent): boolean {
    return !!ev.begin && ev.begin.kind === 'zoned' && Number.isFinite(ev.begin.utcMs);
}

/**
 * Keep events whose local begin date is today or later (time of day ignored),
 * then bucket them by that date. Input order is kept inside each bucket;
 * bucket keys appear in first-seen order.
 */
export function groupEventsByDay(events: readonly CalendarEvent[], zone: string, now: number): EventGroup {
    const today = formatYmd(getPartsInTz(now, zone));
    const grouped: EventGroup = {};

    for (const ev of events) {
        if (!hasValidBegin(ev)) continue;
        const key = localDateIso(toZone(ev.begin, zone));
        // ISO dates compare correctly as strings
        if (key < today) continue;
        (grouped[key] ??= []).push(ev);
    }

    return grouped;
}

export function countEvents(group: EventGroup): number {
    return Object.values(group).reduce((n, list) => n + list.length, 0);
}

export function sortedDays(group: EventGroup): string[] {
    return Object.keys(group).sort();
}
