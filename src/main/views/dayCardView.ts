// src/main/views/dayCardView.ts

import {CalendarEvent, EventGroup} from '../types/eventTypes';
import {monthShortName, weekdayShortName} from '../utils/dateTimeUtils';
import {formatHm, weekdayMon0} from '../utils/dateUtils';
import {sortedDays} from '../services/eventGrouper';

export const NO_DETAILS = '(no details)';

export type DayCard = {
    day: string;        // YYYY-MM-DD
    header: string[];   // ["Mon", "21 Oct 2024"]
    lines: string[];
};

export type DayCardOptions = {
    wrapWidth?: number;
    maxLines?: number;
};

export function formatEventLine(ev: CalendarEvent): string {
    let t = formatHm(ev.begin.wall);
    if (ev.end) t += '–' + formatHm(ev.end.wall);
    return `${t} ${ev.title}`;
}

// Greedy word wrap; words longer than the width are cut.
export function wrapText(text: string, width: number): string[] {
    const out: string[] = [];
    let line = '';
    for (let word of text.split(/\s+/).filter(Boolean)) {
        while (word.length > width) {
            if (line) {
                out.push(line);
                line = '';
            }
            out.push(word.slice(0, width));
            word = word.slice(width);
        }
        if (!word) continue;
        if (!line) line = word;
        else if (line.length + 1 + word.length <= width) line += ' ' + word;
        else {
            out.push(line);
            line = word;
        }
    }
    if (line) out.push(line);
    return out;
}

function dayHeader(dayIso: string): string[] {
    const [Y, M, D] = dayIso.split('-').map(Number);
    return [
        weekdayShortName(weekdayMon0(Y, M, D)),
        `${String(D).padStart(2, '0')} ${monthShortName(M)} ${Y}`,
    ];
}

export function buildDayCard(dayIso: string, events: readonly CalendarEvent[], opts: DayCardOptions = {}): DayCard {
    const wrapWidth = opts.wrapWidth ?? 18;
    const maxLines = opts.maxLines ?? 10;

    const wrapped = events.flatMap(ev => wrapText(formatEventLine(ev), wrapWidth));
    const lines = wrapped.length ? wrapped.slice(0, maxLines) : [NO_DETAILS];

    return {day: dayIso, header: dayHeader(dayIso), lines};
}

function boxCard(card: DayCard, innerWidth: number): string[] {
    const border = '+' + '-'.repeat(innerWidth + 2) + '+';
    const row = (s: string) => `| ${s.padEnd(innerWidth)} |`;
    return [border, ...card.header.map(row), row(''), ...card.lines.map(row), border];
}

// Total comes from the flat list, so past events still count.
export function summaryLine(group: EventGroup, allEvents: readonly CalendarEvent[]): string {
    return `Showing ${Object.keys(group).length} days with ${allEvents.length} events`;
}

/**
 * Text rendering of every day in `group`, oldest first, under a summary line.
 */
export function renderDayCards(
    group: EventGroup,
    allEvents: readonly CalendarEvent[],
    opts: DayCardOptions = {},
): string {
    const wrapWidth = opts.wrapWidth ?? 18;
    const out: string[] = [summaryLine(group, allEvents)];

    for (const day of sortedDays(group)) {
        const card = buildDayCard(day, group[day], opts);
        const innerWidth = Math.max(wrapWidth, ...card.header.map(h => h.length));
        out.push('', ...boxCard(card, innerWidth));
    }

    return out.join('\n');
}
