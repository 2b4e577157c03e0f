// src/main/appMain.ts

import {extractShiftEvents} from './parsers/shiftTextParser';
import {countEvents, groupEventsByDay} from './services/eventGrouper';
import {loadIcsFile, readSource, sortByBegin} from './services/icsLoadService';
import {resolveZone} from './services/timeNormalizer';
import {AppConfig, loadConfig} from './settings/settings';
import {BatchReport, CalendarEvent, EventGroup} from './types/eventTypes';
import {ClockTime} from './utils/dateTimeUtils';
import {NotFoundError, SourceReadError} from './utils/errors';
import {dbg, info} from './utils/logger';
import {renderDayCards} from './views/dayCardView';

export const EXIT_OK = 0;
export const EXIT_SOURCE_UNAVAILABLE = 1;
export const EXIT_USAGE = 2;

export type RunOptions = {
    icsPath?: string;
    textPath?: string;
    zoneName?: string;
    year?: number;
    cutoff?: ClockTime;
    debug?: boolean;
};

export type AppIo = {
    out: (line: string) => void;
    errOut: (line: string) => void;
    now: () => number;
};

export const defaultIo: AppIo = {
    out: line => console.log(line),
    errOut: line => console.error(line),
    now: () => Date.now(),
};

type SourceKind = 'ics' | 'text';

export type SourceOutcome =
    | { kind: SourceKind; path: string; ok: true; events: CalendarEvent[]; report: BatchReport }
    | { kind: SourceKind; path: string; ok: false; error: NotFoundError | SourceReadError };

export type LoadOutcome = {
    zone: string;
    sources: SourceOutcome[];
    events: CalendarEvent[];   // all sources, sorted by begin
    grouped: EventGroup;
};

function planSources(opts: RunOptions, cfg: AppConfig): { kind: SourceKind; path: string }[] {
    const plan: { kind: SourceKind; path: string }[] = [];
    if (opts.icsPath) plan.push({kind: 'ics', path: opts.icsPath});
    else if (!opts.textPath) plan.push({kind: 'ics', path: cfg.defaultIcsPath});
    if (opts.textPath) plan.push({kind: 'text', path: opts.textPath});
    return plan;
}

function loadSource(kind: SourceKind, path: string, cfg: AppConfig, zone: string, opts: RunOptions, now: number): SourceOutcome {
    try {
        if (kind === 'ics') {
            const res = loadIcsFile(path, {zone});
            return {kind, path, ok: true, ...res};
        }
        const res = extractShiftEvents(readSource(path), {
            zone,
            referenceYear: opts.year,
            cutoff: cfg.cutoff,
            earlyTitle: cfg.earlyTitle,
            lateTitle: cfg.lateTitle,
            now,
        });
        info('app', `${path}: ${res.report.succeeded} event(s) from text, ${res.report.skipped} skipped`);
        return {kind, path, ok: true, ...res};
    } catch (e) {
        if (e instanceof NotFoundError || e instanceof SourceReadError) {
            return {kind, path, ok: false, error: e};
        }
        throw e;
    }
}

export function loadAndGroup(opts: RunOptions, cfg: AppConfig, now: number): LoadOutcome {
    const zone = resolveZone(cfg.zoneName);
    const sources = planSources(opts, cfg).map(s => loadSource(s.kind, s.path, cfg, zone, opts, now));

    const events = sortByBegin(sources.flatMap(s => (s.ok ? s.events : [])));
    const grouped = groupEventsByDay(events, zone, now);
    dbg('app', `zone=${zone} events=${events.length} upcoming=${countEvents(grouped)}`);

    return {zone, sources, events, grouped};
}

/**
 * One full run: load, group, print. Returns the process exit code.
 * "Source unavailable" (exit 1) and "no events" (exit 0) are reported differently.
 */
export function runApp(opts: RunOptions, io: AppIo = defaultIo, env: NodeJS.ProcessEnv = process.env): number {
    const cfg = loadConfig(env, {zoneName: opts.zoneName, cutoff: opts.cutoff, debug: opts.debug});
    const res = loadAndGroup(opts, cfg, io.now());

    for (const s of res.sources) {
        if (!s.ok) io.out(`Source unavailable: ${s.error.message}`);
        else if (s.kind === 'text' && s.events.length === 0 && s.report.skipped === 0) {
            io.out(`No time/date patterns found in ${s.path}`);
        }
    }

    if (res.sources.every(s => !s.ok)) return EXIT_SOURCE_UNAVAILABLE;

    if (Object.keys(res.grouped).length === 0) {
        io.out(`No upcoming events (${res.events.length} loaded)`);
        return EXIT_OK;
    }

    io.out(renderDayCards(res.grouped, res.events));
    return EXIT_OK;
}
