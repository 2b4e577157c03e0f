// src/main/settings/settings.ts

import * as os from 'os';
import * as path from 'path';

import {ClockTime, parseClockTime} from '../utils/dateTimeUtils';
import {setDebugEnabled, warn} from '../utils/logger';
import {DEFAULT_CUTOFF, DEFAULT_EARLY_TITLE, DEFAULT_LATE_TITLE} from '../parsers/shiftTextParser';

export const ENV_TZ = 'EVENT_DAYS_TZ';
export const ENV_ICS_PATH = 'EVENT_DAYS_ICS_PATH';
export const ENV_CUTOFF = 'EVENT_DAYS_CUTOFF';
export const ENV_DEBUG = 'EVENT_DAYS_DEBUG';

export const DEFAULT_ZONE = 'Europe/Berlin';
export const DEFAULT_ICS_FILENAME = 'my_events.ics';

export type AppConfig = {
    zoneName: string;
    defaultIcsPath: string;   // only decides whether an ics source is available without an argument
    cutoff: ClockTime;
    earlyTitle: string;
    lateTitle: string;
    debug: boolean;
};

export function defaultConfig(home: string = os.homedir()): AppConfig {
    return {
        zoneName: DEFAULT_ZONE,
        defaultIcsPath: path.join(home, 'Downloads', DEFAULT_ICS_FILENAME),
        cutoff: {...DEFAULT_CUTOFF},
        earlyTitle: DEFAULT_EARLY_TITLE,
        lateTitle: DEFAULT_LATE_TITLE,
        debug: false,
    };
}

export function parseBoolFlag(v: string | undefined): boolean | undefined {
    if (v == null) return undefined;
    const t = v.trim().toLowerCase();
    if (['1', 'true', 'yes', 'on'].includes(t)) return true;
    if (['0', 'false', 'no', 'off', ''].includes(t)) return false;
    return undefined;
}

function envOverrides(env: NodeJS.ProcessEnv): Partial<AppConfig> {
    const out: Partial<AppConfig> = {};

    const tz = env[ENV_TZ]?.trim();
    if (tz) out.zoneName = tz;

    const icsPath = env[ENV_ICS_PATH]?.trim();
    if (icsPath) out.defaultIcsPath = icsPath;

    const cutoffRaw = env[ENV_CUTOFF];
    if (cutoffRaw) {
        const cutoff = parseClockTime(cutoffRaw);
        if (cutoff) out.cutoff = cutoff;
        else warn('settings', `${ENV_CUTOFF}="${cutoffRaw}" is not HH:MM, keeping default`);
    }

    const debug = parseBoolFlag(env[ENV_DEBUG]);
    if (debug !== undefined) out.debug = debug;

    return out;
}

/**
 * defaults <- environment <- explicit overrides (e.g. command line).
 * Applies the debug flag to the logger.
 */
export function loadConfig(
    env: NodeJS.ProcessEnv = process.env,
    overrides: Partial<AppConfig> = {},
    home?: string,
): AppConfig {
    const base: AppConfig = {...defaultConfig(home), ...envOverrides(env)};
    const cfg: AppConfig = {
        zoneName: overrides.zoneName ?? base.zoneName,
        defaultIcsPath: overrides.defaultIcsPath ?? base.defaultIcsPath,
        cutoff: overrides.cutoff ?? base.cutoff,
        earlyTitle: overrides.earlyTitle ?? base.earlyTitle,
        lateTitle: overrides.lateTitle ?? base.lateTitle,
        debug: overrides.debug ?? base.debug,
    };
    setDebugEnabled(cfg.debug);
    return cfg;
}
