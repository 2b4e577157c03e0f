// src/main/utils/logger.ts
let debugEnabled = false;

const PREFIX = '[EventDays]';

export function setDebugEnabled(v: boolean) {
    debugEnabled = v;
}

// First argument is the source tag: dbg('icsLoad', 'parsed', n) -> "[EventDays][icsLoad] parsed n"
export function dbg(source: string, ...a: unknown[]) {
    if (debugEnabled) console.log(`${PREFIX}[${source}]`, ...a);
}

export function info(source: string, ...a: unknown[]) {
    console.info(`${PREFIX}[${source}]`, ...a);
}

export function warn(source: string, ...a: unknown[]) {
    console.warn(`${PREFIX}[${source}]`, ...a);
}

export function err(source: string, ...a: unknown[]) {
    console.error(`${PREFIX}[${source}]`, ...a);
}
