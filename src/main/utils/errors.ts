// src/main/utils/errors.ts

export class EventDaysError extends Error {
    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

// Input file does not exist. Fatal for the load call that hit it.
export class NotFoundError extends EventDaysError {
    constructor(readonly path: string) {
        super(`File not found: ${path}`);
    }
}

// Input file exists but could not be read.
export class SourceReadError extends EventDaysError {
    constructor(readonly path: string, readonly reason: unknown) {
        super(`Could not read file: ${path} (${describeError(reason)})`);
    }
}

// One record / one pattern match could not be turned into an event. Never leaves a batch.
export class MalformedRecordError extends EventDaysError {
}

// Configured zone is unknown. Recovered by the zone fallback chain.
export class ZoneResolutionError extends EventDaysError {
    constructor(readonly zoneName: string) {
        super(`Unknown time zone: "${zoneName}"`);
    }
}

export function describeError(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}
