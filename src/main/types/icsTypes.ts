// src/main/types/icsTypes.ts

export type IcsDateValue = {
    value: string;                    // raw text after ":" e.g. "20250812T100000Z"
    params: Record<string, string>;   // e.g. {TZID: 'America/Toronto'} or {VALUE: 'DATE'}
};

// One VEVENT as read from the file, before any date parsing.
export type IcsRecord = {
    title?: string;       // SUMMARY, unescaped
    start?: IcsDateValue; // DTSTART
    end?: IcsDateValue;   // DTEND
    duration?: string;    // DURATION, e.g. PT1H30M
};
