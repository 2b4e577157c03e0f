// src/main/cli.ts

import {Command, CommanderError, InvalidArgumentError} from 'commander';

import {AppIo, defaultIo, EXIT_OK, EXIT_USAGE, RunOptions, runApp} from './appMain';
import {ClockTime, parseClockTime} from './utils/dateTimeUtils';

type CliOptions = {
    text?: string;
    tz?: string;
    year?: number;
    cutoff?: ClockTime;
    debug?: boolean;
};

function parseYear(v: string): number {
    const n = Number(v);
    if (!/^\d{4}$/.test(v.trim()) || !Number.isInteger(n) || n < 1) {
        throw new InvalidArgumentError('Expected a four-digit year.');
    }
    return n;
}

function parseCutoff(v: string): ClockTime {
    const t = parseClockTime(v);
    if (!t) throw new InvalidArgumentError('Expected HH:MM (24-hour).');
    return t;
}

export function buildProgram(onRun: (opts: RunOptions) => void): Command {
    return new Command()
        .name('event-days')
        .description('Show upcoming events as one card per day.')
        .argument('[ics-file]', 'calendar export (.ics); defaults to the configured path')
        .option('-t, --text <file>', 'text file with "HH:MM-HH:MM DD.MM" shift patterns')
        .option('--tz <zone>', 'IANA time zone used for display and grouping')
        .option('-y, --year <year>', 'year for text patterns (default: current year)', parseYear)
        .option('-c, --cutoff <HH:MM>', 'shifts starting before this get the early title', parseCutoff)
        .option('-d, --debug', 'verbose logging')
        .action((icsFile: string | undefined, o: CliOptions) => {
            onRun({
                icsPath: icsFile,
                textPath: o.text,
                zoneName: o.tz,
                year: o.year,
                cutoff: o.cutoff,
                debug: o.debug,
            });
        });
}

/**
 * Parse argv (node-style, i.e. including the executable and script) and run.
 * Returns the exit code; never calls process.exit.
 */
export function main(argv: string[], io: AppIo = defaultIo, env: NodeJS.ProcessEnv = process.env): number {
    let code = EXIT_OK;
    const program = buildProgram(opts => {
        code = runApp(opts, io, env);
    })
        .exitOverride()
        .configureOutput({
            writeOut: s => io.out(s.trimEnd()),
            writeErr: s => io.errOut(s.trimEnd()),
        });

    try {
        program.parse(argv);
    } catch (e) {
        if (!(e instanceof CommanderError)) throw e;
        return e.exitCode === 0 ? EXIT_OK : EXIT_USAGE;
    }
    return code;
}
