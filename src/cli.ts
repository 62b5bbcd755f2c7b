/**
 * @fileoverview Command-line conversion.
 *
 *   npm run convert -- roster.pdf [--out file.ics] [--cutoff yyyy-MM-dd]
 *                      [--timezone Zone] [--name "Calendar"]
 *
 * The calendar goes to --out, or to stdout when no file is given.
 */

import { readFile, writeFile } from 'fs/promises';
import { extname } from 'path';
import { defaultTextExtractors } from './domains/roster/providers/index.js';
import type { TextExtractor } from './domains/roster/types.js';
import { convertRosterFile } from './services/conversion/index.js';
import { AppError, InputError } from './utils/errors.js';

export interface CliIo {
  readFile(path: string): Promise<Uint8Array>;
  writeFile(path: string, data: string): Promise<void>;
  stdout(text: string): void;
  stderr(text: string): void;
}

export interface CliOptions {
  input?: string;
  out?: string;
  cutoff?: string;
  timezone?: string;
  name?: string;
  help: boolean;
}

const MIME_BY_EXTENSION: Record<string, string> = {
  '.pdf': 'application/pdf',
  '.txt': 'text/plain',
  '.csv': 'text/csv',
};

export const USAGE = `Roster to iCalendar

Usage:
  npm run convert -- <roster.pdf|roster.txt> [options]

Options:
  --out, -o        Write the calendar to this file (default: stdout)
  --cutoff, -c     Skip duties starting before this date (yyyy-MM-dd)
  --timezone, -t   Zone the roster times are written in (default: ROSTER_TIMEZONE)
  --name, -n       Calendar name
  --help, -h       Show this help message
`;

export function parseCliArgs(args: string[]): CliOptions {
  const options: CliOptions = { help: false };

  const valueOf = (flag: string, index: number): string => {
    const value = args[index];
    if (value === undefined || value.startsWith('-')) {
      throw new InputError(`Missing value for ${flag}`);
    }
    return value;
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--out' || arg === '-o') {
      options.out = valueOf(arg, ++i);
    } else if (arg === '--cutoff' || arg === '-c') {
      options.cutoff = valueOf(arg, ++i);
    } else if (arg === '--timezone' || arg === '-t') {
      options.timezone = valueOf(arg, ++i);
    } else if (arg === '--name' || arg === '-n') {
      options.name = valueOf(arg, ++i);
    } else if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else if (arg.startsWith('-')) {
      throw new InputError(`Unknown option ${arg}`);
    } else if (options.input === undefined) {
      options.input = arg;
    } else {
      throw new InputError(`Unexpected argument ${arg}`);
    }
  }

  return options;
}

async function readRoster(path: string, io: CliIo): Promise<Uint8Array> {
  try {
    return await io.readFile(path);
  } catch (error) {
    throw new InputError(
      `Cannot read roster file "${path}": ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

/**
 * Run the converter. Returns the process exit code; errors are reported on
 * stderr rather than thrown.
 */
export async function runConvertCli(
  args: string[],
  io: CliIo,
  extractors: TextExtractor[] = defaultTextExtractors()
): Promise<number> {
  try {
    const options = parseCliArgs(args);
    if (options.help) {
      io.stdout(USAGE);
      return 0;
    }
    if (!options.input) {
      io.stderr(`Error: no roster file given\n\n${USAGE}`);
      return 1;
    }

    const data = await readRoster(options.input, io);
    const mimeType = MIME_BY_EXTENSION[extname(options.input).toLowerCase()];
    const result = await convertRosterFile(
      { data, name: options.input, ...(mimeType ? { mimeType } : {}) },
      extractors,
      {
        ...(options.cutoff ? { cutoff: options.cutoff } : {}),
        ...(options.timezone ? { timezone: options.timezone } : {}),
        ...(options.name ? { calendarName: options.name } : {}),
      }
    );

    if (options.out) {
      await io.writeFile(options.out, result.ics);
      io.stderr(`Wrote ${result.events.length} events to ${options.out}\n`);
    } else {
      io.stdout(result.ics);
    }
    return 0;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    const code = error instanceof AppError ? error.code : 'INTERNAL_ERROR';
    io.stderr(`Error (${code}): ${message}\n`);
    return 1;
  }
}

export const nodeIo: CliIo = {
  readFile: (path) => readFile(path),
  writeFile: (path, data) => writeFile(path, data, 'utf-8'),
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};
