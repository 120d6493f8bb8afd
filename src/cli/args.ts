/**
 * Command-line argument parsing for txdl.
 *
 * Turns argv into one of the supported modes. Usage problems throw a
 * UsageError (exit 1) instead of exiting, so the caller decides what to
 * print.
 *
 * @module cli/args
 */

import meow from 'meow';
import { expandPath } from '../utils/platform.js';
import { UsageError } from '../engine/types.js';
import { HELP_TEXT } from './help.js';

// =============================================================================
// Types
// =============================================================================

interface CommonOptions {
  /** Download directory from -d (already ~-expanded) */
  dir?: string;
}

export type ParsedCommand =
  | { mode: 'help' }
  | { mode: 'version' }
  | ({ mode: 'link'; input: string } & CommonOptions)
  | ({ mode: 'torrent' } & CommonOptions)
  | ({ mode: 'resume'; file: string } & CommonOptions);

// =============================================================================
// Flag Definitions
// =============================================================================

const FLAGS = {
  link: { type: 'string', shortFlag: 'l' },
  torrent: { type: 'boolean', shortFlag: 't', default: false },
  resume: { type: 'string', shortFlag: 'r' },
  dir: { type: 'string', shortFlag: 'd' },
  help: { type: 'boolean', shortFlag: 'h', default: false },
  version: { type: 'boolean', shortFlag: 'v', default: false },
} as const;

const KNOWN_FLAGS = new Set<string>(
  Object.entries(FLAGS).flatMap(([name, spec]) => [name, spec.shortFlag])
);

/**
 * Formats a flag name the way the user typed it.
 */
function displayFlag(name: string): string {
  return name.length === 1 ? `-${name}` : `--${name}`;
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * Runs meow over argv, reporting its own validation errors (such as a
 * repeated flag) as usage errors.
 */
function readFlags(argv: readonly string[]) {
  try {
    return meow(HELP_TEXT, {
      importMeta: import.meta,
      argv: [...argv],
      flags: FLAGS,
      allowUnknownFlags: true,
      autoHelp: false,
      autoVersion: false,
    });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Parses command-line arguments.
 *
 * `-h` wins over everything else. Exactly one of `-l`, `-t` and `-r`
 * must be given otherwise.
 *
 * @param argv - Arguments without the node binary and script path
 * @throws {UsageError} On unknown or repeated flags, missing values, stray
 *   arguments, or a wrong number of download modes
 */
export function parseArgs(argv: readonly string[]): ParsedCommand {
  const cli = readFlags(argv);
  const { flags } = cli;

  if (flags.help) {
    return { mode: 'help' };
  }

  const unknown = Object.keys(cli.unnormalizedFlags).find(
    (name) => name !== '--' && !KNOWN_FLAGS.has(name)
  );
  if (unknown !== undefined) {
    throw new UsageError(`Invalid option: ${displayFlag(unknown)}`);
  }

  if (flags.version) {
    return { mode: 'version' };
  }

  for (const [name, value] of [
    ['l', flags.link],
    ['r', flags.resume],
    ['d', flags.dir],
  ] as const) {
    if (value !== undefined && value.trim() === '') {
      throw new UsageError(`Option -${name} requires an argument`);
    }
  }

  if (cli.input.length > 0) {
    throw new UsageError(`Unexpected argument: ${cli.input[0]}`);
  }

  const modes = [flags.link !== undefined, flags.torrent, flags.resume !== undefined].filter(
    Boolean
  ).length;
  if (modes === 0) {
    throw new UsageError('No download option specified. Use -l, -t, or -r');
  }
  if (modes > 1) {
    throw new UsageError('Only one download option (-l, -t, or -r) can be used at a time');
  }

  const common: CommonOptions = flags.dir !== undefined ? { dir: expandPath(flags.dir.trim()) } : {};

  if (flags.link !== undefined) {
    return { mode: 'link', input: flags.link, ...common };
  }
  if (flags.resume !== undefined) {
    return { mode: 'resume', file: flags.resume, ...common };
  }
  return { mode: 'torrent', ...common };
}
