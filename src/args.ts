/**
 * Command-line arguments and time range resolution.
 */

import { Command, CommanderError } from 'commander';
import { UsageError } from './errors.js';
import { parseLocalDateTime } from './time.js';
import { VERSION } from './version.js';

export const DEFAULT_DURATION_SECONDS = 3600;

export interface Args {
  /** Path of the TOML configuration file */
  file: string;
  /** Trailing window in seconds, used when start and end are absent */
  duration: number;
  start?: string;
  end?: string;
  printPromptData: boolean;
  dryRun: boolean;
}

export type CliCommand = { kind: 'run'; args: Args } | { kind: 'help' } | { kind: 'version' };

type RawOptions = {
  duration: string;
  start?: string;
  end?: string;
  printPromptData?: boolean;
  dryRun?: boolean;
};

/**
 * Build the commander program. Output is silenced and exits are turned into
 * CommanderErrors; the caller decides what to print.
 */
function createProgram(): Command {
  return new Command()
    .name('autodiag')
    .description('Automatically performs diagnosis on your AWS environment with AI')
    .argument('<config-file>', 'Configuration file to use')
    .option(
      '--duration <seconds>',
      'Duration in seconds, since the current date time',
      String(DEFAULT_DURATION_SECONDS)
    )
    .option('--start <datetime>', 'Start time [format: YYYY-MM-DD HH:MM:SS]. If provided, ignores duration')
    .option('--end <datetime>', 'End time [format: YYYY-MM-DD HH:MM:SS]. If provided, ignores duration')
    .option('--print-prompt-data', 'Print the raw prompt data')
    .option('--dry-run', "Dry run mode, don't generate diagnosis")
    .version(VERSION)
    .allowExcessArguments(false)
    .exitOverride()
    .configureOutput({
      writeOut: () => undefined,
      writeErr: () => undefined,
    });
}

/**
 * Help text printed for `--help`.
 */
export function helpText(): string {
  return createProgram().helpInformation();
}

function parseDuration(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new UsageError(`Invalid duration: ${value} (expected a whole number of seconds)`);
  }
  return Number(value);
}

/**
 * Parse argv (without the node and script entries).
 */
export function parseArgs(argv: readonly string[]): CliCommand {
  const program = createProgram();
  try {
    program.parse([...argv], { from: 'user' });
  } catch (e) {
    if (e instanceof CommanderError) {
      if (e.code === 'commander.helpDisplayed' || e.code === 'commander.help') {
        return { kind: 'help' };
      }
      if (e.code === 'commander.version') {
        return { kind: 'version' };
      }
      throw new UsageError(e.message.replace(/^error: /, ''));
    }
    throw e;
  }

  const options = program.opts<RawOptions>();

  return {
    kind: 'run',
    args: {
      file: program.args[0],
      duration: parseDuration(options.duration),
      start: options.start,
      end: options.end,
      printPromptData: options.printPromptData === true,
      dryRun: options.dryRun === true,
    },
  };
}

/**
 * Resolve the run's window in epoch milliseconds.
 *
 * Start and end, when both given, are wall-clock times in `timeZone` and win
 * over duration. Otherwise the window is the trailing `duration` seconds
 * ending at `now`.
 */
export function resolveTimeRange(
  args: Pick<Args, 'duration' | 'start' | 'end'>,
  timeZone: string,
  now: number = Date.now()
): { startTime: number; endTime: number } {
  const { start, end } = args;

  if (start !== undefined && end !== undefined) {
    const startTime = parseLocalDateTime(start, timeZone);
    const endTime = parseLocalDateTime(end, timeZone);
    if (startTime > endTime) {
      throw new UsageError(`Start time ${start} is after end time ${end}`);
    }
    return { startTime, endTime };
  }

  if (start === undefined && end === undefined) {
    return { startTime: now - args.duration * 1000, endTime: now };
  }

  throw new UsageError('Both start and end arguments must be provided');
}
