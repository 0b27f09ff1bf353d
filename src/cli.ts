/**
 * Command-line entry point.
 *
 * Usage:
 *   rover-sim <mission.json>
 *   rover-sim --grid 4,8 --start 2,3,E --commands LFRFF
 *
 * Reports are written one per line to stdout. Exit codes: 0 when every
 * rover ran, 1 when any rover's commands failed to decode, 2 for usage or
 * configuration errors.
 */

import type { Logger } from 'winston';

import { getEnv, parseEnv } from './config/env';
import { isRoverSimError } from './errors';
import { loadMission, parseMission } from './mission/load';
import { runMission } from './mission/run';
import type { Mission } from './mission/types';
import { configureLogger } from './utils/logger';

export type CliArgs =
  | { kind: 'help' }
  | { kind: 'mission'; file: string }
  | {
      kind: 'single';
      grid: { edgeX: number; edgeY: number };
      start: { x: number; y: number; heading: string };
      commands: string;
    };

export interface CliIo {
  out: (line: string) => void;
  err: (line: string) => void;
}

export const EXIT_OK = 0;
export const EXIT_DECODE_FAILURE = 1;
export const EXIT_USAGE = 2;

export const USAGE = [
  'Usage: rover-sim <mission.json>',
  '       rover-sim --grid <edgeX>,<edgeY> --start <x>,<y>,<N|E|S|W> --commands <FLR...>',
  '',
  'Examples:',
  '  rover-sim missions/example.json',
  '  rover-sim --grid 4,8 --start 2,3,E --commands LFRFF',
].join('\n');

const INTEGER = /^-?\d+$/;

const parseIntegers = (value: string, count: number): number[] | null => {
  const parts = value.split(',');
  if (parts.length !== count || !parts.every((part) => INTEGER.test(part.trim()))) {
    return null;
  }
  return parts.map((part) => Number(part.trim()));
};

const parseStart = (value: string): { x: number; y: number; heading: string } | null => {
  const parts = value.split(',');
  if (parts.length !== 3) {
    return null;
  }
  const coords = parseIntegers(parts.slice(0, 2).join(','), 2);
  if (!coords) {
    return null;
  }
  return { x: coords[0], y: coords[1], heading: parts[2].trim() };
};

export function parseArgs(argv: string[]): CliArgs | null {
  let grid: string | undefined;
  let start: string | undefined;
  let commands: string | undefined;
  const positional: string[] = [];

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    const next = argv[i + 1];

    switch (arg) {
      case '--help':
      case '-h':
        return { kind: 'help' };
      case '--grid':
        if (next === undefined) {
          return null;
        }
        grid = next;
        i += 1;
        break;
      case '--start':
        if (next === undefined) {
          return null;
        }
        start = next;
        i += 1;
        break;
      case '--commands':
        if (next === undefined) {
          return null;
        }
        commands = next;
        i += 1;
        break;
      default:
        if (arg.startsWith('-')) {
          return null;
        }
        positional.push(arg);
    }
  }

  const singleFlags = [grid, start, commands].filter((value) => value !== undefined).length;

  if (positional.length === 1 && singleFlags === 0) {
    return { kind: 'mission', file: positional[0] };
  }

  if (positional.length > 0 || grid === undefined || start === undefined || commands === undefined) {
    return null;
  }

  const edges = parseIntegers(grid, 2);
  const startPose = parseStart(start);
  if (!edges || !startPose) {
    return null;
  }

  return {
    kind: 'single',
    grid: { edgeX: edges[0], edgeY: edges[1] },
    start: startPose,
    commands,
  };
}

const toMission = (args: Exclude<CliArgs, { kind: 'help' }>): Mission =>
  args.kind === 'mission'
    ? loadMission(args.file)
    : parseMission({
        grid: args.grid,
        rovers: [{ id: 'rover-1', start: args.start, commands: args.commands }],
      });

const defaultIo: CliIo = {
  out: (line) => process.stdout.write(`${line}\n`),
  err: (line) => process.stderr.write(`${line}\n`),
};

export function runCli(
  argv: string[],
  io: CliIo = defaultIo,
  rawEnv?: Record<string, string | undefined>,
): number {
  let logger: Logger;
  try {
    logger = configureLogger(rawEnv ? parseEnv(rawEnv) : getEnv());
  } catch (error) {
    if (!isRoverSimError(error)) {
      throw error;
    }
    io.err(error.message);
    return EXIT_USAGE;
  }

  const args = parseArgs(argv);
  if (!args) {
    io.err(USAGE);
    return EXIT_USAGE;
  }

  if (args.kind === 'help') {
    io.out(USAGE);
    return EXIT_OK;
  }

  let mission: Mission;
  try {
    mission = toMission(args);
  } catch (error) {
    if (!isRoverSimError(error)) {
      throw error;
    }
    logger.error('Mission could not be loaded', { code: error.code, ...error.context });
    io.err(error.message);
    return EXIT_USAGE;
  }

  const reports = runMission(mission);
  const single = args.kind === 'single';
  for (const entry of reports) {
    if (entry.ok) {
      io.out(single ? entry.report : `${entry.id}: ${entry.report}`);
    } else {
      io.err(`${entry.id}: ${entry.error}`);
    }
  }

  return reports.every((entry) => entry.ok) ? EXIT_OK : EXIT_DECODE_FAILURE;
}
