// ============================================================
// Command Line Flow
//
// Everything the `nqueens-csp` binary does, over an injectable
// IO so tests can drive it without a terminal.
// ============================================================

import { parseBoardFile } from '../parser/board-parser';
import { createRandomBoard, countConflicts } from '../board/random-board';
import { formatPlacements, formatResultJson, renderBoard } from '../board/board-format';
import { getSolverById, getSolvers } from '../solver/solver-registry';

export interface CliIO {
  readFile(path: string): string;
  prompt(question: string): Promise<string>;
  log(line: string): void;
  error(line: string): void;
  now(): number;
}

export type OutputFormat = 'pairs' | 'board' | 'json';

export interface CliOptions {
  filePath?: string;
  size?: number;
  seed?: number;
  solverId: string;
  format: OutputFormat;
  maxNodes: number;
  timeoutMs: number;
  verbose: boolean;
  help: boolean;
}

// Interactive sizes are bounded; board files are not
export const MIN_BOARD_SIZE = 10;
export const MAX_BOARD_SIZE = 1000;

// MRV/LCV without forward checking stalls on most boards past a few dozen columns
export const DEFAULT_TIMEOUT_MS = 10_000;

export const SIZE_PROMPT = `Enter the board size (${MIN_BOARD_SIZE} <= n <= ${MAX_BOARD_SIZE}): `;

export const EXIT_OK = 0;
export const EXIT_USAGE = 1;
export const EXIT_NO_SOLUTION = 2;
export const EXIT_ABORTED = 3;

const FORMATS: readonly OutputFormat[] = ['pairs', 'board', 'json'];

function isFormat(value: string): value is OutputFormat {
  return FORMATS.some(f => f === value);
}

export function usage(): string[] {
  return [
    'Usage: nqueens-csp [board-file] [options]',
    '',
    'Without a board file the size is taken from --size or asked for interactively.',
    '',
    'Options:',
    '  --size=N          Board size for a random starting layout',
    '  --seed=S          Seed for the random starting layout',
    `  --solver=ID       One of: ${getSolvers().map(s => s.id).join(', ')} (default: mrv-lcv)`,
    '  --format=pairs    1-indexed (column, row) pairs (default)',
    '  --format=board    Text grid',
    '  --format=json     Machine-readable result',
    '  --max-nodes=N     Stop the search after N placements',
    `  --timeout=MS      Stop the search after MS milliseconds (default: ${DEFAULT_TIMEOUT_MS})`,
    '  --verbose         Print solver statistics to stderr',
    '  --help            Show this message',
    '',
    'Boards larger than a few dozen columns often exhaust the timeout; the run then',
    'ends with "Search aborted" and exit code 3.',
  ];
}

function parseIntValue(text: string): number | undefined {
  if (!/^[+-]?\d+$/.test(text.trim())) return undefined;
  return parseInt(text, 10);
}

export function parseArgs(args: string[]): { options: CliOptions; errors: string[] } {
  const errors: string[] = [];
  const options: CliOptions = {
    solverId: 'mrv-lcv',
    format: 'pairs',
    maxNodes: Infinity,
    timeoutMs: DEFAULT_TIMEOUT_MS,
    verbose: false,
    help: false,
  };

  const intFlag = (name: string, value: string, min: number): number | undefined => {
    const parsed = parseIntValue(value);
    if (parsed === undefined || parsed < min) {
      errors.push(`--${name} expects an integer >= ${min}, got "${value}"`);
      return undefined;
    }
    return parsed;
  };

  for (const arg of args) {
    if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else if (arg === '--verbose') {
      options.verbose = true;
    } else if (arg.startsWith('--size=')) {
      options.size = intFlag('size', arg.slice('--size='.length), 1);
    } else if (arg.startsWith('--seed=')) {
      options.seed = intFlag('seed', arg.slice('--seed='.length), 0);
    } else if (arg.startsWith('--solver=')) {
      options.solverId = arg.slice('--solver='.length);
    } else if (arg.startsWith('--format=')) {
      const format = arg.slice('--format='.length);
      if (isFormat(format)) options.format = format;
      else errors.push(`Unknown format "${format}"`);
    } else if (arg.startsWith('--max-nodes=')) {
      options.maxNodes = intFlag('max-nodes', arg.slice('--max-nodes='.length), 0) ?? Infinity;
    } else if (arg.startsWith('--timeout=')) {
      options.timeoutMs = intFlag('timeout', arg.slice('--timeout='.length), 0) ?? DEFAULT_TIMEOUT_MS;
    } else if (arg.startsWith('-')) {
      errors.push(`Unknown option "${arg}"`);
    } else if (options.filePath === undefined) {
      options.filePath = arg;
    } else {
      errors.push(`Unexpected argument "${arg}"`);
    }
  }

  if (options.filePath !== undefined && options.size !== undefined) {
    errors.push('--size cannot be combined with a board file');
  }

  return { options, errors };
}

function isAllowedSize(n: number | undefined): n is number {
  return n !== undefined && n >= MIN_BOARD_SIZE && n <= MAX_BOARD_SIZE;
}

/** Load or generate the starting board; returns its size, or null after reporting an error */
async function resolveBoard(options: CliOptions, io: CliIO): Promise<number | null> {
  if (options.filePath !== undefined) {
    let source: string;
    try {
      source = io.readFile(options.filePath);
    } catch (err) {
      io.error(`Error: Could not read file '${options.filePath}': ${err instanceof Error ? err.message : String(err)}`);
      return null;
    }

    const parsed = parseBoardFile(source);
    for (const w of parsed.warnings) io.error(`Warning: L${w.line}:${w.column}: ${w.message}`);
    if (!parsed.queenRows) {
      io.error(`Error: Could not parse '${options.filePath}':`);
      for (const e of parsed.errors) io.error(`  L${e.line}:${e.column}: ${e.message}`);
      return null;
    }

    io.log(`Loaded ${parsed.size} queens from ${options.filePath} (${countConflicts(parsed.queenRows)} conflicting pairs)`);
    return parsed.size;
  }

  const n = options.size ?? parseIntValue(await io.prompt(SIZE_PROMPT));
  if (!isAllowedSize(n)) {
    io.error(`Error: Board size must be an integer between ${MIN_BOARD_SIZE} and ${MAX_BOARD_SIZE}`);
    return null;
  }

  const seed = options.seed ?? io.now();
  const rows = createRandomBoard(n, seed);
  io.log(`Generated random ${n}x${n} board (seed ${seed}, ${countConflicts(rows)} conflicting pairs)`);
  return n;
}

export async function runCli(args: string[], io: CliIO): Promise<number> {
  const { options, errors } = parseArgs(args);
  if (errors.length > 0) {
    for (const e of errors) io.error(`Error: ${e}`);
    io.error('Run with --help for usage.');
    return EXIT_USAGE;
  }
  if (options.help) {
    for (const line of usage()) io.log(line);
    return EXIT_OK;
  }

  const solver = getSolverById(options.solverId);
  if (!solver) {
    io.error(`Error: Unknown solver "${options.solverId}"`);
    return EXIT_USAGE;
  }

  const n = await resolveBoard(options, io);
  if (n === null) return EXIT_USAGE;

  if (options.verbose) io.error(`Solving ${n}-queens with ${solver.name}...`);
  const result = solver.solve(n, { maxNodes: options.maxNodes, timeoutMs: options.timeoutMs });

  for (const e of result.errors) {
    io.error(`${e.type === 'error' ? 'Error' : 'Warning'}: ${e.message}`);
  }
  if (options.verbose) {
    const s = result.statistics;
    io.error(`  AC-3: ${s.arcRevisions} revisions, ${s.prunedValues} values pruned${result.searchSkipped ? ', search skipped' : ''}`);
    io.error(`  Search: ${s.nodes} nodes, ${s.backtracks} backtracks, depth ${s.maxDepth}`);
    io.error(`  Time: ${s.solveTimeMs.toFixed(1)} ms`);
  }

  if (options.format === 'json') {
    io.log(formatResultJson(result));
  } else if (result.solution) {
    io.log('Solution found');
    const lines = options.format === 'board' ? renderBoard(result.solution) : formatPlacements(result.solution);
    for (const line of lines) io.log(line);
  } else if (result.status === 'aborted') {
    io.log('Search aborted');
  } else {
    io.log('No solution found');
  }

  switch (result.status) {
    case 'solved':
      return EXIT_OK;
    case 'no_solution':
      return EXIT_NO_SOLUTION;
    case 'aborted':
      return EXIT_ABORTED;
  }
}
