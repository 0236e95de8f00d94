import { describe, it, expect } from 'vitest';
import { readFileSync } from 'fs';
import { join } from 'path';
import {
  runCli, parseArgs, SIZE_PROMPT,
  EXIT_OK, EXIT_USAGE, EXIT_NO_SOLUTION, EXIT_ABORTED, DEFAULT_TIMEOUT_MS,
  type CliIO,
} from '../src/cli/run';
import { isValidPlacement } from '../src/solver/constraints';

const FIXTURES = join(__dirname, 'fixtures');

function createIO(answers: string[] = []) {
  const out: string[] = [];
  const err: string[] = [];
  const prompts: string[] = [];
  const io: CliIO = {
    readFile: path => readFileSync(join(FIXTURES, path), 'utf-8'),
    prompt: async question => {
      prompts.push(question);
      return answers.shift() ?? '';
    },
    log: line => out.push(line),
    error: line => err.push(line),
    now: () => 1234,
  };
  return { io, out, err, prompts };
}

/** Rows back out of "(column, row)" lines */
function rowsFromPairs(lines: string[]): number[] {
  return lines.map(line => {
    const m = /^\((\d+), (\d+)\)$/.exec(line);
    if (!m) throw new Error(`Not a placement line: ${line}`);
    return Number(m[2]) - 1;
  });
}

describe('parseArgs', () => {
  it('should apply defaults', () => {
    const { options, errors } = parseArgs([]);
    expect(errors).toEqual([]);
    expect(options).toEqual({
      solverId: 'mrv-lcv',
      format: 'pairs',
      maxNodes: Infinity,
      timeoutMs: DEFAULT_TIMEOUT_MS,
      verbose: false,
      help: false,
    });
  });

  it('should read every flag', () => {
    const { options, errors } = parseArgs([
      '--size=12', '--seed=5', '--solver=plain', '--format=board',
      '--max-nodes=100', '--timeout=250', '--verbose',
    ]);
    expect(errors).toEqual([]);
    expect(options).toMatchObject({
      size: 12, seed: 5, solverId: 'plain', format: 'board',
      maxNodes: 100, timeoutMs: 250, verbose: true,
    });
  });

  it('should report malformed values', () => {
    expect(parseArgs(['--size=abc']).errors).toEqual(['--size expects an integer >= 1, got "abc"']);
    expect(parseArgs(['--format=xml']).errors).toEqual(['Unknown format "xml"']);
    expect(parseArgs(['a.txt', 'b.txt']).errors).toEqual(['Unexpected argument "b.txt"']);
  });

  it('should not combine a board file with --size', () => {
    expect(parseArgs(['board.txt', '--size=10']).errors).toEqual(['--size cannot be combined with a board file']);
  });
});

describe('runCli', () => {
  it('should solve the board size given by a file', async () => {
    const { io, out, err } = createIO();
    const code = await runCli(['board-4.txt'], io);
    expect(code).toBe(EXIT_OK);
    expect(err).toEqual([]);
    expect(out).toEqual([
      'Loaded 4 queens from board-4.txt (6 conflicting pairs)',
      'Solution found',
      '(1, 3)',
      '(2, 1)',
      '(3, 4)',
      '(4, 2)',
    ]);
  });

  it('should report no solution for a 3-queens file', async () => {
    const { io, out } = createIO();
    const code = await runCli(['board-3.txt'], io);
    expect(code).toBe(EXIT_NO_SOLUTION);
    expect(out).toEqual([
      'Loaded 3 queens from board-3.txt (1 conflicting pairs)',
      'No solution found',
    ]);
  });

  it('should print statistics with --verbose', async () => {
    const { io, out, err } = createIO();
    const code = await runCli(['board-4.txt', '--solver=plain', '--verbose'], io);
    expect(code).toBe(EXIT_OK);
    expect(out.slice(2)).toEqual(['(1, 2)', '(2, 4)', '(3, 1)', '(4, 3)']);
    expect(err[0]).toBe('Solving 4-queens with AC-3 + Ordered Backtracking...');
    expect(err[1]).toBe('  AC-3: 12 revisions, 0 values pruned');
    expect(err[2].startsWith('  Search: ')).toBe(true);
  });

  it('should fail on an unreadable file', async () => {
    const { io, err } = createIO();
    const code = await runCli(['missing.txt'], io);
    expect(code).toBe(EXIT_USAGE);
    expect(err[0].startsWith("Error: Could not read file 'missing.txt'")).toBe(true);
  });

  it('should list parse errors with positions', async () => {
    const { io, out, err } = createIO();
    const code = await runCli(['bad-board.txt'], io);
    expect(code).toBe(EXIT_USAGE);
    expect(out).toEqual([]);
    expect(err).toEqual([
      "Error: Could not parse 'bad-board.txt':",
      '  L2:1: Expected a row index, got "x"',
    ]);
  });

  it('should prompt for a size when no file is given', async () => {
    const { io, out, prompts } = createIO(['12']);
    const code = await runCli([], io);
    expect(code).toBe(EXIT_OK);
    expect(prompts).toEqual([SIZE_PROMPT]);
    expect(out[0]).toMatch(/^Generated random 12x12 board \(seed 1234, \d+ conflicting pairs\)$/);
    expect(out[1]).toBe('Solution found');
    expect(isValidPlacement(rowsFromPairs(out.slice(2)))).toBe(true);
  });

  it('should enforce the interactive size range', async () => {
    for (const answer of ['5', '1001', 'ten']) {
      const { io, err } = createIO([answer]);
      expect(await runCli([], io)).toBe(EXIT_USAGE);
      expect(err).toEqual(['Error: Board size must be an integer between 10 and 1000']);
    }
  });

  it('should render a board grid', async () => {
    const { io, out, prompts } = createIO();
    const code = await runCli(['--size=10', '--seed=7', '--format=board'], io);
    expect(code).toBe(EXIT_OK);
    expect(prompts).toEqual([]);
    expect(out[0].startsWith('Generated random 10x10 board (seed 7, ')).toBe(true);
    const grid = out.slice(2);
    expect(grid).toHaveLength(10);
    for (const line of grid) {
      expect(line).toHaveLength(19);
      expect(line.split('Q')).toHaveLength(2);
    }
  });

  it('should print JSON results', async () => {
    const { io, out } = createIO();
    await runCli(['--size=10', '--format=json'], io);
    const parsed: unknown = JSON.parse(out[1]);
    expect(parsed).toMatchObject({ size: 10, status: 'solved', reason: null });
  });

  it('should exit with the aborted code when the budget runs out', async () => {
    const { io, out, err } = createIO();
    const code = await runCli(['--size=10', '--max-nodes=0'], io);
    expect(code).toBe(EXIT_ABORTED);
    expect(out[1]).toBe('Search aborted');
    expect(err[0].startsWith('Warning: Search stopped after 0 nodes')).toBe(true);
  });

  it('should reject an unknown solver', async () => {
    const { io, err } = createIO();
    expect(await runCli(['--size=10', '--solver=nope'], io)).toBe(EXIT_USAGE);
    expect(err).toEqual(['Error: Unknown solver "nope"']);
  });

  it('should reject unknown options', async () => {
    const { io, err } = createIO();
    expect(await runCli(['--bogus'], io)).toBe(EXIT_USAGE);
    expect(err).toEqual(['Error: Unknown option "--bogus"', 'Run with --help for usage.']);
  });

  it('should print usage with --help', async () => {
    const { io, out } = createIO();
    expect(await runCli(['--help'], io)).toBe(EXIT_OK);
    expect(out[0]).toBe('Usage: nqueens-csp [board-file] [options]');
    expect(out).toContain('  --solver=ID       One of: mrv-lcv, plain, no-ac3 (default: mrv-lcv)');
    expect(out).toContain('  --timeout=MS      Stop the search after MS milliseconds (default: 10000)');
    expect(out[out.length - 1]).toBe('ends with "Search aborted" and exit code 3.');
  });

  it('should bound the search time by default', () => {
    expect(DEFAULT_TIMEOUT_MS).toBe(10_000);
    expect(parseArgs(['--size=10']).options.timeoutMs).toBe(10_000);
    expect(parseArgs(['--timeout=x']).options.timeoutMs).toBe(10_000);
  });
});
