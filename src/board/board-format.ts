import type { Solution, SolverResult } from '../types';

/** 1-indexed `(column, row)` pairs, one per line */
export function formatPlacements(solution: Solution): string[] {
  return solution.map((row, col) => `(${col + 1}, ${row + 1})`);
}

/** Text grid, row 0 first; Q marks a queen */
export function renderBoard(rows: readonly number[]): string[] {
  const n = rows.length;
  const lines: string[] = [];
  for (let r = 0; r < n; r++) {
    const cells: string[] = [];
    for (let c = 0; c < n; c++) cells.push(rows[c] === r ? 'Q' : '.');
    lines.push(cells.join(' '));
  }
  return lines;
}

export function formatResultJson(result: SolverResult): string {
  return JSON.stringify({
    size: result.size,
    status: result.status,
    reason: result.reason ?? null,
    solution: result.solution,
    statistics: result.statistics,
  }, null, 2);
}
