// ============================================================
// Non-Attack Constraint
//
// The constraint graph is complete, so it is never stored:
// every arc shares one predicate over two (column, row) pairs.
// ============================================================

import type { Arc, Assignment, Conflict } from '../types';

/** Two queens are compatible iff they share neither a row nor a diagonal */
export function isCompatible(i: number, vi: number, j: number, vj: number): boolean {
  return vi !== vj && Math.abs(vi - vj) !== Math.abs(i - j);
}

/** Check a tentative (variable, value) against every queen already placed */
export function isConsistent(variable: number, value: number, assignment: Assignment): boolean {
  for (const [col, row] of assignment) {
    if (col === variable) continue;
    if (!isCompatible(col, row, variable, value)) return false;
  }
  return true;
}

/** All ordered pairs (i, j), i !== j, column-major */
export function generateArcs(n: number): Arc[] {
  const arcs: Arc[] = [];
  for (let i = 0; i < n; i++) {
    for (let j = 0; j < n; j++) {
      if (i !== j) arcs.push({ from: i, to: j });
    }
  }
  return arcs;
}

// ============================================================
// Queen Tracking (O(1) consistency during search)
// ============================================================

export interface QueenTracker {
  size: number;
  // row -> queens on that row
  rows: Int32Array;
  // (col - row + size - 1) -> queens on that descending diagonal
  diagonals: Int32Array;
  // (col + row) -> queens on that ascending diagonal
  antiDiagonals: Int32Array;
}

export function createQueenTracker(size: number): QueenTracker {
  return {
    size,
    rows: new Int32Array(size),
    diagonals: new Int32Array(2 * size - 1),
    antiDiagonals: new Int32Array(2 * size - 1),
  };
}

export function canPlaceQueen(tracker: QueenTracker, col: number, row: number): boolean {
  return tracker.rows[row] === 0
    && tracker.diagonals[col - row + tracker.size - 1] === 0
    && tracker.antiDiagonals[col + row] === 0;
}

export function placeQueen(tracker: QueenTracker, col: number, row: number): void {
  tracker.rows[row]++;
  tracker.diagonals[col - row + tracker.size - 1]++;
  tracker.antiDiagonals[col + row]++;
}

export function removeQueen(tracker: QueenTracker, col: number, row: number): void {
  tracker.rows[row]--;
  tracker.diagonals[col - row + tracker.size - 1]--;
  tracker.antiDiagonals[col + row]--;
}

// ============================================================
// Placement Verification
// ============================================================

/** Every attacking pair in a one-queen-per-column layout */
export function findConflicts(rows: readonly number[]): Conflict[] {
  const conflicts: Conflict[] = [];
  for (let i = 0; i < rows.length; i++) {
    for (let j = i + 1; j < rows.length; j++) {
      if (isCompatible(i, rows[i], j, rows[j])) continue;
      conflicts.push({
        a: { column: i, row: rows[i] },
        b: { column: j, row: rows[j] },
        kind: rows[i] === rows[j] ? 'row' : 'diagonal',
      });
    }
  }
  return conflicts;
}

export function isValidPlacement(rows: readonly number[]): boolean {
  for (const row of rows) {
    if (!Number.isInteger(row) || row < 0 || row >= rows.length) return false;
  }
  return findConflicts(rows).length === 0;
}
