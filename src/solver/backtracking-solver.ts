// ============================================================
// Backtracking Search (MRV + LCV)
//
// Depth-first over the AC-3-filtered domains. Domains are
// read-only here: trial placements live in the assignment and
// a queen tracker, both undone on backtrack. Stops at the first
// complete assignment.
// ============================================================

import type { Assignment, ValueOrder, VariableOrder } from '../types';
import type { DomainStore } from './domain-store';
import {
  createQueenTracker, canPlaceQueen, placeQueen, removeQueen,
  type QueenTracker,
} from './constraints';

export interface SearchOptions {
  variableOrder: VariableOrder;
  valueOrder: ValueOrder;
  maxNodes: number;
  timeoutMs: number;
}

export interface SearchStats {
  nodes: number;
  backtracks: number;
  maxDepth: number;
}

export interface SearchOutcome {
  status: 'solved' | 'exhausted' | 'aborted';
  assignment: Assignment | null;
  stats: SearchStats;
}

const DEFAULT_OPTIONS: SearchOptions = {
  variableOrder: 'mrv',
  valueOrder: 'lcv',
  maxNodes: Infinity,
  timeoutMs: Infinity,
};

function trackerFor(size: number, assignment: Assignment): QueenTracker {
  const tracker = createQueenTracker(size);
  for (const [col, row] of assignment) placeQueen(tracker, col, row);
  return tracker;
}

// ============================================================
// Variable Selection
// ============================================================

/**
 * MRV picks the unassigned column with the fewest remaining rows,
 * ties going to the larger index. 'index' is plain left-to-right.
 * Returns -1 when every column is assigned.
 */
export function selectUnassignedVariable(
  domains: DomainStore,
  assignment: Assignment,
  order: VariableOrder = 'mrv'
): number {
  let best = -1;
  let bestSize = Infinity;
  for (let i = 0; i < domains.size; i++) {
    if (assignment.has(i)) continue;
    if (order === 'index') return i;
    const size = domains.sizeOf(i);
    if (size <= bestSize) {
      bestSize = size;
      best = i;
    }
  }
  return best;
}

// ============================================================
// Value Ordering
// ============================================================

/**
 * LCV score of each value in the variable's domain: how many
 * (unassigned column, row) pairs stay consistent with the
 * assignment extended by that value.
 */
export function lcvScores(
  domains: DomainStore,
  variable: number,
  assignment: Assignment,
  tracker: QueenTracker = trackerFor(domains.size, assignment)
): number[] {
  const n = domains.size;
  const values = domains.get(variable);
  const scores = new Array<number>(values.length).fill(0);
  const open = new Uint8Array(n);

  for (let k = 0; k < n; k++) {
    if (k === variable || assignment.has(k)) continue;

    open.fill(0);
    let base = 0;
    for (const w of domains.get(k)) {
      if (canPlaceQueen(tracker, k, w)) {
        open[w] = 1;
        base++;
      }
    }
    if (base === 0) continue;

    // A queen at (variable, v) takes away row v and the two
    // diagonal rows v +/- d in column k
    const d = Math.abs(k - variable);
    for (let idx = 0; idx < values.length; idx++) {
      const v = values[idx];
      let lost = open[v];
      if (v + d < n) lost += open[v + d];
      if (v - d >= 0) lost += open[v - d];
      scores[idx] += base - lost;
    }
  }

  return scores;
}

export function orderDomainValues(
  domains: DomainStore,
  variable: number,
  assignment: Assignment,
  order: ValueOrder = 'lcv',
  tracker?: QueenTracker
): number[] {
  const values = domains.get(variable);
  if (order === 'domain') return [...values];

  const scores = lcvScores(domains, variable, assignment, tracker);
  // Array.prototype.sort is stable: equal scores keep domain order
  return values
    .map((value, idx) => ({ value, score: scores[idx] }))
    .sort((a, b) => b.score - a.score)
    .map(e => e.value);
}

// ============================================================
// Search
// ============================================================

interface SearchContext {
  domains: DomainStore;
  options: SearchOptions;
  tracker: QueenTracker;
  stats: SearchStats;
  startTime: number;
  aborted: boolean;
}

function budgetExceeded(ctx: SearchContext): boolean {
  if (ctx.stats.nodes >= ctx.options.maxNodes) return true;
  return performance.now() - ctx.startTime > ctx.options.timeoutMs;
}

export function backtrackingSearch(
  domains: DomainStore,
  options: Partial<SearchOptions> = {}
): SearchOutcome {
  const ctx: SearchContext = {
    domains,
    options: { ...DEFAULT_OPTIONS, ...options },
    tracker: createQueenTracker(domains.size),
    stats: { nodes: 0, backtracks: 0, maxDepth: 0 },
    startTime: performance.now(),
    aborted: false,
  };

  const assignment: Assignment = new Map();
  if (backtrack(ctx, assignment)) {
    return { status: 'solved', assignment: new Map(assignment), stats: ctx.stats };
  }
  return { status: ctx.aborted ? 'aborted' : 'exhausted', assignment: null, stats: ctx.stats };
}

function backtrack(ctx: SearchContext, assignment: Assignment): boolean {
  const { domains, options, tracker, stats } = ctx;
  if (assignment.size === domains.size) return true;
  if (budgetExceeded(ctx)) {
    ctx.aborted = true;
    return false;
  }

  const variable = selectUnassignedVariable(domains, assignment, options.variableOrder);
  const ordered = orderDomainValues(domains, variable, assignment, options.valueOrder, tracker);

  for (const value of ordered) {
    if (!canPlaceQueen(tracker, variable, value)) continue;

    assignment.set(variable, value);
    placeQueen(tracker, variable, value);
    stats.nodes++;
    if (assignment.size > stats.maxDepth) stats.maxDepth = assignment.size;

    if (backtrack(ctx, assignment)) return true;

    assignment.delete(variable);
    removeQueen(tracker, variable, value);
    stats.backtracks++;
    if (ctx.aborted) return false;
  }

  return false;
}
