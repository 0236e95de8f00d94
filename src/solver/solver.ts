// ============================================================
// N-Queens Solver
//
// Domains -> AC-3 -> backtracking search. AC-3 infeasibility
// ends the solve before any search node is created.
// ============================================================

import type {
  Assignment, Solution, SolverConfig, SolverError, SolverResult, SolverStats,
} from '../types';
import { DomainStore } from './domain-store';
import { enforceArcConsistency } from './ac3-solver';
import { backtrackingSearch } from './backtracking-solver';
import { InvalidBoardSizeError } from './errors';

export const DEFAULT_CONFIG: SolverConfig = {
  variableOrder: 'mrv',
  valueOrder: 'lcv',
  arcConsistency: true,
  maxNodes: Infinity,
  timeoutMs: Infinity,
};

export function emptyStats(): SolverStats {
  return { arcRevisions: 0, prunedValues: 0, nodes: 0, backtracks: 0, maxDepth: 0, solveTimeMs: 0 };
}

export function assignmentToSolution(assignment: Assignment, size: number): Solution {
  const rows: number[] = [];
  for (let col = 0; col < size; col++) {
    const row = assignment.get(col);
    if (row === undefined) throw new Error(`Column ${col} is unassigned`);
    rows.push(row);
  }
  return rows;
}

export function solveNQueens(n: number, config: Partial<SolverConfig> = {}): SolverResult {
  if (!Number.isInteger(n) || n < 1) throw new InvalidBoardSizeError(n);
  const cfg = { ...DEFAULT_CONFIG, ...config };

  const startTime = performance.now();
  const errors: SolverError[] = [];
  const stats = emptyStats();
  const domains = new DomainStore(n);

  if (cfg.arcConsistency) {
    const ac3 = enforceArcConsistency(domains);
    stats.arcRevisions = ac3.revisions;
    stats.prunedValues = ac3.removedValues;

    if (!ac3.consistent) {
      stats.solveTimeMs = performance.now() - startTime;
      return {
        size: n,
        status: 'no_solution',
        reason: 'infeasible',
        solution: null,
        searchSkipped: true,
        errors,
        statistics: stats,
      };
    }
  }

  const outcome = backtrackingSearch(domains, {
    variableOrder: cfg.variableOrder,
    valueOrder: cfg.valueOrder,
    maxNodes: cfg.maxNodes,
    timeoutMs: cfg.timeoutMs,
  });
  stats.nodes = outcome.stats.nodes;
  stats.backtracks = outcome.stats.backtracks;
  stats.maxDepth = outcome.stats.maxDepth;
  stats.solveTimeMs = performance.now() - startTime;

  if (outcome.status === 'solved' && outcome.assignment) {
    return {
      size: n,
      status: 'solved',
      solution: assignmentToSolution(outcome.assignment, n),
      searchSkipped: false,
      errors,
      statistics: stats,
    };
  }

  if (outcome.status === 'aborted') {
    errors.push({
      type: 'warning',
      source: 'search',
      message: `Search stopped after ${stats.nodes} nodes (${Math.round(stats.solveTimeMs)} ms) without a result.`,
    });
    return { size: n, status: 'aborted', solution: null, searchSkipped: false, errors, statistics: stats };
  }

  return {
    size: n,
    status: 'no_solution',
    reason: 'exhausted',
    solution: null,
    searchSkipped: false,
    errors,
    statistics: stats,
  };
}
