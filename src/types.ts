// ============================================================
// CSP Data Model
// ============================================================

/** Column -> row, built and unwound during search */
export type Assignment = Map<number, number>;

/** Rows indexed by column: solution[c] is the row of the queen in column c */
export type Solution = readonly number[];

export interface Arc {
  from: number;
  to: number;
}

export type VariableOrder = 'mrv' | 'index';
export type ValueOrder = 'lcv' | 'domain';

// ============================================================
// Solver Configuration
// ============================================================

export interface SolverConfig {
  variableOrder: VariableOrder;
  valueOrder: ValueOrder;
  arcConsistency: boolean;
  maxNodes: number;
  timeoutMs: number;
}

// ============================================================
// Solution Data Model
// ============================================================

export type SolveStatus = 'solved' | 'no_solution' | 'aborted';

// infeasible: AC-3 emptied a domain, exhausted: search ran out of branches
export type NoSolutionReason = 'infeasible' | 'exhausted';

export interface SolverResult {
  size: number;
  status: SolveStatus;
  reason?: NoSolutionReason;
  solution: Solution | null;
  searchSkipped: boolean;
  errors: SolverError[];
  statistics: SolverStats;
}

export interface SolverError {
  type: 'error' | 'warning';
  message: string;
  source?: string;
}

export interface SolverStats {
  arcRevisions: number;
  prunedValues: number;
  nodes: number;
  backtracks: number;
  maxDepth: number;
  solveTimeMs: number;
}

export interface Conflict {
  a: { column: number; row: number };
  b: { column: number; row: number };
  kind: 'row' | 'diagonal';
}
