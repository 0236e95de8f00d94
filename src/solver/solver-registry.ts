import type { SolverConfig, SolverResult } from '../types';
import { solveNQueens } from './solver';

export interface SolverDef {
  id: string;
  name: string;
  description: string;
  solve(n: number, config?: Partial<SolverConfig>): SolverResult;
}

const solvers: SolverDef[] = [];

export function registerSolver(solver: SolverDef): void {
  if (solvers.some(s => s.id === solver.id)) {
    throw new Error(`Solver "${solver.id}" is already registered`);
  }
  solvers.push(solver);
}

export function getSolvers(): SolverDef[] {
  return [...solvers];
}

export function getSolverById(id: string): SolverDef | undefined {
  return solvers.find(s => s.id === id);
}

function preset(base: Partial<SolverConfig>): SolverDef['solve'] {
  return (n, config = {}) => solveNQueens(n, { ...config, ...base });
}

// Register built-in solvers
registerSolver({
  id: 'mrv-lcv',
  name: 'AC-3 + MRV/LCV',
  description: 'Arc consistency, then backtracking with most-constrained column and least-constraining row',
  solve: preset({ arcConsistency: true, variableOrder: 'mrv', valueOrder: 'lcv' }),
});

registerSolver({
  id: 'plain',
  name: 'AC-3 + Ordered Backtracking',
  description: 'Arc consistency, then left-to-right columns with rows in ascending order',
  solve: preset({ arcConsistency: true, variableOrder: 'index', valueOrder: 'domain' }),
});

registerSolver({
  id: 'no-ac3',
  name: 'MRV/LCV Backtracking',
  description: 'Backtracking with MRV and LCV over unfiltered domains',
  solve: preset({ arcConsistency: false, variableOrder: 'mrv', valueOrder: 'lcv' }),
});
