export * from './types';
export { DomainStore } from './solver/domain-store';
export { InvalidBoardSizeError, InvalidVariableError } from './solver/errors';
export { isCompatible, isConsistent, generateArcs, findConflicts, isValidPlacement } from './solver/constraints';
export { revise, enforceArcConsistency, type ArcConsistencyResult } from './solver/ac3-solver';
export {
  backtrackingSearch, selectUnassignedVariable, orderDomainValues,
  type SearchOptions, type SearchOutcome,
} from './solver/backtracking-solver';
export { solveNQueens, DEFAULT_CONFIG } from './solver/solver';
export { registerSolver, getSolvers, getSolverById, type SolverDef } from './solver/solver-registry';
export { parseBoardFile, type BoardParseResult } from './parser/board-parser';
export { createRandomBoard, countConflicts } from './board/random-board';
export { formatPlacements, renderBoard, formatResultJson } from './board/board-format';
