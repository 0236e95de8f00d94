// Caller defects. Unsolvable boards are reported on SolverResult, never thrown.

export class InvalidVariableError extends Error {
  constructor(readonly variable: number, readonly size: number) {
    super(`Variable ${variable} is outside [0, ${size})`);
    this.name = 'InvalidVariableError';
  }
}

export class InvalidBoardSizeError extends Error {
  constructor(readonly size: number) {
    super(`Board size must be a positive integer, got ${size}`);
    this.name = 'InvalidBoardSizeError';
  }
}
