// ============================================================
// Board File Parser
//
// One integer per line: the row of the queen in that column.
// The entry count fixes the board size; the rows themselves are
// only a starting layout and never constrain the solver.
// ============================================================

export interface ParseError {
  message: string;
  line: number;
  column: number;
  suggestion?: string;
}

export interface ParseWarning {
  message: string;
  line: number;
  column: number;
}

export interface BoardParseResult {
  queenRows: number[] | null;
  size: number;
  errors: ParseError[];
  warnings: ParseWarning[];
}

const INTEGER_RE = /^[+-]?\d+$/;

export function parseBoardFile(source: string): BoardParseResult {
  const errors: ParseError[] = [];
  const warnings: ParseWarning[] = [];
  const entries: Array<{ row: number; line: number; column: number }> = [];

  const lines = source.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const raw = lines[i];
    const text = raw.trim();
    if (text === '') continue;

    const line = i + 1;
    const column = raw.length - raw.trimStart().length + 1;
    if (!INTEGER_RE.test(text)) {
      errors.push({
        message: `Expected a row index, got "${text}"`,
        line,
        column,
        suggestion: 'Each line must hold one integer',
      });
      continue;
    }
    entries.push({ row: parseInt(text, 10), line, column });
  }

  if (entries.length === 0 && errors.length === 0) {
    errors.push({ message: 'Board file contains no queens', line: 1, column: 1 });
  }

  const size = entries.length;
  for (const e of entries) {
    if (e.row < 0 || e.row >= size) {
      warnings.push({
        message: `Row ${e.row} is outside the ${size}x${size} board`,
        line: e.line,
        column: e.column,
      });
    }
  }

  return {
    queenRows: errors.length > 0 ? null : entries.map(e => e.row),
    size,
    errors,
    warnings,
  };
}
