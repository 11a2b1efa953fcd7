import type { IncidenceMatrix } from "./types";
import { columnCount } from "./matrix";

export interface CoverCheck {
  valid: boolean;
  uncovered: number[];
  overcovered: number[];
  // Out of range or repeated
  invalidRows: number[];
}

export function checkCover(
  matrix: IncidenceMatrix,
  rows: readonly number[],
  columns?: number,
): CoverCheck {
  const cols = columnCount(matrix, columns);
  const hits = new Array<number>(cols).fill(0);
  const seen = new Set<number>();
  const invalidRows: number[] = [];

  for (const r of rows) {
    if (!Number.isInteger(r) || r < 0 || r >= matrix.length || seen.has(r)) {
      invalidRows.push(r);
      continue;
    }
    seen.add(r);
    for (let c = 0; c < cols; c++) {
      if (matrix[r][c]) hits[c]++;
    }
  }

  const uncovered: number[] = [];
  const overcovered: number[] = [];
  hits.forEach((n, c) => {
    if (n === 0) uncovered.push(c);
    else if (n > 1) overcovered.push(c);
  });

  return {
    valid: uncovered.length === 0 && overcovered.length === 0 && invalidRows.length === 0,
    uncovered,
    overcovered,
    invalidRows,
  };
}
