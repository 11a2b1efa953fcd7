import type { IncidenceMatrix } from "./types";

export type MatrixShape =
  | { valid: true; rows: number; cols: number }
  | { valid: false; reason: string };

export type BuiltMatrix =
  | { matrix: boolean[][]; columns: number }
  | { error: string };

export function columnCount(matrix: IncidenceMatrix, columns?: number): number {
  return columns ?? matrix[0]?.length ?? 0;
}

/**
 * Checks that `matrix` is rectangular and boolean. An explicit `columns`
 * count is required to describe the universe of a matrix with no rows, and
 * must agree with the row length otherwise.
 */
export function validateMatrix(matrix: IncidenceMatrix, columns?: number): MatrixShape {
  if (columns !== undefined && (!Number.isInteger(columns) || columns < 0)) {
    return { valid: false, reason: `Column count must be a non-negative integer, got ${columns}.` };
  }
  const cols = columnCount(matrix, columns);

  for (let r = 0; r < matrix.length; r++) {
    const row = matrix[r];
    if (row.length !== cols) {
      return {
        valid: false,
        reason: `Row ${r} has ${row.length} entries, expected ${cols}.`,
      };
    }
    for (let c = 0; c < cols; c++) {
      if (typeof row[c] !== "boolean") {
        return { valid: false, reason: `Entry (${r}, ${c}) is not a boolean.` };
      }
    }
  }

  return { valid: true, rows: matrix.length, cols };
}

export function matrixFromSubsets<T>(
  universe: readonly T[],
  subsets: readonly (readonly T[])[],
): BuiltMatrix {
  const columnOf = new Map<T, number>();
  universe.forEach((element, c) => {
    if (!columnOf.has(element)) columnOf.set(element, c);
  });
  if (columnOf.size !== universe.length) {
    return { error: "Universe contains duplicate elements." };
  }

  const matrix: boolean[][] = [];
  for (let r = 0; r < subsets.length; r++) {
    const row = new Array<boolean>(universe.length).fill(false);
    for (const element of subsets[r]) {
      const c = columnOf.get(element);
      if (c === undefined) {
        return { error: `Subset ${r} contains ${String(element)}, which is not in the universe.` };
      }
      row[c] = true;
    }
    matrix.push(row);
  }

  return { matrix, columns: universe.length };
}

export function coveredColumns(matrix: IncidenceMatrix, row: number): number[] {
  const cols: number[] = [];
  matrix[row].forEach((covers, c) => {
    if (covers) cols.push(c);
  });
  return cols;
}
