import type { IncidenceMatrix } from "./types";

// Live original row/column indices at one level of the search
export interface MatrixView {
  rows: number[];
  cols: number[];
}

export interface ColumnLoad {
  col: number;
  count: number;
}

function range(n: number): number[] {
  return Array.from({ length: n }, (_, i) => i);
}

export function fullView(rows: number, cols: number): MatrixView {
  return { rows: range(rows), cols: range(cols) };
}

export function rowsCovering(matrix: IncidenceMatrix, view: MatrixView, col: number): number[] {
  return view.rows.filter((r) => matrix[r][col]);
}

/**
 * Live columns ordered by how many live rows cover them, fewest first.
 * Array.prototype.sort is stable, so ties keep original column order.
 */
export function orderColumns(matrix: IncidenceMatrix, view: MatrixView): ColumnLoad[] {
  const loads = view.cols.map((col) => {
    let count = 0;
    for (const r of view.rows) {
      if (matrix[r][col]) count++;
    }
    return { col, count };
  });
  return loads.sort((a, b) => a.count - b.count);
}

/**
 * The view left after committing `row`: its columns are satisfied, and any
 * row touching one of them would cover it twice.
 */
export function reduceView(matrix: IncidenceMatrix, view: MatrixView, row: number): MatrixView {
  const removed: number[] = [];
  const cols: number[] = [];
  for (const c of view.cols) {
    if (matrix[row][c]) removed.push(c);
    else cols.push(c);
  }
  const rows = view.rows.filter((r) => !removed.some((c) => matrix[r][c]));
  return { rows, cols };
}
