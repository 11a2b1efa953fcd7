// Row i, column j: true when subset i contains element j
export type IncidenceMatrix = readonly (readonly boolean[])[];

export type BranchingMode = "every-column" | "first-column";

export interface SolverOptions {
  // Universe size; needed when the matrix has no rows to read it from
  columns?: number;
  branching: BranchingMode;
  maxSearchNodes: number;
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface SearchStats {
  nodes: number;
  backtracks: number;
  maxDepth: number;
}

export interface ExactCoverResult {
  // Original 0-based row indices, in the order they were chosen
  solution: number[];
  found: boolean;
  complete: boolean;
  reason?: string;
  stats: SearchStats;
}

/** Default options: exhaustive search, no limits */
export const DEFAULT_SOLVER_OPTIONS: SolverOptions = {
  branching: "every-column",
  maxSearchNodes: Number.POSITIVE_INFINITY,
  timeoutMs: Number.POSITIVE_INFINITY,
};
