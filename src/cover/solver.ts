import { DEFAULT_SOLVER_OPTIONS } from "./types";
import type { ExactCoverResult, IncidenceMatrix, SearchStats, SolverOptions } from "./types";
import { columnCount } from "./matrix";
import { fullView, orderColumns, reduceView, rowsCovering } from "./view";
import type { MatrixView } from "./view";

interface SearchContext {
  matrix: IncidenceMatrix;
  options: SolverOptions;
  solution: number[];
  stats: SearchStats;
  startTime: number;
  haltReason: string | null;
}

function checkHalt(ctx: SearchContext): boolean {
  if (ctx.haltReason !== null) return true;
  const { maxSearchNodes, timeoutMs, signal } = ctx.options;
  if (ctx.stats.nodes >= maxSearchNodes) {
    ctx.haltReason = `Search node budget of ${maxSearchNodes} reached.`;
  } else if (Date.now() - ctx.startTime > timeoutMs) {
    ctx.haltReason = `Search timed out after ${timeoutMs} ms.`;
  } else if (signal?.aborted) {
    ctx.haltReason = "Search aborted by caller.";
  }
  return ctx.haltReason !== null;
}

// Algorithm X over a view. Returns true once ctx.solution is an exact cover.
function search(view: MatrixView, ctx: SearchContext): boolean {
  ctx.stats.nodes++;
  ctx.stats.maxDepth = Math.max(ctx.stats.maxDepth, ctx.solution.length);

  if (view.cols.length === 0) return true;

  const order = orderColumns(ctx.matrix, view);
  if (order[0].count === 0) return false;

  const branchCols = ctx.options.branching === "first-column" ? order.slice(0, 1) : order;
  for (const { col } of branchCols) {
    for (const row of rowsCovering(ctx.matrix, view, col)) {
      if (checkHalt(ctx)) return false;

      ctx.solution.push(row);
      if (search(reduceView(ctx.matrix, view, row), ctx)) return true;
      ctx.solution.pop();
      ctx.stats.backtracks++;
    }
  }

  return false;
}

/**
 * Finds the first exact cover of `matrix` and reports how the search ended.
 * `found` is true for the empty cover of a zero-column matrix as well, which
 * is what separates it from a failed search with an equally empty solution.
 */
export function solveExactCover(
  matrix: IncidenceMatrix,
  options: Partial<SolverOptions> = {},
): ExactCoverResult {
  const ctx: SearchContext = {
    matrix,
    options: { ...DEFAULT_SOLVER_OPTIONS, ...options },
    solution: [],
    stats: { nodes: 0, backtracks: 0, maxDepth: 0 },
    startTime: Date.now(),
    haltReason: null,
  };

  const view = fullView(matrix.length, columnCount(matrix, options.columns));
  const found = search(view, ctx);

  if (found) {
    return { solution: ctx.solution, found, complete: true, stats: ctx.stats };
  }
  if (ctx.haltReason !== null) {
    return {
      solution: ctx.solution,
      found,
      complete: false,
      reason: ctx.haltReason,
      stats: ctx.stats,
    };
  }
  return {
    solution: ctx.solution,
    found,
    complete: true,
    reason: "No exact cover exists.",
    stats: ctx.stats,
  };
}

export class ExactCoverSolver {
  readonly options: SolverOptions;
  lastStats: SearchStats | null = null;

  constructor(options: Partial<SolverOptions> = {}) {
    this.options = { ...DEFAULT_SOLVER_OPTIONS, ...options };
  }

  search(matrix: IncidenceMatrix): ExactCoverResult {
    const result = solveExactCover(matrix, this.options);
    this.lastStats = result.stats;
    return result;
  }

  // Row indices of the first exact cover, [] when there is none
  solve(matrix: IncidenceMatrix): number[] {
    const result = this.search(matrix);
    if (!result.complete) {
      console.warn(`Exact cover search stopped early: ${result.reason}`);
    }
    return result.solution;
  }
}

export function exactCover(
  matrix: IncidenceMatrix,
  options: Partial<SolverOptions> = {},
): number[] {
  return new ExactCoverSolver(options).solve(matrix);
}
