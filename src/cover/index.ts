export { ExactCoverSolver, exactCover, solveExactCover } from "./solver";
export {
  validateMatrix,
  matrixFromSubsets,
  coveredColumns,
  columnCount,
} from "./matrix";
export { checkCover } from "./verify";
export { fullView, orderColumns, reduceView, rowsCovering } from "./view";
export type { MatrixShape, BuiltMatrix } from "./matrix";
export type { CoverCheck } from "./verify";
export type { MatrixView, ColumnLoad } from "./view";
export type {
  IncidenceMatrix,
  BranchingMode,
  SolverOptions,
  SearchStats,
  ExactCoverResult,
} from "./types";
export { DEFAULT_SOLVER_OPTIONS } from "./types";
