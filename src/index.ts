export {Board} from './sudoku/board';
export {
  ALL_CANDIDATES,
  type Candidates,
  NO_CANDIDATES,
  candidatesOf,
  countNums,
  hasNum,
  numsOf,
  singleNum,
} from './sudoku/candidates';
export {
  InvalidPuzzleError,
  SearchLimitError,
  SolverError,
  UnsolvableError,
} from './sudoku/errors';
export {type Conflict, Grid, type ReadonlyGrid} from './sudoku/grid';
export {Loc} from './sudoku/loc';
export {propagate} from './sudoku/propagate';
export {
  DEFAULT_RULES,
  type Rule,
  RuleResult,
  elimination,
  hiddenSingle,
  nakedPair,
  nakedSingle,
} from './sudoku/rules';
export {
  type SearchOptions,
  type SearchStats,
  chooseLoc,
  emptyStats,
  search,
} from './sudoku/search';
export {
  type SolveOptions,
  type SolveReport,
  solve,
  solveReport,
} from './sudoku/solver';
export {Sudoku, type SudokuRecord} from './sudoku/sudoku';
export {
  type Unit,
  UnitKind,
  Units,
  VARIANTS,
  type Variant,
  describeUnit,
  isVariant,
} from './sudoku/units';
export {
  type LogLevel,
  getLogLevel,
  getMaxSteps,
  setLogLevel,
  setMaxSteps,
} from './system/config';
export {
  type EventParams,
  type EventSink,
  EventType,
  logEvent,
  setEventSink,
} from './system/log';
