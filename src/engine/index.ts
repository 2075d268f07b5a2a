export { Session } from "./session";
export { GridStore, auditCells } from "./grid-store";
export type { CommitDiff, IndexedView } from "./grid-store";
export { RuntimeSnapshot } from "./snapshot";
export { TopologyClassifier, readConstraint } from "./topology";
export type { Constraint } from "./topology";
export { ingestObservations } from "./ingest";
export type { SymbolCounts } from "./ingest";
export { FrontierReducer } from "./reducer";
export { ComponentSolver, buildComponents, enumerateComponent } from "./solver";
export type { Component, ComponentConstraint, ComponentPass, Enumeration, SolverLimits } from "./solver";
export { chooseGuess, logChoose, mineCountWeights } from "./guess";
export type { GuessCandidate, GuessInput } from "./guess";
export { buildSweepTargets } from "./sweep";
export { frontierMetrics } from "./metrics";
export { SetIndex, SetOverlay, SET_NAMES, belongsTo } from "./set-index";
export type { SetName } from "./set-index";
export { ZoneIndex, ZoneOverlay, zoneSignature } from "./zone-index";
export type { ZoneSignature } from "./zone-index";
export {
  posKey,
  parseKey,
  comparePos,
  compareKeys,
  sortKeys,
  neighbours,
  neighbourKeys,
  boundingBox,
  symbolLogicalState,
  symbolNumber,
  numberSymbol,
  toNumberValue,
  KeyQueue,
} from "./board";
export {
  assertCell,
  observedCell,
  outOfScopeCell,
  updateCell,
  exportCell,
} from "./cell";
export {
  parseConfig,
  parseObservations,
  SolverConfigSchema,
  ObservationSchema,
  ObservationBatchSchema,
  DEFAULT_CONFIG,
} from "./config";
export type { SolverConfig, SolverConfigInput } from "./config";
export { createConsoleLogger, silentLogger } from "./logger";
export type { Logger, LogLevel } from "./logger";
export {
  SolverError,
  InvariantViolationError,
  UnsatisfiableConstraintError,
  UnsatisfiableComponentError,
  InvalidObservationError,
  InvalidConfigError,
} from "./errors";
export type { SolverErrorCode } from "./errors";
export { LogicalState, TopologicalState, ActiveFocus, FrontierFocus } from "./types";
export type {
  Pos,
  NumberValue,
  RawSymbol,
  FocusLevel,
  CellRecord,
  CellExport,
  CellSource,
  Observation,
  Bounds,
  BoardSize,
  ActionKind,
  ActionSource,
  SolverAction,
  Decision,
  ZoneRecord,
  CycleStats,
  CycleResult,
  FrontierMetrics,
} from "./types";
