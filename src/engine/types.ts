export interface Pos {
  row: number;
  col: number;
}

export type NumberValue = 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8;

// What perception last read off the board
export type RawSymbol =
  | "unrevealed"
  | `number_${NumberValue}`
  | "flag"
  | "question"
  | "empty"
  | "decor"
  | "exploded";

export enum LogicalState {
  OpenNumber = "open_number",
  ConfirmedMine = "confirmed_mine",
  Empty = "empty",
  Unrevealed = "unrevealed",
}

export enum TopologicalState {
  ToVisualize = "to_visualize",
  JustObserved = "just_observed",
  Active = "active",
  Frontier = "frontier",
  Solved = "solved",
  None = "none",
  OutOfScope = "out_of_scope",
}

export enum ActiveFocus {
  ToReduce = "to_reduce",
  Reduced = "reduced",
}

export enum FrontierFocus {
  ToProcess = "to_process",
  Processed = "processed",
}

export type FocusLevel = ActiveFocus | FrontierFocus;

export interface CellRecord {
  readonly row: number;
  readonly col: number;
  readonly raw: RawSymbol;
  readonly logical: LogicalState;
  readonly numberValue: NumberValue | null;
  readonly topology: TopologicalState;
  // only while active/frontier
  readonly focus: FocusLevel | null;
  // only while frontier
  readonly zoneId: string | null;
  // pending reveal chosen by a guess, not proven safe; only while to_visualize
  readonly guessed: boolean;
}

export interface Observation extends Pos {
  symbol: RawSymbol;
}

export interface Bounds {
  minRow: number;
  minCol: number;
  maxRow: number;
  maxCol: number;
}

export interface BoardSize {
  rows: number;
  cols: number;
}

export type ActionKind = "safe" | "mine" | "guess";
export type ActionSource = "reducer" | "component" | "guess";

export interface SolverAction extends Pos {
  kind: ActionKind;
  source: ActionSource;
  probability?: number;
}

export interface Decision extends Pos {
  mine: boolean;
}

export interface ZoneRecord {
  id: string;
  constraints: string[];
  members: Set<string>;
}

export interface CycleStats {
  observed: Partial<Record<RawSymbol, number>>;
  reducerSafe: number;
  reducerMines: number;
  componentSafe: number;
  componentMines: number;
  zones: number;
  components: number;
  solvedComponents: number;
  deferredComponents: number;
  solutions: number;
  bypassedComponents: boolean;
  guessed: boolean;
}

export interface CycleResult {
  actions: SolverAction[];
  sweep: Pos[];
  stats: CycleStats;
}

// Plain serialisable cell export for tooling and overlays
export interface CellExport {
  row: number;
  col: number;
  raw: RawSymbol;
  logical: LogicalState;
  numberValue: number | null;
  topology: TopologicalState;
  focus: FocusLevel | null;
  zoneId: string | null;
  guessed: boolean;
}

export interface FrontierMetrics {
  size: number;
  pendingZones: number;
  processedZones: number;
  mineDensity: number;
  bbox: Bounds | null;
}

// Read access shared by the store and the per-cycle snapshot
export interface CellSource {
  readonly board?: BoardSize;
  get(key: string): CellRecord | undefined;
}
