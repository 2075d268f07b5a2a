import { symbolLogicalState, symbolNumber } from "./board";
import { describePos, InvariantViolationError } from "./errors";
import { ActiveFocus, FrontierFocus, LogicalState, TopologicalState } from "./types";
import type { CellExport, CellRecord, FocusLevel, Pos, RawSymbol } from "./types";

type CellPatch = Partial<Omit<CellRecord, "row" | "col">>;

export function isActiveFocus(focus: FocusLevel | null): focus is ActiveFocus {
  return focus === ActiveFocus.ToReduce || focus === ActiveFocus.Reduced;
}

export function isFrontierFocus(focus: FocusLevel | null): focus is FrontierFocus {
  return focus === FrontierFocus.ToProcess || focus === FrontierFocus.Processed;
}

/** Throws unless the record satisfies every per-cell pairing rule. */
export function assertCell(cell: CellRecord): void {
  const fail = (rule: string) => {
    throw new InvariantViolationError(`Cell ${describePos(cell)}: ${rule}.`, { row: cell.row, col: cell.col });
  };

  if (!Number.isInteger(cell.row) || !Number.isInteger(cell.col)) fail("coordinates must be integers");

  if (cell.logical === LogicalState.OpenNumber) {
    if (cell.numberValue === null) fail("open_number without a number value");
  } else if (cell.numberValue !== null) {
    fail(`${cell.logical} carries number ${cell.numberValue}`);
  }

  switch (cell.topology) {
    case TopologicalState.Active:
      if (cell.logical !== LogicalState.OpenNumber) fail("active cell is not an open number");
      if (!isActiveFocus(cell.focus)) fail(`active cell has focus ${String(cell.focus)}`);
      break;
    case TopologicalState.Frontier:
      if (cell.logical !== LogicalState.Unrevealed) fail("frontier cell is not unrevealed");
      if (!isFrontierFocus(cell.focus)) fail(`frontier cell has focus ${String(cell.focus)}`);
      if (cell.zoneId === null) fail("frontier cell without a zone");
      break;
    case TopologicalState.Solved:
      if (cell.logical === LogicalState.Unrevealed) fail("solved cell is still unrevealed");
      break;
    case TopologicalState.ToVisualize:
    case TopologicalState.None:
    case TopologicalState.OutOfScope:
      if (cell.logical !== LogicalState.Unrevealed) fail(`${cell.topology} cell is ${cell.logical}`);
      break;
    case TopologicalState.JustObserved:
      break;
  }

  if (cell.topology !== TopologicalState.Active && cell.topology !== TopologicalState.Frontier) {
    if (cell.focus !== null) fail(`focus ${cell.focus} set on a ${cell.topology} cell`);
  }
  if (cell.topology !== TopologicalState.Frontier && cell.zoneId !== null) {
    fail(`zone set on a ${cell.topology} cell`);
  }
  if (cell.guessed && cell.topology !== TopologicalState.ToVisualize) {
    fail(`guess marker set on a ${cell.topology} cell`);
  }
}

export function updateCell(cell: CellRecord, patch: CellPatch): CellRecord {
  const next: CellRecord = { ...cell, ...patch };
  assertCell(next);
  return next;
}

export function observedCell(pos: Pos, raw: RawSymbol, topology: TopologicalState): CellRecord {
  return updateCell(
    {
      row: pos.row,
      col: pos.col,
      raw,
      logical: LogicalState.Unrevealed,
      numberValue: null,
      topology: TopologicalState.JustObserved,
      focus: null,
      zoneId: null,
      guessed: false,
    },
    { logical: symbolLogicalState(raw), numberValue: symbolNumber(raw), topology },
  );
}

export function outOfScopeCell(pos: Pos): CellRecord {
  return observedCell(pos, "unrevealed", TopologicalState.OutOfScope);
}

// ─── Transitions ────────────────────────────────────────────────────────────

export function toActive(cell: CellRecord): CellRecord {
  return updateCell(cell, {
    topology: TopologicalState.Active,
    focus: ActiveFocus.ToReduce,
    zoneId: null,
    guessed: false,
  });
}

export function toFrontier(cell: CellRecord, zoneId: string): CellRecord {
  return updateCell(cell, {
    topology: TopologicalState.Frontier,
    focus: FrontierFocus.ToProcess,
    zoneId,
    guessed: false,
  });
}

export function toSolved(cell: CellRecord): CellRecord {
  return updateCell(cell, { topology: TopologicalState.Solved, focus: null, zoneId: null, guessed: false });
}

export function toNone(cell: CellRecord): CellRecord {
  return updateCell(cell, { topology: TopologicalState.None, focus: null, zoneId: null, guessed: false });
}

export function toJustObserved(cell: CellRecord): CellRecord {
  return updateCell(cell, { topology: TopologicalState.JustObserved, focus: null, zoneId: null, guessed: false });
}

export function toVisualize(cell: CellRecord, guessed = false): CellRecord {
  return updateCell(cell, { topology: TopologicalState.ToVisualize, focus: null, zoneId: null, guessed });
}

export function asMine(cell: CellRecord): CellRecord {
  return updateCell(cell, {
    logical: LogicalState.ConfirmedMine,
    numberValue: null,
    topology: TopologicalState.Solved,
    focus: null,
    zoneId: null,
    guessed: false,
  });
}

export function withFocus(cell: CellRecord, focus: FocusLevel): CellRecord {
  if (cell.focus === focus) return cell;
  return updateCell(cell, { focus });
}

export function sameCell(a: CellRecord, b: CellRecord): boolean {
  return (
    a.row === b.row &&
    a.col === b.col &&
    a.raw === b.raw &&
    a.logical === b.logical &&
    a.numberValue === b.numberValue &&
    a.topology === b.topology &&
    a.focus === b.focus &&
    a.zoneId === b.zoneId &&
    a.guessed === b.guessed
  );
}

export function isUnrevealed(cell: CellRecord): boolean {
  return cell.logical === LogicalState.Unrevealed;
}

// unknown to the constraints unless a reveal is pending because it was proven safe
export function isUnknown(cell: CellRecord): boolean {
  if (cell.logical !== LogicalState.Unrevealed) return false;
  return cell.topology !== TopologicalState.ToVisualize || cell.guessed;
}

export function exportCell(cell: CellRecord): CellExport {
  return {
    row: cell.row,
    col: cell.col,
    raw: cell.raw,
    logical: cell.logical,
    numberValue: cell.numberValue,
    topology: cell.topology,
    focus: cell.focus,
    zoneId: cell.zoneId,
    guessed: cell.guessed,
  };
}
