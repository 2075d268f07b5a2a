import { inBounds, neighbourKeys, parseKey, posKey, sortKeys } from "./board";
import { assertCell, exportCell, isUnrevealed } from "./cell";
import { describePos, InvariantViolationError } from "./errors";
import { belongsTo, SET_NAMES, SetIndex } from "./set-index";
import type { SetName } from "./set-index";
import { ZoneIndex } from "./zone-index";
import type { ZoneSignature } from "./zone-index";
import { TopologicalState } from "./types";
import type { BoardSize, Bounds, CellExport, CellRecord, CellSource, Pos, ZoneRecord } from "./types";

/** Read access to cells plus their derived sets and zones. */
export interface IndexedView extends CellSource {
  inSet(name: SetName, key: string): boolean;
  zone(id: string): ZoneRecord | undefined;
}

export interface CommitDiff {
  cells: CellRecord[];
  signatures: ZoneSignature[];
}

/**
 * Persistent sparse grid. Cells, sets and zones change only through
 * {@link GridStore.commit}; everything else is a read.
 */
export class GridStore implements IndexedView {
  private readonly cells = new Map<string, CellRecord>();
  readonly sets = new SetIndex();
  readonly zones = new ZoneIndex();

  constructor(readonly board?: BoardSize) {}

  get size(): number {
    return this.cells.size;
  }

  get(key: string): CellRecord | undefined {
    return this.cells.get(key);
  }

  cell(pos: Pos): CellRecord | undefined {
    return this.cells.get(posKey(pos));
  }

  inSet(name: SetName, key: string): boolean {
    return this.sets.has(name, key);
  }

  zone(id: string): ZoneRecord | undefined {
    return this.zones.get(id);
  }

  /** Applies a snapshot diff, then audits the neighbourhood it touched. */
  commit(diff: CommitDiff): void {
    for (const signature of diff.signatures) this.zones.define(signature);
    const touched = new Set<string>();
    for (const next of diff.cells) {
      assertCell(next);
      const key = posKey(next);
      const prev = this.cells.get(key);
      this.cells.set(key, next);
      this.sets.applyCellChange(key, next);
      this.zones.applyCellChange(key, prev, next);
      touched.add(key);
    }
    this.zones.dropPending();

    const region = new Set<string>(touched);
    for (const key of touched) {
      for (const nb of neighbourKeys(key, this.board)) region.add(nb);
    }
    auditCells(this, region);
  }

  revealed(): Pos[] {
    return this.positions("revealed");
  }

  active(): Pos[] {
    return this.positions("active");
  }

  frontier(): Pos[] {
    return this.positions("frontier");
  }

  toVisualize(): Pos[] {
    return this.positions("toVisualize");
  }

  guessed(): Pos[] {
    return this.positions("guessed");
  }

  mines(): Pos[] {
    return this.positions("mines");
  }

  zoneList(): ZoneRecord[] {
    return this.zones
      .ids()
      .sort()
      .flatMap((id) => {
        const zone = this.zones.get(id);
        if (!zone) return [];
        return [{ id, constraints: [...zone.constraints], members: new Set(zone.members) }];
      });
  }

  exportRegion(bounds: Bounds): CellExport[] {
    const area = (bounds.maxRow - bounds.minRow + 1) * (bounds.maxCol - bounds.minCol + 1);
    const out: CellExport[] = [];
    if (area <= 0) return out;
    if (area < this.cells.size) {
      for (let row = bounds.minRow; row <= bounds.maxRow; row++) {
        for (let col = bounds.minCol; col <= bounds.maxCol; col++) {
          const cell = this.cells.get(posKey({ row, col }));
          if (cell) out.push(exportCell(cell));
        }
      }
      return out;
    }
    for (const key of sortKeys(this.cells.keys())) {
      const cell = this.cells.get(key);
      if (cell && inBounds(cell, bounds)) out.push(exportCell(cell));
    }
    return out;
  }

  /** Full audit; the commit path only checks what it touched. */
  audit(): void {
    const keys = new Set<string>(this.cells.keys());
    for (const name of SET_NAMES) {
      for (const key of this.sets.keys(name)) keys.add(key);
    }
    for (const id of this.zones.ids()) {
      for (const key of this.zones.get(id)?.members ?? []) keys.add(key);
    }
    auditCells(this, keys);
  }

  reset(): void {
    this.cells.clear();
    this.sets.clear();
    this.zones.clear();
  }

  private positions(name: SetName): Pos[] {
    return sortKeys(this.sets.keys(name)).map(parseKey);
  }
}

// ─── Invariant audit ────────────────────────────────────────────────────────

export function auditCells(view: IndexedView, keys: Iterable<string>): void {
  for (const key of keys) {
    const cell = view.get(key);
    const pos = parseKey(key);
    if (!cell) {
      for (const name of SET_NAMES) {
        if (view.inSet(name, key)) {
          throw new InvariantViolationError(`Set ${name} holds unknown cell ${describePos(pos)}.`, pos);
        }
      }
      continue;
    }
    auditCell(view, key, cell);
  }
}

function auditCell(view: IndexedView, key: string, cell: CellRecord): void {
  const pos = { row: cell.row, col: cell.col };
  const fail = (rule: string): never => {
    throw new InvariantViolationError(`Cell ${describePos(pos)}: ${rule}.`, pos);
  };

  assertCell(cell);
  if (cell.topology === TopologicalState.JustObserved) fail("left just_observed");

  for (const name of SET_NAMES) {
    if (view.inSet(name, key) !== belongsTo(name, cell)) fail(`set ${name} out of sync`);
  }

  const around = neighbourKeys(key, view.board).flatMap((nb) => {
    const n = view.get(nb);
    return n ? [n] : [];
  });

  if (cell.topology === TopologicalState.Active && !around.some(isUnrevealed)) {
    fail("active without an unrevealed neighbour");
  }

  if (cell.topology !== TopologicalState.Frontier || cell.zoneId === null) return;

  const constraints = sortKeys(
    around.filter((n) => n.topology === TopologicalState.Active).map((n) => posKey(n)),
  );
  if (constraints.length === 0) fail("frontier without an active neighbour");

  const zone = view.zone(cell.zoneId);
  if (!zone || !zone.members.has(key)) fail(`missing from zone ${cell.zoneId}`);
  else {
    if (zone.constraints.join(";") !== constraints.join(";")) fail(`stale zone ${cell.zoneId}`);
    for (const member of zone.members) {
      const other = view.get(member);
      if (!other || other.zoneId !== cell.zoneId) fail(`zone ${cell.zoneId} lists foreign cell ${member}`);
      else if (other.focus !== cell.focus) fail(`zone ${cell.zoneId} has mixed relevance`);
    }
  }
}
