import { neighbourKeys, parseKey, posKey, sortKeys } from "./board";
import { assertCell, sameCell } from "./cell";
import { auditCells, GridStore } from "./grid-store";
import type { CommitDiff, IndexedView } from "./grid-store";
import { SetOverlay } from "./set-index";
import type { SetName } from "./set-index";
import { ZoneOverlay } from "./zone-index";
import type { BoardSize, CellRecord, Pos, ZoneRecord } from "./types";

/**
 * Working copy of the store for one solve cycle. Reads fall through to the
 * store, writes stay here until {@link RuntimeSnapshot.diff} is committed.
 */
export class RuntimeSnapshot implements IndexedView {
  private readonly overlay = new Map<string, CellRecord>();
  readonly sets: SetOverlay;
  readonly zones: ZoneOverlay;
  readonly board?: BoardSize;

  constructor(private readonly store: GridStore) {
    this.board = store.board;
    this.sets = new SetOverlay(store.sets);
    this.zones = new ZoneOverlay(store.zones);
  }

  get(key: string): CellRecord | undefined {
    return this.overlay.get(key) ?? this.store.get(key);
  }

  cell(pos: Pos): CellRecord | undefined {
    return this.get(posKey(pos));
  }

  inSet(name: SetName, key: string): boolean {
    return this.sets.has(name, key);
  }

  zone(id: string): ZoneRecord | undefined {
    return this.zones.get(id);
  }

  keys(name: SetName): string[] {
    return sortKeys(this.sets.keys(name));
  }

  positions(name: SetName): Pos[] {
    return this.keys(name).map(parseKey);
  }

  /** Stores a validated record; returns false when nothing changed. */
  set(next: CellRecord): boolean {
    const key = posKey(next);
    const prev = this.get(key);
    if (prev && sameCell(prev, next)) return false;
    assertCell(next);
    this.overlay.set(key, next);
    this.sets.applyCellChange(key, next);
    this.zones.applyCellChange(key, prev, next);
    return true;
  }

  touched(): string[] {
    return sortKeys(this.overlay.keys());
  }

  /** Audits every touched cell and its neighbours, before anything is committed. */
  audit(): void {
    const region = new Set<string>();
    for (const key of this.overlay.keys()) {
      region.add(key);
      for (const nb of neighbourKeys(key, this.board)) region.add(nb);
    }
    auditCells(this, region);
  }

  diff(): CommitDiff {
    const cells: CellRecord[] = [];
    for (const key of this.touched()) {
      const next = this.overlay.get(key);
      const base = this.store.get(key);
      if (next && !(base && sameCell(base, next))) cells.push(next);
    }
    return { cells, signatures: this.zones.signatures() };
  }
}
