import { LogicalState, TopologicalState } from "./types";
import type { CellRecord } from "./types";

// idle: observed, unrevealed, next to no active cell
// guessed: the part of toVisualize a guess put there
export type SetName = "revealed" | "active" | "frontier" | "toVisualize" | "guessed" | "mines" | "idle";

export const SET_NAMES: readonly SetName[] = [
  "revealed",
  "active",
  "frontier",
  "toVisualize",
  "guessed",
  "mines",
  "idle",
];

export function belongsTo(name: SetName, cell: CellRecord): boolean {
  switch (name) {
    case "revealed":
      return cell.logical === LogicalState.OpenNumber || cell.logical === LogicalState.Empty;
    case "active":
      return cell.topology === TopologicalState.Active;
    case "frontier":
      return cell.topology === TopologicalState.Frontier;
    case "toVisualize":
      return cell.topology === TopologicalState.ToVisualize;
    case "guessed":
      return cell.topology === TopologicalState.ToVisualize && cell.guessed;
    case "mines":
      return cell.logical === LogicalState.ConfirmedMine;
    case "idle":
      return cell.topology === TopologicalState.None;
  }
}

/**
 * Derived coordinate sets, maintained one cell change at a time so that no
 * query ever needs a full-grid scan.
 */
export class SetIndex {
  private readonly sets: Record<SetName, Set<string>> = {
    revealed: new Set(),
    active: new Set(),
    frontier: new Set(),
    toVisualize: new Set(),
    guessed: new Set(),
    mines: new Set(),
    idle: new Set(),
  };

  applyCellChange(key: string, next: CellRecord): void {
    for (const name of SET_NAMES) {
      if (belongsTo(name, next)) this.sets[name].add(key);
      else this.sets[name].delete(key);
    }
  }

  has(name: SetName, key: string): boolean {
    return this.sets[name].has(key);
  }

  size(name: SetName): number {
    return this.sets[name].size;
  }

  keys(name: SetName): IterableIterator<string> {
    return this.sets[name].values();
  }

  clear(): void {
    for (const name of SET_NAMES) this.sets[name].clear();
  }
}

/**
 * Copy-on-write view of a SetIndex: records additions and removals against
 * a base index without touching it.
 */
export class SetOverlay {
  private readonly added: Record<SetName, Set<string>> = {
    revealed: new Set(),
    active: new Set(),
    frontier: new Set(),
    toVisualize: new Set(),
    guessed: new Set(),
    mines: new Set(),
    idle: new Set(),
  };
  private readonly removed: Record<SetName, Set<string>> = {
    revealed: new Set(),
    active: new Set(),
    frontier: new Set(),
    toVisualize: new Set(),
    guessed: new Set(),
    mines: new Set(),
    idle: new Set(),
  };

  constructor(private readonly base: SetIndex) {}

  applyCellChange(key: string, next: CellRecord): void {
    for (const name of SET_NAMES) {
      const inBase = this.base.has(name, key);
      if (belongsTo(name, next)) {
        this.removed[name].delete(key);
        if (!inBase) this.added[name].add(key);
      } else {
        this.added[name].delete(key);
        if (inBase) this.removed[name].add(key);
      }
    }
  }

  has(name: SetName, key: string): boolean {
    if (this.added[name].has(key)) return true;
    if (this.removed[name].has(key)) return false;
    return this.base.has(name, key);
  }

  size(name: SetName): number {
    return this.base.size(name) + this.added[name].size - this.removed[name].size;
  }

  keys(name: SetName): string[] {
    const out: string[] = [];
    for (const key of this.base.keys(name)) {
      if (!this.removed[name].has(key)) out.push(key);
    }
    for (const key of this.added[name]) out.push(key);
    return out;
  }
}
