import { KeyQueue, neighbourKeys, posKey } from "./board";
import {
  asMine,
  isUnknown,
  isUnrevealed,
  toActive,
  toFrontier,
  toJustObserved,
  toNone,
  toSolved,
  toVisualize,
  updateCell,
  withFocus,
} from "./cell";
import { InvariantViolationError } from "./errors";
import { RuntimeSnapshot } from "./snapshot";
import { zoneSignature } from "./zone-index";
import { ActiveFocus, FrontierFocus, LogicalState, TopologicalState } from "./types";
import type { CellRecord, CellSource, RawSymbol } from "./types";

export interface Constraint {
  key: string;
  required: number;
  // logically unrevealed neighbours, less the ones proven safe and awaiting a reveal
  unknown: string[];
  // the part of `unknown` an action may target
  frontier: string[];
}

/** Reads the mine constraint around an open number; null for any other cell. */
export function readConstraint(view: CellSource, key: string): Constraint | null {
  const cell = view.get(key);
  if (!cell || cell.logical !== LogicalState.OpenNumber || cell.numberValue === null) return null;
  let mines = 0;
  const unknown: string[] = [];
  const frontier: string[] = [];
  for (const nb of neighbourKeys(key, view.board)) {
    const n = view.get(nb);
    if (!n) continue;
    if (n.logical === LogicalState.ConfirmedMine) mines++;
    else if (isUnknown(n)) {
      unknown.push(nb);
      if (n.topology === TopologicalState.Frontier) frontier.push(nb);
    }
  }
  return { key, required: cell.numberValue - mines, unknown, frontier };
}

const WAKING = new Set<TopologicalState>([
  TopologicalState.Active,
  TopologicalState.Solved,
  TopologicalState.ToVisualize,
]);

/**
 * Drives the topological state machine on a snapshot. Every cell write goes
 * through {@link TopologyClassifier.setCell} so that zone relevance and
 * wake-ups follow each change; {@link TopologyClassifier.settle} then
 * propagates the consequences until nothing moves.
 */
export class TopologyClassifier {
  private readonly dirty = new KeyQueue();
  private woken: string[] = [];

  constructor(readonly snapshot: RuntimeSnapshot) {}

  setCell(next: CellRecord): void {
    const key = posKey(next);
    const prev = this.snapshot.get(key);
    if (!this.snapshot.set(next)) return;

    const prevZone = prev?.zoneId ?? null;
    if (prevZone !== next.zoneId) {
      if (prevZone) this.resetZone(prevZone);
      if (next.zoneId) this.resetZone(next.zoneId);
    }

    if (prev && prev.topology === next.topology && prev.logical === next.logical) return;
    if (next.topology === TopologicalState.OutOfScope) return;
    this.dirty.push(key);
    if (next.topology === TopologicalState.Active) this.woken.push(key);
    if (WAKING.has(next.topology)) this.wake(key);
  }

  /** Propagates every pending change until the neighbourhood is stable. */
  settle(): void {
    for (let key = this.dirty.shift(); key !== undefined; key = this.dirty.shift()) {
      this.reevaluate(key);
      for (const nb of neighbourKeys(key, this.snapshot.board)) this.reevaluate(nb);
    }
  }

  // ─── Decisions ────────────────────────────────────────────────────────────

  reveal(key: string, guessed = false): void {
    const cell = this.snapshot.get(key);
    if (
      !cell ||
      !isUnknown(cell) ||
      cell.topology === TopologicalState.OutOfScope ||
      cell.topology === TopologicalState.ToVisualize
    ) {
      throw new InvariantViolationError(`Cannot reveal ${key}: not an observed unknown cell.`);
    }
    this.setCell(toVisualize(cell, guessed));
  }

  flag(key: string, raw?: RawSymbol): void {
    const cell = this.snapshot.get(key);
    if (!cell || cell.logical === LogicalState.OpenNumber || cell.logical === LogicalState.Empty) {
      throw new InvariantViolationError(`Cannot mark ${key} as a mine: it is revealed.`);
    }
    const mine = asMine(cell);
    this.setCell(raw ? updateCell(mine, { raw }) : mine);
  }

  /** Applies one certain decision and settles around it. */
  resolve(key: string, mine: boolean): void {
    if (mine) this.flag(key);
    else this.reveal(key);
    this.settle();
  }

  // ─── Relevance ────────────────────────────────────────────────────────────

  markReduced(key: string): void {
    const cell = this.snapshot.get(key);
    if (cell?.topology === TopologicalState.Active) this.snapshot.set(withFocus(cell, ActiveFocus.Reduced));
  }

  markZoneProcessed(id: string): void {
    this.setZoneFocus(id, FrontierFocus.Processed);
  }

  /** Active cells woken since the last drain, oldest first. */
  drainWoken(): string[] {
    const out = this.woken;
    this.woken = [];
    return out;
  }

  // ─── Internals ────────────────────────────────────────────────────────────

  private reevaluate(key: string): void {
    const cell = this.snapshot.get(key);
    if (!cell) return;
    switch (cell.topology) {
      case TopologicalState.JustObserved:
        this.classify(cell);
        break;
      case TopologicalState.Active:
        if (!this.hasUnrevealedNeighbour(key)) this.setCell(toSolved(cell));
        break;
      case TopologicalState.Frontier: {
        const constraints = this.activeNeighbours(key);
        if (constraints.length > 0) {
          this.placeInZone(cell, constraints);
          break;
        }
        const demoted = toJustObserved(cell);
        this.setCell(demoted);
        this.classify(demoted);
        break;
      }
      case TopologicalState.None: {
        const constraints = this.activeNeighbours(key);
        if (constraints.length > 0) this.placeInZone(cell, constraints);
        break;
      }
      default:
        break;
    }
  }

  private classify(cell: CellRecord): void {
    const key = posKey(cell);
    switch (cell.logical) {
      case LogicalState.OpenNumber:
        this.setCell(this.hasUnrevealedNeighbour(key) ? toActive(cell) : toSolved(cell));
        break;
      case LogicalState.Empty:
      case LogicalState.ConfirmedMine:
        this.setCell(toSolved(cell));
        break;
      case LogicalState.Unrevealed: {
        const constraints = this.activeNeighbours(key);
        if (constraints.length > 0) this.placeInZone(cell, constraints);
        else this.setCell(toNone(cell));
        break;
      }
    }
  }

  private placeInZone(cell: CellRecord, constraints: string[]): void {
    const signature = zoneSignature(constraints);
    if (cell.topology === TopologicalState.Frontier && cell.zoneId === signature.id) return;
    this.snapshot.zones.define(signature);
    this.setCell(toFrontier(cell, signature.id));
  }

  private wake(key: string): void {
    for (const nb of neighbourKeys(key, this.snapshot.board)) {
      const cell = this.snapshot.get(nb);
      if (!cell) continue;
      if (cell.topology === TopologicalState.Active) {
        this.snapshot.set(withFocus(cell, ActiveFocus.ToReduce));
        this.woken.push(nb);
      } else if (cell.topology === TopologicalState.Frontier && cell.zoneId) {
        this.resetZone(cell.zoneId);
      }
    }
  }

  private resetZone(id: string): void {
    this.setZoneFocus(id, FrontierFocus.ToProcess);
  }

  private setZoneFocus(id: string, focus: FrontierFocus): void {
    const zone = this.snapshot.zone(id);
    if (!zone) return;
    for (const member of [...zone.members]) {
      const cell = this.snapshot.get(member);
      if (!cell) throw new InvariantViolationError(`Zone ${id} lists unknown cell ${member}.`);
      this.snapshot.set(withFocus(cell, focus));
    }
  }

  private hasUnrevealedNeighbour(key: string): boolean {
    return neighbourKeys(key, this.snapshot.board).some((nb) => {
      const n = this.snapshot.get(nb);
      return n !== undefined && isUnrevealed(n);
    });
  }

  private activeNeighbours(key: string): string[] {
    return neighbourKeys(key, this.snapshot.board).filter(
      (nb) => this.snapshot.get(nb)?.topology === TopologicalState.Active,
    );
  }
}
