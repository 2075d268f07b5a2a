import { LogicalState } from "./types";
import type { BoardSize, Bounds, NumberValue, Pos, RawSymbol } from "./types";

const NUMBER_SYMBOL = /^number_([1-8])$/;
const NUMBER_VALUES: readonly NumberValue[] = [1, 2, 3, 4, 5, 6, 7, 8];

export function posKey(pos: Pos): string {
  return `${pos.row},${pos.col}`;
}

export function parseKey(key: string): Pos {
  const sep = key.indexOf(",");
  return { row: Number(key.slice(0, sep)), col: Number(key.slice(sep + 1)) };
}

export function comparePos(a: Pos, b: Pos): number {
  if (a.row !== b.row) return a.row - b.row;
  return a.col - b.col;
}

export function compareKeys(a: string, b: string): number {
  return comparePos(parseKey(a), parseKey(b));
}

export function sortKeys(keys: Iterable<string>): string[] {
  return Array.from(keys).sort(compareKeys);
}

export function inBoard(pos: Pos, board?: BoardSize): boolean {
  if (!board) return true;
  return pos.row >= 0 && pos.row < board.rows && pos.col >= 0 && pos.col < board.cols;
}

const DELTAS: ReadonlyArray<{ dr: number; dc: number }> = (() => {
  const deltas: Array<{ dr: number; dc: number }> = [];
  for (let dr = -1; dr <= 1; dr++) {
    for (let dc = -1; dc <= 1; dc++) {
      if (dr === 0 && dc === 0) continue;
      deltas.push({ dr, dc });
    }
  }
  return deltas;
})();

// 8-neighbourhood on a plane, clipped to the board when it is finite
export function neighbours(pos: Pos, board?: BoardSize): Pos[] {
  const result: Pos[] = [];
  for (const { dr, dc } of DELTAS) {
    const p = { row: pos.row + dr, col: pos.col + dc };
    if (inBoard(p, board)) result.push(p);
  }
  return result;
}

export function neighbourKeys(key: string, board?: BoardSize): string[] {
  return neighbours(parseKey(key), board).map(posKey);
}

export function inBounds(pos: Pos, bounds: Bounds): boolean {
  return (
    pos.row >= bounds.minRow &&
    pos.row <= bounds.maxRow &&
    pos.col >= bounds.minCol &&
    pos.col <= bounds.maxCol
  );
}

export function boundingBox(positions: Iterable<Pos>): Bounds | null {
  let box: Bounds | null = null;
  for (const p of positions) {
    if (!box) {
      box = { minRow: p.row, minCol: p.col, maxRow: p.row, maxCol: p.col };
      continue;
    }
    box.minRow = Math.min(box.minRow, p.row);
    box.minCol = Math.min(box.minCol, p.col);
    box.maxRow = Math.max(box.maxRow, p.row);
    box.maxCol = Math.max(box.maxCol, p.col);
  }
  return box;
}

export function numberSymbol(n: NumberValue): RawSymbol {
  return `number_${n}`;
}

export function symbolNumber(symbol: RawSymbol): NumberValue | null {
  const m = NUMBER_SYMBOL.exec(symbol);
  if (!m) return null;
  return toNumberValue(Number(m[1]));
}

export function toNumberValue(n: number): NumberValue | null {
  return NUMBER_VALUES.find((v) => v === n) ?? null;
}

export function symbolLogicalState(symbol: RawSymbol): LogicalState {
  switch (symbol) {
    case "empty":
    case "decor":
      return LogicalState.Empty;
    case "flag":
    case "exploded":
      return LogicalState.ConfirmedMine;
    case "unrevealed":
    case "question":
      return LogicalState.Unrevealed;
    default:
      return LogicalState.OpenNumber;
  }
}

/**
 * FIFO of coordinate keys; a key already waiting is not queued twice.
 */
export class KeyQueue {
  private readonly items: string[] = [];
  private readonly waiting = new Set<string>();
  private head = 0;

  constructor(seed: Iterable<string> = []) {
    for (const key of seed) this.push(key);
  }

  get empty(): boolean {
    return this.head >= this.items.length;
  }

  push(key: string): void {
    if (this.waiting.has(key)) return;
    this.waiting.add(key);
    this.items.push(key);
  }

  shift(): string | undefined {
    if (this.empty) return undefined;
    const key = this.items[this.head++];
    this.waiting.delete(key);
    return key;
  }
}
