import { numberSymbol, toNumberValue } from "../src/engine/index";
import type { Observation, RawSymbol } from "../src/engine/index";

const SYMBOLS: Record<string, RawSymbol> = {
  "#": "unrevealed",
  ".": "empty",
  F: "flag",
  "?": "question",
  "*": "exploded",
  "1": "number_1",
  "2": "number_2",
  "3": "number_3",
  "4": "number_4",
  "5": "number_5",
  "6": "number_6",
  "7": "number_7",
  "8": "number_8",
};

// One observation per character; a space leaves the cell unobserved
export function picture(rows: string[], origin = { row: 0, col: 0 }): Observation[] {
  const out: Observation[] = [];
  rows.forEach((line, r) => {
    [...line].forEach((ch, c) => {
      if (ch === " ") return;
      const symbol = SYMBOLS[ch];
      if (!symbol) throw new Error(`Unknown picture symbol "${ch}"`);
      out.push({ row: origin.row + r, col: origin.col + c, symbol });
    });
  });
  return out;
}

export function lcg(seed: number): () => number {
  let s = seed >>> 0;
  return () => {
    s = (s * 1664525 + 1013904223) >>> 0;
    return s / 2 ** 32;
  };
}

export interface Layout {
  rows: number;
  cols: number;
  mines: Set<string>;
  observations: Observation[];
}

// Random mine layout with roughly half of the safe cells revealed
export function randomLayout(seed: number, rows: number, cols: number, mineCount: number): Layout {
  const rng = lcg(seed);
  const mines = new Set<string>();
  while (mines.size < mineCount) {
    mines.add(`${Math.floor(rng() * rows)},${Math.floor(rng() * cols)}`);
  }
  const observations: Observation[] = [];
  for (let row = 0; row < rows; row++) {
    for (let col = 0; col < cols; col++) {
      const key = `${row},${col}`;
      if (mines.has(key) || rng() < 0.5) {
        observations.push({ row, col, symbol: "unrevealed" });
        continue;
      }
      let around = 0;
      for (let dr = -1; dr <= 1; dr++) {
        for (let dc = -1; dc <= 1; dc++) {
          if ((dr !== 0 || dc !== 0) && mines.has(`${row + dr},${col + dc}`)) around++;
        }
      }
      const n = toNumberValue(around);
      observations.push({ row, col, symbol: n === null ? "empty" : numberSymbol(n) });
    }
  }
  return { rows, cols, mines, observations };
}
