import { comparePos, parseKey } from "./board";
import { silentLogger } from "./logger";
import type { Logger } from "./logger";
import { RuntimeSnapshot } from "./snapshot";
import type { Component, Enumeration } from "./solver";
import { readConstraint } from "./topology";
import type { Constraint } from "./topology";
import { TopologicalState } from "./types";
import type { BoardSize, Pos } from "./types";

export interface GuessCandidate extends Pos {
  key: string;
  // null when nothing bounds the estimate (idle cell, no mine budget)
  probability: number | null;
}

export interface GuessInput {
  snapshot: RuntimeSnapshot;
  components: Component[];
  enumerate: (component: Component) => Enumeration | null;
  board?: BoardSize;
  totalMines?: number;
  logger?: Logger;
}

export function logChoose(n: number, k: number): number {
  if (n < 0 || k < 0 || k > n) return Number.NEGATIVE_INFINITY;
  const r = Math.min(k, n - k);
  let sum = 0;
  for (let i = 0; i < r; i++) sum += Math.log(n - i) - Math.log(i + 1);
  return sum;
}

function clamp01(v: number): number {
  return Math.max(0, Math.min(1, v));
}

/**
 * Relative weight of each mine count m of one component, given how many
 * mines the rest of the board is expected to hold: C(B, R - others - m).
 * Null when every count is impossible.
 */
export function mineCountWeights(
  byMines: number[],
  background: number,
  remaining: number,
  others: number,
): number[] | null {
  const logs = byMines.map((count, m) =>
    count > 0 ? logChoose(background, remaining - others - m) : Number.NEGATIVE_INFINITY,
  );
  const top = Math.max(...logs);
  if (top === Number.NEGATIVE_INFINITY) return null;
  return logs.map((l) => (l === Number.NEGATIVE_INFINITY ? 0 : Math.exp(l - top)));
}

interface Weighted {
  probabilities: number[];
  expectedMines: number;
}

function weigh(enumeration: Enumeration, weights: number[] | null): Weighted {
  const w = (m: number) => (weights ? weights[m] : 1);
  let total = 0;
  let expected = 0;
  enumeration.byMines.forEach((count, m) => {
    total += w(m) * count;
    expected += w(m) * m * count;
  });
  const probabilities = enumeration.onesByMines.map((ones) => {
    let mined = 0;
    ones.forEach((count, m) => {
      mined += w(m) * count;
    });
    return total > 0 ? mined / total : 0;
  });
  return { probabilities, expectedMines: total > 0 ? expected / total : 0 };
}

function meanMines(enumeration: Enumeration): number {
  let sum = 0;
  enumeration.byMines.forEach((count, m) => {
    sum += m * count;
  });
  return enumeration.solutions > 0 ? sum / enumeration.solutions : 0;
}

// Average share of missing mines over the constraints around a cell
function localRisk(snapshot: RuntimeSnapshot, key: string): number {
  let riskSum = 0;
  let evidence = 0;
  for (const constraint of zoneConstraints(snapshot, key)) {
    if (constraint.unknown.length === 0) continue;
    riskSum += clamp01(constraint.required / constraint.unknown.length);
    evidence++;
  }
  return evidence > 0 ? riskSum / evidence : 1;
}

function zoneConstraints(snapshot: RuntimeSnapshot, key: string): Constraint[] {
  const zoneId = snapshot.get(key)?.zoneId;
  const constraints = zoneId ? snapshot.zone(zoneId)?.constraints ?? [] : [];
  return constraints.flatMap((c) => {
    const constraint = readConstraint(snapshot, c);
    return constraint ? [constraint] : [];
  });
}

/**
 * Least risky cell to reveal when nothing is certain: lowest estimated mine
 * probability, ties broken by row then column.
 */
export function chooseGuess(input: GuessInput): GuessCandidate | null {
  const { snapshot, board, totalMines } = input;
  const logger = input.logger ?? silentLogger;

  const enumerated: Array<{ component: Component; enumeration: Enumeration }> = [];
  const deferred: Component[] = [];
  for (const component of input.components) {
    const enumeration = input.enumerate(component);
    if (enumeration) enumerated.push({ component, enumeration });
    else deferred.push(component);
  }

  const candidates: GuessCandidate[] = [];
  const push = (key: string, probability: number | null) => {
    candidates.push({ ...parseKey(key), key, probability });
  };

  let backgroundProbability: number | null = null;
  if (board && totalMines !== undefined) {
    const remaining = totalMines - snapshot.sets.size("mines");
    const unknown =
      board.rows * board.cols -
      snapshot.sets.size("revealed") -
      snapshot.sets.size("mines") -
      (snapshot.sets.size("toVisualize") - snapshot.sets.size("guessed"));
    const background = unknown - enumerated.reduce((sum, e) => sum + e.component.cells.length, 0);
    const means = enumerated.map((e) => Math.round(meanMines(e.enumeration)));
    const meanTotal = means.reduce((a, b) => a + b, 0);

    let expectedTotal = 0;
    enumerated.forEach(({ component, enumeration }, i) => {
      const weights = mineCountWeights(enumeration.byMines, background, remaining, meanTotal - means[i]);
      if (!weights) {
        logger.warn(`mine budget rules out every solution of a ${component.cells.length}-cell component; weighting uniformly`);
      }
      const weighted = weigh(enumeration, weights);
      expectedTotal += weighted.expectedMines;
      component.cells.forEach((key, j) => push(key, weighted.probabilities[j]));
    });
    if (background > 0) backgroundProbability = clamp01((remaining - expectedTotal) / background);
  } else {
    for (const { component, enumeration } of enumerated) {
      const weighted = weigh(enumeration, null);
      component.cells.forEach((key, j) => push(key, weighted.probabilities[j]));
    }
  }

  for (const component of deferred) {
    for (const key of component.cells) push(key, localRisk(snapshot, key));
  }

  const idle = firstIdle(snapshot);
  if (idle && (backgroundProbability !== null || candidates.length === 0)) push(idle, backgroundProbability);

  if (candidates.length === 0) return null;
  candidates.sort((a, b) => {
    const pa = a.probability ?? Number.POSITIVE_INFINITY;
    const pb = b.probability ?? Number.POSITIVE_INFINITY;
    if (pa !== pb) return pa - pb;
    return comparePos(a, b);
  });
  return candidates[0];
}

function firstIdle(snapshot: RuntimeSnapshot): string | null {
  let best: string | null = null;
  let bestPos: Pos | null = null;
  for (const key of snapshot.sets.keys("idle")) {
    if (snapshot.get(key)?.topology !== TopologicalState.None) continue;
    const pos = parseKey(key);
    if (!bestPos || comparePos(pos, bestPos) < 0) {
      best = key;
      bestPos = pos;
    }
  }
  return best;
}
