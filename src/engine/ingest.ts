import { neighbours, posKey, symbolLogicalState, symbolNumber } from "./board";
import { observedCell, outOfScopeCell, updateCell } from "./cell";
import { describePos, InvariantViolationError } from "./errors";
import { TopologyClassifier } from "./topology";
import { LogicalState, TopologicalState } from "./types";
import type { CellRecord, Observation, RawSymbol } from "./types";

export type SymbolCounts = Partial<Record<RawSymbol, number>>;

/**
 * Writes one observation batch into the classifier's snapshot. Later entries
 * for the same cell win. Cells that change meaning land in just_observed (or
 * solved for a visible mine); neighbours never seen before are materialised
 * as out_of_scope. Call settle() afterwards.
 */
export function ingestObservations(classifier: TopologyClassifier, batch: Observation[]): SymbolCounts {
  const latest = new Map<string, Observation>();
  for (const obs of batch) {
    const key = posKey(obs);
    latest.delete(key);
    latest.set(key, obs);
  }

  const counts: SymbolCounts = {};
  const snapshot = classifier.snapshot;
  for (const [key, obs] of latest) {
    counts[obs.symbol] = (counts[obs.symbol] ?? 0) + 1;
    const prev = snapshot.get(key);
    if (!prev || prev.topology === TopologicalState.OutOfScope) {
      if (symbolLogicalState(obs.symbol) === LogicalState.ConfirmedMine) {
        classifier.setCell(observedCell(obs, obs.symbol, TopologicalState.Solved));
      } else {
        classifier.setCell(observedCell(obs, obs.symbol, TopologicalState.JustObserved));
      }
    } else {
      reobserve(classifier, prev, obs.symbol);
    }

    for (const nb of neighbours(obs, snapshot.board)) {
      if (!snapshot.cell(nb)) classifier.setCell(outOfScopeCell(nb));
    }
  }
  return counts;
}

function reobserve(classifier: TopologyClassifier, prev: CellRecord, symbol: RawSymbol): void {
  const key = posKey(prev);
  const logical = symbolLogicalState(symbol);
  const numberValue = symbolNumber(symbol);
  const unchanged = prev.logical === logical && prev.numberValue === numberValue;

  if (prev.topology === TopologicalState.Solved) {
    // a decided mine may still read unrevealed until the actuator flags it
    if (unchanged || (prev.logical === LogicalState.ConfirmedMine && logical === LogicalState.Unrevealed)) {
      classifier.setCell(updateCell(prev, { raw: symbol }));
      return;
    }
    throw new InvariantViolationError(
      `Solved cell ${describePos(prev)} (${prev.logical}) re-observed as ${symbol}.`,
      { row: prev.row, col: prev.col },
    );
  }

  if (logical === LogicalState.ConfirmedMine) {
    classifier.flag(key, symbol);
    return;
  }

  if (unchanged && prev.topology !== TopologicalState.ToVisualize) {
    classifier.setCell(updateCell(prev, { raw: symbol }));
    return;
  }

  classifier.setCell(
    updateCell(prev, {
      raw: symbol,
      logical,
      numberValue,
      topology: TopologicalState.JustObserved,
      focus: null,
      zoneId: null,
      guessed: false,
    }),
  );
}
