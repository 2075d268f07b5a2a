import { neighbourKeys, parseKey, sortKeys } from "./board";
import type { IndexedView } from "./grid-store";
import { readConstraint } from "./topology";
import type { Pos } from "./types";

/**
 * Active cells next to a pending reveal that still miss mines. Clicking one
 * again refreshes the area around it; nothing here changes state.
 */
export function buildSweepTargets(view: IndexedView, pending: Iterable<string>): Pos[] {
  const targets = new Set<string>();
  for (const key of pending) {
    for (const nb of neighbourKeys(key, view.board)) {
      if (targets.has(nb) || !view.inSet("active", nb)) continue;
      const constraint = readConstraint(view, nb);
      if (constraint && constraint.required > 0) targets.add(nb);
    }
  }
  return sortKeys(targets).map(parseKey);
}
