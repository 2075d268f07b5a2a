import { boundingBox, neighbourKeys, parseKey } from "./board";
import { GridStore } from "./grid-store";
import { FrontierFocus, LogicalState } from "./types";
import type { FocusLevel, FrontierMetrics } from "./types";

// Planner-facing summary of the committed frontier
export function frontierMetrics(store: GridStore): FrontierMetrics {
  const frontier = Array.from(store.sets.keys("frontier"));

  let pendingZones = 0;
  let processedZones = 0;
  for (const id of store.zones.ids()) {
    let focus: FocusLevel | null = null;
    for (const member of store.zones.get(id)?.members ?? []) {
      focus = store.get(member)?.focus ?? null;
      break;
    }
    if (focus === FrontierFocus.ToProcess) pendingZones++;
    else if (focus === FrontierFocus.Processed) processedZones++;
  }

  const mines = new Set<string>();
  for (const key of frontier) {
    for (const nb of neighbourKeys(key, store.board)) {
      if (store.get(nb)?.logical === LogicalState.ConfirmedMine) mines.add(nb);
    }
  }
  const touched = mines.size + frontier.length;

  return {
    size: frontier.length,
    pendingZones,
    processedZones,
    mineDensity: touched > 0 ? mines.size / touched : 0,
    bbox: boundingBox(frontier.map(parseKey)),
  };
}
