// ─── Cell invariants, incremental indices, store and snapshot ───────────────

import { describe, it, expect } from "vitest";
import {
  ActiveFocus,
  FrontierFocus,
  GridStore,
  InvariantViolationError,
  LogicalState,
  RuntimeSnapshot,
  SetIndex,
  SetOverlay,
  TopologicalState,
  TopologyClassifier,
  ZoneIndex,
  ZoneOverlay,
  ingestObservations,
  observedCell,
  outOfScopeCell,
  updateCell,
  zoneSignature,
} from "../src/engine/index";
import { picture } from "./helpers";

const origin = { row: 0, col: 0 };

// ─── Cell records ───────────────────────────────────────────────────────────

describe("cell records", () => {
  it("pairs open numbers with their value", () => {
    const cell = observedCell(origin, "number_4", TopologicalState.JustObserved);
    expect(cell.logical).toBe(LogicalState.OpenNumber);
    expect(cell.numberValue).toBe(4);
  });

  it("rejects a number value on a non-number cell", () => {
    const cell = observedCell(origin, "empty", TopologicalState.Solved);
    expect(() => updateCell(cell, { numberValue: 2 })).toThrow(InvariantViolationError);
  });

  it("rejects an open number without a value", () => {
    const cell = observedCell(origin, "number_1", TopologicalState.JustObserved);
    expect(() => updateCell(cell, { numberValue: null })).toThrow(InvariantViolationError);
  });

  it("rejects a revealed frontier cell", () => {
    expect(() => observedCell(origin, "number_3", TopologicalState.Frontier)).toThrow(InvariantViolationError);
  });

  it("rejects focus levels outside active and frontier", () => {
    expect(() => updateCell(outOfScopeCell(origin), { focus: FrontierFocus.ToProcess })).toThrow(
      InvariantViolationError,
    );
  });

  it("rejects an active focus on a frontier cell", () => {
    const cell = observedCell(origin, "unrevealed", TopologicalState.None);
    expect(() =>
      updateCell(cell, { topology: TopologicalState.Frontier, focus: ActiveFocus.ToReduce, zoneId: "z1" }),
    ).toThrow(InvariantViolationError);
  });

  it("keeps the guess marker to pending reveals", () => {
    const cell = observedCell(origin, "unrevealed", TopologicalState.None);
    expect(() => updateCell(cell, { guessed: true })).toThrow(InvariantViolationError);
    expect(updateCell(cell, { topology: TopologicalState.ToVisualize, guessed: true }).guessed).toBe(true);
  });
});

// ─── Overlays ───────────────────────────────────────────────────────────────

describe("SetOverlay", () => {
  it("records changes without touching the base index", () => {
    const base = new SetIndex();
    const active = updateCell(observedCell(origin, "number_1", TopologicalState.JustObserved), {
      topology: TopologicalState.Active,
      focus: ActiveFocus.ToReduce,
    });
    base.applyCellChange("0,0", active);

    const overlay = new SetOverlay(base);
    overlay.applyCellChange("0,0", updateCell(active, { topology: TopologicalState.Solved, focus: null }));

    expect(overlay.has("active", "0,0")).toBe(false);
    expect(overlay.has("revealed", "0,0")).toBe(true);
    expect(overlay.size("active")).toBe(0);
    expect(base.has("active", "0,0")).toBe(true);
  });
});

describe("ZoneOverlay", () => {
  const signature = zoneSignature(["1,1"]);
  const idle = observedCell(origin, "unrevealed", TopologicalState.None);
  const frontier = updateCell(idle, {
    topology: TopologicalState.Frontier,
    focus: FrontierFocus.ToProcess,
    zoneId: signature.id,
  });

  it("creates zones locally", () => {
    const base = new ZoneIndex();
    const overlay = new ZoneOverlay(base);
    overlay.define(signature);
    overlay.applyCellChange("0,0", idle, frontier);

    expect(overlay.ids()).toEqual([signature.id]);
    expect(overlay.get(signature.id)?.members).toEqual(new Set(["0,0"]));
    expect(overlay.signatures()).toEqual([signature]);
    expect(base.ids()).toEqual([]);
  });

  it("refuses members of an undefined zone", () => {
    expect(() => new ZoneIndex().applyCellChange("0,0", idle, frontier)).toThrow(InvariantViolationError);
  });

  it("refuses a second constraint set under one id", () => {
    const index = new ZoneIndex();
    index.define(signature);
    expect(() => index.define({ id: signature.id, constraints: ["2,2"] })).toThrow(InvariantViolationError);
  });
});

// ─── GridStore ──────────────────────────────────────────────────────────────

function committedStore(): GridStore {
  const store = new GridStore({ rows: 1, cols: 2 });
  const snapshot = new RuntimeSnapshot(store);
  const classifier = new TopologyClassifier(snapshot);
  ingestObservations(classifier, picture(["1#"]));
  classifier.settle();
  snapshot.audit();
  store.commit(snapshot.diff());
  return store;
}

describe("GridStore", () => {
  it("keeps cycle work out of the store until commit", () => {
    const store = new GridStore({ rows: 1, cols: 2 });
    const snapshot = new RuntimeSnapshot(store);
    const classifier = new TopologyClassifier(snapshot);
    ingestObservations(classifier, picture(["1#"]));
    classifier.settle();

    expect(snapshot.keys("active")).toEqual(["0,0"]);
    expect(store.size).toBe(0);
    expect(store.active()).toEqual([]);
  });

  it("updates sets and zones at commit", () => {
    const store = committedStore();
    const zone = zoneSignature(["0,0"]);

    expect(store.revealed()).toEqual([{ row: 0, col: 0 }]);
    expect(store.active()).toEqual([{ row: 0, col: 0 }]);
    expect(store.frontier()).toEqual([{ row: 0, col: 1 }]);
    expect(store.zoneList()).toEqual([{ id: zone.id, constraints: ["0,0"], members: new Set(["0,1"]) }]);
    expect(() => store.audit()).not.toThrow();
  });

  it("diffs only cells that changed", () => {
    const store = committedStore();
    const snapshot = new RuntimeSnapshot(store);
    const same = store.get("0,1");
    expect(same).toBeDefined();
    if (same) expect(snapshot.set(same)).toBe(false);
    expect(snapshot.diff()).toEqual({ cells: [], signatures: [] });
  });

  it("refuses a commit that leaves a cell just_observed", () => {
    const store = new GridStore();
    const pending = observedCell(origin, "unrevealed", TopologicalState.JustObserved);
    expect(() => store.commit({ cells: [pending], signatures: [] })).toThrow(InvariantViolationError);
  });

  it("exports regions in row-major order", () => {
    const store = committedStore();
    expect(store.exportRegion({ minRow: -2, minCol: -2, maxRow: 4, maxCol: 4 }).map((c) => c.col)).toEqual([0, 1]);

    const [cell] = store.exportRegion({ minRow: 0, minCol: 1, maxRow: 0, maxCol: 1 });
    expect(cell).toEqual({
      row: 0,
      col: 1,
      raw: "unrevealed",
      logical: LogicalState.Unrevealed,
      numberValue: null,
      topology: TopologicalState.Frontier,
      focus: FrontierFocus.ToProcess,
      zoneId: zoneSignature(["0,0"]).id,
      guessed: false,
    });
  });

  it("forgets everything on reset", () => {
    const store = committedStore();
    store.reset();
    expect(store.size).toBe(0);
    expect(store.zoneList()).toEqual([]);
    expect(store.frontier()).toEqual([]);
  });
});
