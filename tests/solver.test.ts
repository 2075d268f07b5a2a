// ─── Component solver ───────────────────────────────────────────────────────

import { describe, it, expect } from "vitest";
import {
  ComponentSolver,
  GridStore,
  RuntimeSnapshot,
  Session,
  TopologyClassifier,
  UnsatisfiableComponentError,
  UnsatisfiableConstraintError,
  buildComponents,
  enumerateComponent,
  ingestObservations,
  silentLogger,
} from "../src/engine/index";
import type { Component } from "../src/engine/index";
import { picture, randomLayout } from "./helpers";

// a + b + c + d = 1 and b + c + d + e = 2: a is always safe, e always a mine
const overlapping: Component = {
  zones: ["za", "zbcd", "ze"],
  cells: ["0,0", "0,1", "0,2", "0,3", "0,4"],
  constraints: [
    { key: "1,0", vars: [0, 1, 2, 3], lo: 1, hi: 1 },
    { key: "1,1", vars: [1, 2, 3, 4], lo: 2, hi: 2 },
  ],
  signature: "overlapping",
};

const contradictory: Component = {
  zones: ["z"],
  cells: ["0,0", "0,1"],
  constraints: [
    { key: "1,0", vars: [0, 1], lo: 1, hi: 1 },
    { key: "1,1", vars: [0, 1], lo: 2, hi: 2 },
  ],
  signature: "contradictory",
};

const limits = { maxComponentVariables: 24, maxSearchNodes: 100_000 };

// ─── Enumeration ────────────────────────────────────────────────────────────

describe("enumerateComponent", () => {
  it("counts every solution by mine count", () => {
    const result = enumerateComponent(overlapping, 100_000);

    expect(result.complete).toBe(true);
    expect(result.solutions).toBe(3);
    expect(result.byMines).toEqual([0, 0, 3, 0, 0, 0]);
    expect(result.onesByMines[0]).toEqual([0, 0, 0, 0, 0, 0]);
    expect(result.onesByMines[1]).toEqual([0, 0, 1, 0, 0, 0]);
    expect(result.onesByMines[4]).toEqual([0, 0, 3, 0, 0, 0]);
  });

  it("honours lower bounds below the upper bound", () => {
    const ranged: Component = {
      zones: ["z"],
      cells: ["0,0", "0,1"],
      constraints: [{ key: "1,0", vars: [0, 1], lo: 0, hi: 1 }],
      signature: "ranged",
    };
    const result = enumerateComponent(ranged, 1000);
    expect(result.solutions).toBe(3);
    expect(result.byMines).toEqual([1, 2, 0]);
  });

  it("stops at the node budget", () => {
    const result = enumerateComponent(overlapping, 3);
    expect(result.complete).toBe(false);
  });

  it("finds no solution for contradictory constraints", () => {
    const result = enumerateComponent(contradictory, 1000);
    expect(result.complete).toBe(true);
    expect(result.solutions).toBe(0);
  });

  it("matches brute force on random boards", () => {
    let compared = 0;
    for (let seed = 100; seed < 130; seed++) {
      const layout = randomLayout(seed, 5, 5, 6);
      const classifier = new TopologyClassifier(new RuntimeSnapshot(new GridStore({ rows: 5, cols: 5 })));
      ingestObservations(classifier, layout.observations);
      classifier.settle();

      for (const component of buildComponents(classifier.snapshot)) {
        const n = component.cells.length;
        if (n > 14) continue;
        let solutions = 0;
        const ones = new Array<number>(n).fill(0);
        for (let mask = 0; mask < 1 << n; mask++) {
          const fits = component.constraints.every((c) => {
            const sum = c.vars.reduce((s, v) => s + ((mask >> v) & 1), 0);
            return sum >= c.lo && sum <= c.hi;
          });
          if (!fits) continue;
          solutions++;
          for (let i = 0; i < n; i++) ones[i] += (mask >> i) & 1;
        }

        const result = enumerateComponent(component, 10_000_000);
        expect(result.solutions).toBe(solutions);
        expect(result.onesByMines.map((row) => row.reduce((a, b) => a + b, 0))).toEqual(ones);
        compared++;
      }
    }
    expect(compared).toBeGreaterThan(0);
  });
});

// ─── ComponentSolver ────────────────────────────────────────────────────────

describe("ComponentSolver", () => {
  it("emits the always-safe and always-mined cells of a component", () => {
    const session = new Session({ board: { rows: 3, cols: 4 } }, silentLogger);
    const result = session.runCycle(picture(["####", ".12.", ".#.."]));

    expect(result.actions).toEqual([
      { row: 0, col: 0, kind: "safe", source: "component" },
      { row: 0, col: 3, kind: "mine", source: "component" },
    ]);
    expect(result.stats).toMatchObject({
      reducerSafe: 0,
      reducerMines: 0,
      componentSafe: 1,
      componentMines: 1,
      components: 1,
      solvedComponents: 1,
      solutions: 3,
      zones: 1,
      guessed: false,
    });
    expect(result.stats.observed).toEqual({ unrevealed: 5, empty: 5, number_1: 1, number_2: 1 });
    expect(session.frontier()).toEqual([
      { row: 0, col: 1 },
      { row: 0, col: 2 },
      { row: 2, col: 1 },
    ]);
  });

  it("raises on a component with no solution", () => {
    const session = new Session({ board: { rows: 3, cols: 3 } }, silentLogger);
    let error: unknown;
    try {
      session.runCycle(picture(["#1#", "1.1", ".#."]));
    } catch (e) {
      error = e;
    }
    expect(error).toBeInstanceOf(UnsatisfiableComponentError);
    expect(error).toBeInstanceOf(UnsatisfiableConstraintError);
    if (error instanceof UnsatisfiableComponentError) {
      expect(error.code).toBe("UNSATISFIABLE_COMPONENT");
      expect(error.cells).toEqual([
        { row: 0, col: 0 },
        { row: 0, col: 2 },
        { row: 2, col: 1 },
      ]);
    }
    expect(session.revealed()).toEqual([]);
    expect(session.cycleCount).toBe(0);
  });

  it("raises instead of returning an empty enumeration", () => {
    expect(() => new ComponentSolver(limits).tryEnumerate(contradictory)).toThrow(UnsatisfiableComponentError);
  });

  it("defers oversized components", () => {
    const solver = new ComponentSolver({ maxComponentVariables: 4, maxSearchNodes: 100_000 });
    expect(solver.tryEnumerate(overlapping)).toBeNull();
    expect(solver.cacheSize).toBe(0);
  });

  it("defers components that run out of search budget", () => {
    const solver = new ComponentSolver({ maxComponentVariables: 24, maxSearchNodes: 3 });
    expect(solver.tryEnumerate(overlapping)).toBeNull();
  });

  it("caches enumerations until a cycle stops asking for them", () => {
    const solver = new ComponentSolver(limits);
    const first = solver.tryEnumerate(overlapping);
    expect(solver.tryEnumerate(overlapping)).toBe(first);
    expect(solver.cacheSize).toBe(1);

    solver.endCycle();
    expect(solver.cacheSize).toBe(1);
    solver.endCycle();
    expect(solver.cacheSize).toBe(0);
  });
});
