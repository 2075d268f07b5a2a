import { compareKeys, parseKey, sortKeys } from "./board";
import { InvariantViolationError, UnsatisfiableComponentError } from "./errors";
import { silentLogger } from "./logger";
import type { Logger } from "./logger";
import { RuntimeSnapshot } from "./snapshot";
import { readConstraint, TopologyClassifier } from "./topology";
import { FrontierFocus } from "./types";
import type { Decision } from "./types";

export interface ComponentConstraint {
  key: string;
  // indices into Component.cells
  vars: number[];
  lo: number;
  hi: number;
}

/** Zones linked by shared constraint cells, as one boolean system. */
export interface Component {
  zones: string[];
  cells: string[];
  constraints: ComponentConstraint[];
  signature: string;
}

export interface Enumeration {
  solutions: number;
  // solutions by mine count
  byMines: number[];
  // per cell, solutions with that cell mined, by mine count
  onesByMines: number[][];
  complete: boolean;
  nodes: number;
}

export interface SolverLimits {
  maxComponentVariables: number;
  maxSearchNodes: number;
}

export interface ComponentPass {
  decisions: Decision[];
  components: number;
  solved: number;
  deferred: number;
  solutions: number;
}

export function buildComponents(snapshot: RuntimeSnapshot): Component[] {
  const zoneIds = snapshot.zones.ids().sort();
  const zonesByConstraint = new Map<string, string[]>();
  for (const id of zoneIds) {
    for (const key of snapshot.zones.get(id)?.constraints ?? []) {
      const list = zonesByConstraint.get(key);
      if (list) list.push(id);
      else zonesByConstraint.set(key, [id]);
    }
  }

  const visited = new Set<string>();
  const components: Component[] = [];
  for (const start of zoneIds) {
    if (visited.has(start)) continue;

    const compZones = new Set<string>();
    const compConstraints = new Set<string>();
    const queue: string[] = [start];
    visited.add(start);
    for (let id = queue.pop(); id !== undefined; id = queue.pop()) {
      compZones.add(id);
      for (const key of snapshot.zones.get(id)?.constraints ?? []) {
        if (compConstraints.has(key)) continue;
        compConstraints.add(key);
        for (const other of zonesByConstraint.get(key) ?? []) {
          if (!visited.has(other)) {
            visited.add(other);
            queue.push(other);
          }
        }
      }
    }

    const members: string[] = [];
    for (const id of compZones) members.push(...(snapshot.zones.get(id)?.members ?? []));
    const cells = sortKeys(members);
    const index = new Map<string, number>();
    cells.forEach((key, i) => index.set(key, i));

    const constraints = sortKeys(compConstraints).map((key): ComponentConstraint => {
      const c = readConstraint(snapshot, key);
      if (!c) throw new InvariantViolationError(`Zone constraint ${key} is not an open number.`, parseKey(key));
      const vars = c.frontier.flatMap((k) => {
        const i = index.get(k);
        return i === undefined ? [] : [i];
      });
      const outside = c.unknown.length - vars.length;
      return { key, vars, lo: Math.max(0, c.required - outside), hi: c.required };
    });

    components.push({
      zones: Array.from(compZones).sort(),
      cells,
      constraints,
      signature: `${cells.join("|")}#${constraints.map((c) => `${c.key}:${c.lo}:${c.hi}`).join("|")}`,
    });
  }
  return components.sort((a, b) => compareKeys(a.cells[0], b.cells[0]));
}

/**
 * Exhaustive backtracking over mine/safe assignments of one component,
 * counting solutions per mine count and per cell. Stops early, marking the
 * result incomplete, once maxNodes search nodes have been visited.
 */
export function enumerateComponent(component: Component, maxNodes: number): Enumeration {
  const n = component.cells.length;
  const eqVars = component.constraints.map((c) => c.vars);
  const eqLo = component.constraints.map((c) => c.lo);
  const eqHi = component.constraints.map((c) => c.hi);
  const eCount = eqVars.length;

  const varToEq = Array.from({ length: n }, (): number[] => []);
  for (let ei = 0; ei < eCount; ei++) {
    for (const vi of eqVars[ei]) varToEq[vi].push(ei);
  }

  const assign = new Array<number>(n).fill(0);
  const assigned = new Array<boolean>(n).fill(false);
  const eqAssigned = new Array<number>(eCount).fill(0);
  const eqUnassigned = eqVars.map((vs) => vs.length);
  const byMines = new Array<number>(n + 1).fill(0);
  const onesByMines = Array.from({ length: n }, () => new Array<number>(n + 1).fill(0));

  let assignedCount = 0;
  let mines = 0;
  let nodes = 0;
  let complete = true;
  let solutions = 0;

  function eqFeasible(ei: number): boolean {
    return eqAssigned[ei] <= eqHi[ei] && eqAssigned[ei] + eqUnassigned[ei] >= eqLo[ei];
  }

  function canPlace(vi: number, val: number): boolean {
    for (const ei of varToEq[vi]) {
      const sum = eqAssigned[ei] + val;
      if (sum > eqHi[ei] || sum + eqUnassigned[ei] - 1 < eqLo[ei]) return false;
    }
    return true;
  }

  // most constrained first, lowest index on ties
  function pickVar(): number {
    let best = -1;
    let bestScore = -1;
    for (let i = 0; i < n; i++) {
      if (assigned[i]) continue;
      const score = varToEq[i].length;
      if (score > bestScore) {
        best = i;
        bestScore = score;
      }
    }
    return best;
  }

  function assignVar(vi: number, val: number): void {
    assigned[vi] = true;
    assign[vi] = val;
    assignedCount++;
    mines += val;
    for (const ei of varToEq[vi]) {
      eqAssigned[ei] += val;
      eqUnassigned[ei]--;
    }
  }

  function unassignVar(vi: number, val: number): void {
    assigned[vi] = false;
    assign[vi] = 0;
    assignedCount--;
    mines -= val;
    for (const ei of varToEq[vi]) {
      eqAssigned[ei] -= val;
      eqUnassigned[ei]++;
    }
  }

  function recordSolution(): void {
    solutions++;
    byMines[mines]++;
    for (let i = 0; i < n; i++) {
      if (assign[i] === 1) onesByMines[i][mines]++;
    }
  }

  function dfs(): void {
    nodes++;
    if (nodes > maxNodes) {
      complete = false;
      return;
    }
    if (assignedCount === n) {
      recordSolution();
      return;
    }

    const vi = pickVar();
    for (const v of [0, 1]) {
      if (!canPlace(vi, v)) continue;
      assignVar(vi, v);
      dfs();
      unassignVar(vi, v);
      if (!complete) return;
    }
  }

  let feasible = true;
  for (let ei = 0; ei < eCount; ei++) {
    if (!eqFeasible(ei)) feasible = false;
  }
  if (feasible) dfs();

  return { solutions, byMines, onesByMines, complete, nodes };
}

/**
 * Exact stage of the pipeline: partitions the working zones into
 * components, searches the ones with pending zones, applies the certain
 * cells. Enumerations are cached by constraint-system signature and evicted
 * once a cycle no longer produces that system.
 */
export class ComponentSolver {
  private readonly cache = new Map<string, Enumeration>();
  private readonly seen = new Set<string>();

  constructor(
    private readonly limits: SolverLimits,
    private readonly logger: Logger = silentLogger,
  ) {}

  get cacheSize(): number {
    return this.cache.size;
  }

  solve(classifier: TopologyClassifier): ComponentPass {
    const snapshot = classifier.snapshot;
    const components = buildComponents(snapshot);
    const pass: ComponentPass = { decisions: [], components: components.length, solved: 0, deferred: 0, solutions: 0 };

    for (const component of components) {
      const pending = component.zones.some((id) => zoneFocus(snapshot, id) === FrontierFocus.ToProcess);
      if (!pending) continue;

      const enumeration = this.tryEnumerate(component);
      if (!enumeration) {
        pass.deferred++;
        continue;
      }
      pass.solved++;
      pass.solutions += enumeration.solutions;

      const certain: Array<{ key: string; mine: boolean }> = [];
      component.cells.forEach((key, i) => {
        const ones = enumeration.onesByMines[i].reduce((a, b) => a + b, 0);
        if (ones === 0) certain.push({ key, mine: false });
        else if (ones === enumeration.solutions) certain.push({ key, mine: true });
      });

      for (const id of component.zones) classifier.markZoneProcessed(id);
      for (const { key, mine } of certain) {
        classifier.resolve(key, mine);
        pass.decisions.push({ ...parseKey(key), mine });
      }
    }

    this.logger.debug(
      `components: ${pass.components} total, ${pass.solved} solved, ${pass.deferred} deferred, ${pass.decisions.length} decisions`,
    );
    return pass;
  }

  /**
   * Enumeration of a component small enough to search completely, or null.
   * Throws when a complete search finds no solution at all.
   */
  tryEnumerate(component: Component): Enumeration | null {
    const size = component.cells.length;
    if (size > this.limits.maxComponentVariables) {
      this.logger.info(`component of ${size} cells deferred: over ${this.limits.maxComponentVariables} variables`);
      return null;
    }

    this.seen.add(component.signature);
    let enumeration = this.cache.get(component.signature);
    if (!enumeration) {
      enumeration = enumerateComponent(component, this.limits.maxSearchNodes);
      this.cache.set(component.signature, enumeration);
    }

    if (!enumeration.complete) {
      this.logger.info(`component of ${size} cells deferred: search budget of ${this.limits.maxSearchNodes} nodes spent`);
      return null;
    }
    if (enumeration.solutions === 0) {
      throw new UnsatisfiableComponentError(component.cells.map(parseKey), component.constraints.map((c) => parseKey(c.key)));
    }
    return enumeration;
  }

  /** Drops cached enumerations no cycle asked for since the last call. */
  endCycle(): void {
    for (const signature of [...this.cache.keys()]) {
      if (!this.seen.has(signature)) this.cache.delete(signature);
    }
    this.seen.clear();
  }

  clear(): void {
    this.cache.clear();
    this.seen.clear();
  }
}

function zoneFocus(snapshot: RuntimeSnapshot, id: string): FrontierFocus | null {
  for (const member of snapshot.zones.get(id)?.members ?? []) {
    const focus = snapshot.get(member)?.focus;
    if (focus === FrontierFocus.ToProcess || focus === FrontierFocus.Processed) return focus;
  }
  return null;
}
