import { posKey } from "./board";
import { exportCell } from "./cell";
import { parseConfig, parseObservations } from "./config";
import type { SolverConfig, SolverConfigInput } from "./config";
import { GridStore } from "./grid-store";
import { chooseGuess } from "./guess";
import { ingestObservations } from "./ingest";
import { createConsoleLogger } from "./logger";
import type { Logger } from "./logger";
import { frontierMetrics } from "./metrics";
import { FrontierReducer } from "./reducer";
import { RuntimeSnapshot } from "./snapshot";
import { buildComponents, ComponentSolver } from "./solver";
import { buildSweepTargets } from "./sweep";
import { TopologyClassifier } from "./topology";
import type {
  Bounds,
  CellExport,
  CycleResult,
  CycleStats,
  Decision,
  FrontierMetrics,
  Pos,
  SolverAction,
  ZoneRecord,
} from "./types";

function toActions(decisions: Decision[], source: "reducer" | "component"): SolverAction[] {
  return decisions.map((d): SolverAction => ({ row: d.row, col: d.col, kind: d.mine ? "mine" : "safe", source }));
}

/**
 * One solver session over one board. Owns the grid store; every call to
 * {@link Session.runCycle} works on a fresh snapshot and commits it only
 * when the whole cycle succeeds.
 */
export class Session {
  readonly config: SolverConfig;
  private readonly logger: Logger;
  private readonly store: GridStore;
  private readonly components: ComponentSolver;
  private cycles = 0;

  constructor(config: SolverConfigInput = {}, logger?: Logger) {
    this.config = parseConfig(config);
    this.logger = logger ?? createConsoleLogger(this.config.logLevel);
    this.store = new GridStore(this.config.board);
    this.components = new ComponentSolver(
      {
        maxComponentVariables: this.config.maxComponentVariables,
        maxSearchNodes: this.config.maxSearchNodes,
      },
      this.logger,
    );
  }

  get cycleCount(): number {
    return this.cycles;
  }

  /**
   * Ingests one observation batch and returns the actions it allows.
   * Throws {@link InvalidObservationError} for a malformed batch,
   * {@link InvariantViolationError} for an impossible observation, and
   * {@link UnsatisfiableConstraintError} (or its subclass
   * {@link UnsatisfiableComponentError}) for a contradictory board. The store
   * is left untouched on every throw.
   */
  runCycle(batch: unknown): CycleResult {
    const observations = parseObservations(batch, this.config.board);
    const snapshot = new RuntimeSnapshot(this.store);
    const classifier = new TopologyClassifier(snapshot);

    const observed = ingestObservations(classifier, observations);
    classifier.settle();

    const frontierSize = snapshot.sets.size("frontier");
    const reduced = new FrontierReducer(classifier, this.logger).reduce();
    const actions = toActions(reduced, "reducer");

    const stats: CycleStats = {
      observed,
      reducerSafe: reduced.filter((d) => !d.mine).length,
      reducerMines: reduced.filter((d) => d.mine).length,
      componentSafe: 0,
      componentMines: 0,
      zones: 0,
      components: 0,
      solvedComponents: 0,
      deferredComponents: 0,
      solutions: 0,
      bypassedComponents: false,
      guessed: false,
    };

    const ratio = this.config.cspBypassRatio;
    stats.bypassedComponents = ratio !== undefined && frontierSize > 0 && reduced.length / frontierSize >= ratio;
    if (!stats.bypassedComponents) {
      const pass = this.components.solve(classifier);
      actions.push(...toActions(pass.decisions, "component"));
      stats.componentSafe = pass.decisions.filter((d) => !d.mine).length;
      stats.componentMines = pass.decisions.filter((d) => d.mine).length;
      stats.components = pass.components;
      stats.solvedComponents = pass.solved;
      stats.deferredComponents = pass.deferred;
      stats.solutions = pass.solutions;
    } else {
      this.logger.debug(`component stage bypassed: ${reduced.length} reducer decisions over ${frontierSize} frontier cells`);
    }

    if (actions.length === 0 && this.config.allowGuess) {
      const guess = chooseGuess({
        snapshot,
        components: buildComponents(snapshot),
        enumerate: (component) => this.components.tryEnumerate(component),
        board: this.config.board,
        totalMines: this.config.totalMines,
        logger: this.logger,
      });
      if (guess) {
        classifier.reveal(guess.key, true);
        classifier.settle();
        actions.push({
          row: guess.row,
          col: guess.col,
          kind: "guess",
          source: "guess",
          ...(guess.probability === null ? {} : { probability: guess.probability }),
        });
        stats.guessed = true;
      }
    }

    const sweep = this.config.emitSweep ? buildSweepTargets(snapshot, snapshot.keys("toVisualize")) : [];
    stats.zones = snapshot.zones.size;

    snapshot.audit();
    this.store.commit(snapshot.diff());
    this.components.endCycle();
    this.cycles++;
    this.logger.debug(
      `cycle ${this.cycles}: ${observations.length} observations, ${actions.length} actions, ${stats.zones} zones`,
    );
    return { actions, sweep, stats };
  }

  // ─── Queries ──────────────────────────────────────────────────────────────

  revealed(): Pos[] {
    return this.store.revealed();
  }

  active(): Pos[] {
    return this.store.active();
  }

  frontier(): Pos[] {
    return this.store.frontier();
  }

  toVisualize(): Pos[] {
    return this.store.toVisualize();
  }

  /** Pending reveals that came from a guess; still unknown to every constraint. */
  guessed(): Pos[] {
    return this.store.guessed();
  }

  mines(): Pos[] {
    return this.store.mines();
  }

  cell(pos: Pos): CellExport | undefined {
    const cell = this.store.get(posKey(pos));
    return cell ? exportCell(cell) : undefined;
  }

  zones(): ZoneRecord[] {
    return this.store.zoneList();
  }

  exportRegion(bounds: Bounds): CellExport[] {
    return this.store.exportRegion(bounds);
  }

  frontierMetrics(): FrontierMetrics {
    return frontierMetrics(this.store);
  }

  /** Full invariant audit of the committed state. */
  audit(): void {
    this.store.audit();
  }

  reset(): void {
    this.store.reset();
    this.components.clear();
    this.cycles = 0;
  }
}
