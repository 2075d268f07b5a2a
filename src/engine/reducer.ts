import { KeyQueue, parseKey, posKey, sortKeys } from "./board";
import { describePos, UnsatisfiableConstraintError } from "./errors";
import { silentLogger } from "./logger";
import type { Logger } from "./logger";
import { readConstraint, TopologyClassifier } from "./topology";
import type { Constraint } from "./topology";
import { ActiveFocus, TopologicalState } from "./types";
import type { Decision } from "./types";

/**
 * Deterministic local inference over active cells: the unit rule on each
 * constraint, then subset inference against every active cell within two
 * steps. Runs to a fixed point; decisions land in the snapshot as they are
 * found.
 */
export class FrontierReducer {
  constructor(
    private readonly classifier: TopologyClassifier,
    private readonly logger: Logger = silentLogger,
  ) {}

  reduce(): Decision[] {
    const snapshot = this.classifier.snapshot;
    const seed = snapshot
      .keys("active")
      .filter((key) => snapshot.get(key)?.focus === ActiveFocus.ToReduce);
    const queue = new KeyQueue(seed);
    this.classifier.drainWoken();

    const decisions: Decision[] = [];
    for (let key = queue.shift(); key !== undefined; key = queue.shift()) {
      const cell = snapshot.get(key);
      if (!cell || cell.topology !== TopologicalState.Active || cell.focus !== ActiveFocus.ToReduce) continue;

      const found = this.inspect(key);
      if (found.size === 0) {
        this.classifier.markReduced(key);
        continue;
      }
      for (const target of sortKeys(found.keys())) {
        const mine = found.get(target) === true;
        this.classifier.resolve(target, mine);
        decisions.push({ ...parseKey(target), mine });
      }
      queue.push(key);
      for (const woken of this.classifier.drainWoken()) queue.push(woken);
    }

    this.logger.debug(`reducer: ${decisions.length} decisions`);
    return decisions;
  }

  // Certain decisions around one active cell, keyed by target
  private inspect(key: string): Map<string, boolean> {
    const snapshot = this.classifier.snapshot;
    const own = this.constraint(key);
    const found = new Map<string, boolean>();
    const decide = (targets: string[], mine: boolean) => {
      for (const target of targets) {
        if (snapshot.get(target)?.topology !== TopologicalState.Frontier) continue;
        if (found.get(target) === !mine) {
          throw new UnsatisfiableConstraintError(
            `Cell ${describePos(parseKey(target))} is both safe and a mine around ${describePos(parseKey(key))}.`,
            [parseKey(target)],
          );
        }
        found.set(target, mine);
      }
    };

    if (own.unknown.length === 0) return found;
    if (own.required === 0) decide(own.frontier, false);
    else if (own.required === own.unknown.length) decide(own.frontier, true);

    const centre = parseKey(key);
    for (let row = centre.row - 2; row <= centre.row + 2; row++) {
      for (let col = centre.col - 2; col <= centre.col + 2; col++) {
        const other = posKey({ row, col });
        if (other === key || !snapshot.inSet("active", other)) continue;
        const partner = this.constraint(other);
        this.subset(own, partner, decide);
        this.subset(partner, own, decide);
      }
    }
    return found;
  }

  // small ⊆ big: the cells big has on top of small hold exactly the difference
  private subset(small: Constraint, big: Constraint, decide: (targets: string[], mine: boolean) => void): void {
    if (small.unknown.length === 0 || small.unknown.length >= big.unknown.length) return;
    const inBig = new Set(big.unknown);
    if (!small.unknown.every((k) => inBig.has(k))) return;

    const inSmall = new Set(small.unknown);
    const rest = big.unknown.filter((k) => !inSmall.has(k));
    const diff = big.required - small.required;
    if (diff < 0 || diff > rest.length) {
      throw new UnsatisfiableConstraintError(
        `Constraints at ${describePos(parseKey(small.key))} and ${describePos(parseKey(big.key))} contradict.`,
        [parseKey(small.key), parseKey(big.key)],
      );
    }
    if (diff === 0) decide(rest, false);
    else if (diff === rest.length) decide(rest, true);
  }

  private constraint(key: string): Constraint {
    const constraint = readConstraint(this.classifier.snapshot, key);
    if (!constraint) {
      throw new UnsatisfiableConstraintError(`Active cell ${describePos(parseKey(key))} carries no number.`);
    }
    if (constraint.required < 0 || constraint.required > constraint.unknown.length) {
      throw new UnsatisfiableConstraintError(
        `Cell ${describePos(parseKey(key))} needs ${constraint.required} mines among ${constraint.unknown.length} unknown neighbours.`,
        [parseKey(key)],
      );
    }
    return constraint;
  }
}
