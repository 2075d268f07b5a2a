import { createHash } from "node:crypto";
import { sortKeys } from "./board";
import { InvariantViolationError } from "./errors";
import { TopologicalState } from "./types";
import type { CellRecord, ZoneRecord } from "./types";

export interface ZoneSignature {
  id: string;
  constraints: string[];
}

// Stable id of a constraint set: same active neighbours, same zone
export function zoneSignature(constraintKeys: Iterable<string>): ZoneSignature {
  const constraints = sortKeys(new Set(constraintKeys));
  const digest = createHash("sha1").update(constraints.join(";")).digest("hex");
  return { id: `z${digest.slice(0, 16)}`, constraints };
}

function zoneOf(cell: CellRecord | undefined): string | null {
  if (!cell || cell.topology !== TopologicalState.Frontier) return null;
  return cell.zoneId;
}

/**
 * Zone membership bookkeeping shared by the persistent index and the
 * per-cycle overlay. Subclasses decide where records live.
 */
abstract class ZoneTable {
  private readonly pending = new Map<string, string[]>();

  protected abstract read(id: string): ZoneRecord | undefined;
  protected abstract mutable(id: string): ZoneRecord | undefined;
  protected abstract write(id: string, zone: ZoneRecord | null): void;
  abstract ids(): string[];

  get(id: string): ZoneRecord | undefined {
    return this.read(id);
  }

  get size(): number {
    return this.ids().length;
  }

  define(signature: ZoneSignature): void {
    const known = this.read(signature.id)?.constraints ?? this.pending.get(signature.id);
    if (known && known.join(";") !== signature.constraints.join(";")) {
      throw new InvariantViolationError(`Zone id ${signature.id} maps to two constraint sets.`);
    }
    this.pending.set(signature.id, signature.constraints);
  }

  // every signature defined since the last dropPending()
  signatures(): ZoneSignature[] {
    return Array.from(this.pending, ([id, constraints]) => ({ id, constraints }));
  }

  dropPending(): void {
    this.pending.clear();
  }

  applyCellChange(key: string, prev: CellRecord | undefined, next: CellRecord): void {
    const before = zoneOf(prev);
    const after = zoneOf(next);
    if (before === after) return;
    if (before) this.removeMember(before, key);
    if (after) this.addMember(after, key);
  }

  private addMember(id: string, key: string): void {
    const zone = this.mutable(id);
    if (zone) {
      zone.members.add(key);
      return;
    }
    const constraints = this.pending.get(id);
    if (!constraints) {
      throw new InvariantViolationError(`Cell ${key} joins undefined zone ${id}.`);
    }
    this.write(id, { id, constraints, members: new Set([key]) });
  }

  private removeMember(id: string, key: string): void {
    const zone = this.mutable(id);
    if (!zone || !zone.members.delete(key)) {
      throw new InvariantViolationError(`Cell ${key} is not a member of zone ${id}.`);
    }
    if (zone.members.size === 0) this.write(id, null);
  }
}

export class ZoneIndex extends ZoneTable {
  private readonly zones = new Map<string, ZoneRecord>();

  protected read(id: string): ZoneRecord | undefined {
    return this.zones.get(id);
  }

  protected mutable(id: string): ZoneRecord | undefined {
    return this.zones.get(id);
  }

  protected write(id: string, zone: ZoneRecord | null): void {
    if (zone) this.zones.set(id, zone);
    else this.zones.delete(id);
  }

  ids(): string[] {
    return Array.from(this.zones.keys());
  }

  clear(): void {
    this.zones.clear();
  }
}

/** Copy-on-write zone view used during one solve cycle. */
export class ZoneOverlay extends ZoneTable {
  private readonly touched = new Map<string, ZoneRecord | null>();

  constructor(private readonly base: ZoneIndex) {
    super();
  }

  protected read(id: string): ZoneRecord | undefined {
    if (this.touched.has(id)) return this.touched.get(id) ?? undefined;
    return this.base.get(id);
  }

  protected mutable(id: string): ZoneRecord | undefined {
    if (this.touched.has(id)) return this.touched.get(id) ?? undefined;
    const original = this.base.get(id);
    if (!original) return undefined;
    const copy: ZoneRecord = { id, constraints: original.constraints, members: new Set(original.members) };
    this.touched.set(id, copy);
    return copy;
  }

  protected write(id: string, zone: ZoneRecord | null): void {
    this.touched.set(id, zone);
  }

  ids(): string[] {
    const out: string[] = [];
    for (const id of this.base.ids()) {
      if (!this.touched.has(id) || this.touched.get(id)) out.push(id);
    }
    for (const [id, zone] of this.touched) {
      if (zone && !this.base.get(id)) out.push(id);
    }
    return out;
  }
}
