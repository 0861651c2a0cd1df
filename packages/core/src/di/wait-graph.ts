import type { InjectionToken } from "@scopebound/types";

/**
 * Which in-flight constructions are currently waiting on which tokens, across
 * every concurrent resolution. A per-call path cannot see that another call's
 * pending construction is waiting on this one; this graph can.
 */
export class WaitGraph {
  private readonly edges = new Map<InjectionToken, Map<InjectionToken, number>>();

  add(from: InjectionToken, to: InjectionToken): void {
    let targets = this.edges.get(from);
    if (!targets) {
      targets = new Map();
      this.edges.set(from, targets);
    }
    targets.set(to, (targets.get(to) ?? 0) + 1);
  }

  remove(from: InjectionToken, to: InjectionToken): void {
    const targets = this.edges.get(from);
    const count = targets?.get(to);
    if (!targets || count === undefined) return;

    if (count > 1) {
      targets.set(to, count - 1);
      return;
    }
    targets.delete(to);
    if (targets.size === 0) this.edges.delete(from);
  }

  /** Tokens from `from` to `to` along waiting edges, both ends included, or null. */
  findPath(from: InjectionToken, to: InjectionToken): InjectionToken[] | null {
    const visited = new Set<InjectionToken>();

    const walk = (current: InjectionToken): InjectionToken[] | null => {
      if (current === to) return [current];
      if (visited.has(current)) return null;
      visited.add(current);

      for (const next of this.edges.get(current)?.keys() ?? []) {
        const rest = walk(next);
        if (rest) return [current, ...rest];
      }
      return null;
    };

    return walk(from);
  }
}
