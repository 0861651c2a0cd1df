import createDebug from "debug";
import type { InjectionToken } from "@scopebound/types";
import { tokenToString } from "./token";

const debug = createDebug("scopebound:core:di");

type CloseEntry = {
  token: InjectionToken;
  close: () => Promise<void> | void;
};

const CLOSE_METHODS = ["close", "end", "quit", "disconnect", "$disconnect", "destroy"] as const;

function detectCloseMethod(value: unknown): (() => Promise<void> | void) | null {
  if (typeof value !== "object" || value === null) return null;

  for (const method of CLOSE_METHODS) {
    const candidate: unknown = Reflect.get(value, method);
    if (typeof candidate === "function") {
      return () => Reflect.apply(candidate, value, []);
    }
  }

  return null;
}

/**
 * Instances owned by one lifetime boundary (the root container or a scope).
 * Pending constructions are cached as promises so concurrent resolutions of
 * the same token share one instance.
 */
export class InstanceCache {
  private readonly instances = new Map<InjectionToken, Promise<unknown>>();
  private closeStack: CloseEntry[] = [];
  private readonly trackedValues = new Set<unknown>();

  has(token: InjectionToken): boolean {
    return this.instances.has(token);
  }

  set(token: InjectionToken, value: unknown): void {
    this.instances.set(token, Promise.resolve(value));
  }

  getOrCreate<T>(token: InjectionToken, create: () => Promise<T>): Promise<T> {
    const existing = this.instances.get(token);
    if (existing) {
      debug("resolve %s → cached", tokenToString(token));
      return existing as Promise<T>;
    }

    const pending = create().catch((error: unknown) => {
      this.instances.delete(token);
      throw error;
    });
    this.instances.set(token, pending);
    return pending;
  }

  track<T>(token: InjectionToken, value: T, onClose?: (value: T) => Promise<void> | void): void {
    if (this.trackedValues.has(value)) return;

    if (onClose) {
      this.closeStack.push({ token, close: () => onClose(value) });
      this.trackedValues.add(value);
      return;
    }

    const closeFn = detectCloseMethod(value);
    if (closeFn) {
      this.closeStack.push({ token, close: closeFn });
      this.trackedValues.add(value);
    }
  }

  get closeableCount(): number {
    return this.closeStack.length;
  }

  /** Closes tracked instances in reverse creation order. A failing close does not stop the rest. */
  async closeAll(): Promise<void> {
    debug("closeAll: %d resources", this.closeStack.length);
    const entries = [...this.closeStack].reverse();
    this.closeStack = [];
    this.trackedValues.clear();
    this.instances.clear();

    for (const entry of entries) {
      try {
        debug("closing %s", tokenToString(entry.token));
        await entry.close();
      } catch (error) {
        debug("closing %s failed: %O", tokenToString(entry.token), error);
      }
    }
  }
}
