import createDebug from "debug";
import type { InjectionToken, ServiceScope } from "@scopebound/types";
import { ResolveError } from "../errors/resolve-error";
import type { Container } from "./container";
import { InstanceCache } from "./instance-cache";

const debug = createDebug("scopebound:core:di");

/**
 * Resolution context for one request. Scoped instances are cached here,
 * singletons are delegated to the root container, and everything the scope
 * created is closed on {@link Scope.dispose}.
 */
export class Scope implements ServiceScope {
  private readonly owned = new InstanceCache();
  private isDisposed = false;

  constructor(
    private readonly root: Container,
    readonly id: string,
  ) {}

  get disposed(): boolean {
    return this.isDisposed;
  }

  async resolve<T>(token: InjectionToken): Promise<T> {
    if (this.isDisposed) {
      throw ResolveError.scopeDisposed(token, this.id);
    }
    return this.root.resolveFrom<T>(token, this, []);
  }

  has(token: InjectionToken): boolean {
    return this.root.has(token);
  }

  async dispose(): Promise<void> {
    if (this.isDisposed) return;
    this.isDisposed = true;
    debug("dispose %s: %d closeable instances", this.id, this.owned.closeableCount);
    await this.owned.closeAll();
  }

  /** @internal */
  instances(): InstanceCache {
    return this.owned;
  }
}
