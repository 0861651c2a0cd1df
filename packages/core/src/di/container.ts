import "reflect-metadata";
import createDebug from "debug";
import type {
  Type,
  InjectionToken,
  Provider,
  ServiceContainer,
  ServiceLifetime,
} from "@scopebound/types";
import { INJECTABLE_METADATA } from "../metadata/constants";
import { ResolveError } from "../errors/resolve-error";
import {
  getClassDependencyTokens,
  getProviderDependencyTokens,
  getProviderLifetime,
  isClassProvider,
  isFactoryProvider,
  isValueProvider,
} from "./dependency-tokens";
import { InstanceCache } from "./instance-cache";
import { Scope } from "./scope";
import { tokenToString } from "./token";
import { WaitGraph } from "./wait-graph";

const debug = createDebug("scopebound:core:di");

// Used for the internal map of providers where we can't track each specific
// Provider<T> type.
// eslint-disable-next-line @typescript-eslint/no-explicit-any
type AnyProvider = Provider<any>;

export class Container implements ServiceContainer {
  private providers = new Map<InjectionToken, AnyProvider>();
  private singletons = new InstanceCache();
  private edges = new Map<InjectionToken, Set<InjectionToken>>();
  private waits = new WaitGraph();
  private scopeCount = 0;

  register<T>(token: InjectionToken, provider: Provider<T>): void {
    const type = isClassProvider(provider)
      ? "class"
      : isFactoryProvider(provider)
        ? "factory"
        : "value";
    debug("register %s (%s, %s)", tokenToString(token), type, getProviderLifetime(provider));
    this.providers.set(token, provider);

    if (isValueProvider(provider)) {
      this.singletons.set(token, provider.useValue);
      this.singletons.track(token, provider.useValue, provider.onClose);
    }
  }

  registerClass<T>(target: Type<T>, lifetime?: ServiceLifetime): void {
    this.register(target, lifetime ? { useClass: target, lifetime } : { useClass: target });
  }

  registerValue<T>(token: InjectionToken, value: T): void {
    this.register(token, { useValue: value });
  }

  resolve<T>(token: InjectionToken): Promise<T> {
    return this.resolveFrom<T>(token, null, []);
  }

  createScope(): Scope {
    this.scopeCount += 1;
    const scope = new Scope(this, `scope-${this.scopeCount}`);
    debug("createScope %s", scope.id);
    return scope;
  }

  has(token: InjectionToken): boolean {
    return this.providers.has(token) || this.singletons.has(token);
  }

  getDependencies(token: InjectionToken): ReadonlySet<InjectionToken> {
    return this.edges.get(token) ?? new Set();
  }

  async closeAll(): Promise<void> {
    await this.singletons.closeAll();
  }

  /**
   * Validates that all registered providers have resolvable dependencies.
   * Throws a descriptive error listing ALL missing dependencies at once.
   */
  validateDependencies(): void {
    const missing: Array<{ consumer: string; dependency: string }> = [];
    const visited = new Set<InjectionToken>();

    const walk = (token: InjectionToken): void => {
      if (visited.has(token)) return;
      visited.add(token);

      const provider = this.providers.get(token);
      const depTokens = provider
        ? getProviderDependencyTokens(provider)
        : typeof token === "function"
          ? getClassDependencyTokens(token)
          : [];

      for (const dep of depTokens) {
        if (this.has(dep) || typeof dep === "function") {
          walk(dep);
        } else {
          missing.push({ consumer: tokenToString(token), dependency: tokenToString(dep) });
        }
      }
    };

    for (const token of this.providers.keys()) {
      walk(token);
    }

    if (missing.length > 0) {
      const details = missing
        .map(({ consumer, dependency }) => `  ${consumer} requires ${dependency} — no provider registered`)
        .join("\n");
      throw new Error(`Unresolvable dependencies detected:\n\n${details}`);
    }
  }

  /**
   * Shared resolution path for the root container and its scopes. `path` is
   * the chain of tokens being constructed for this call; the wait graph
   * catches cycles that only close across concurrent calls, where one call
   * would otherwise wait on another's pending construction forever.
   *
   * @internal
   */
  async resolveFrom<T>(
    token: InjectionToken,
    scope: Scope | null,
    path: readonly InjectionToken[],
  ): Promise<T> {
    if (path.includes(token)) {
      throw ResolveError.circular([...path, token]);
    }

    const consumer = path.at(-1);
    if (consumer === undefined) {
      return this.resolveUnwaited<T>(token, scope, path);
    }

    const loop = this.waits.findPath(token, consumer);
    if (loop) {
      throw ResolveError.circular([consumer, ...loop]);
    }

    this.waits.add(consumer, token);
    try {
      return await this.resolveUnwaited<T>(token, scope, path);
    } finally {
      this.waits.remove(consumer, token);
    }
  }

  private async resolveUnwaited<T>(
    token: InjectionToken,
    scope: Scope | null,
    path: readonly InjectionToken[],
  ): Promise<T> {
    const provider = this.providerFor(token);
    const lifetime = getProviderLifetime(provider);
    const nextPath = [...path, token];

    switch (lifetime) {
      case "singleton":
        return this.singletons.getOrCreate(token, async () => {
          debug("resolve %s → constructing singleton", tokenToString(token));
          const instance = await this.createFromProvider<T>(token, provider, null, nextPath);
          this.singletons.track(token, instance, provider.onClose);
          return instance;
        });
      case "scoped": {
        const owner = scope;
        if (!owner) {
          throw ResolveError.scopedOutsideScope(token);
        }
        const owned = owner.instances();
        return owned.getOrCreate(token, async () => {
          debug("resolve %s → constructing in %s", tokenToString(token), owner.id);
          const instance = await this.createFromProvider<T>(token, provider, owner, nextPath);
          owned.track(token, instance, provider.onClose);
          return instance;
        });
      }
      case "transient": {
        debug("resolve %s → transient", tokenToString(token));
        const instance = await this.createFromProvider<T>(token, provider, scope, nextPath);
        // Outside a scope the caller owns the transient and closes it.
        scope?.instances().track(token, instance, provider.onClose);
        return instance;
      }
    }
  }

  private providerFor(token: InjectionToken): AnyProvider {
    const provider = this.providers.get(token);
    if (provider) return provider;
    if (typeof token === "function") return { useClass: token };
    throw ResolveError.notRegistered(token);
  }

  private async createFromProvider<T>(
    token: InjectionToken,
    provider: AnyProvider,
    scope: Scope | null,
    path: readonly InjectionToken[],
  ): Promise<T> {
    if (isValueProvider(provider)) {
      return provider.useValue;
    }

    if (isClassProvider(provider)) {
      return this.constructClass(token, provider.useClass, scope, path);
    }

    if (isFactoryProvider(provider)) {
      const inject = provider.inject ?? [];
      this.recordEdges(token, inject);
      const deps = await Promise.all(inject.map((t) => this.resolveFrom(t, scope, path)));
      try {
        return await provider.useFactory(...deps);
      } catch (error) {
        throw ResolveError.providerFailed(token, error);
      }
    }

    throw new ResolveError("provider-failed", token, "Invalid provider configuration");
  }

  /** Constructs a class by resolving constructor dependencies via design:paramtypes. */
  private async constructClass<T>(
    token: InjectionToken,
    target: Type<T>,
    scope: Scope | null,
    path: readonly InjectionToken[],
  ): Promise<T> {
    const isInjectable = Reflect.getOwnMetadata(INJECTABLE_METADATA, target) === true;
    if (!isInjectable && target.length > 0) {
      throw new ResolveError(
        "provider-failed",
        token,
        `Class ${target.name} has constructor parameters but is not decorated with @Injectable(). ` +
          "Add @Injectable() to enable dependency injection, or use a factory provider.",
      );
    }

    let depTokens: InjectionToken[];
    try {
      depTokens = getClassDependencyTokens(target);
    } catch (error) {
      throw ResolveError.providerFailed(token, error);
    }
    debug("construct %s deps=[%s]", target.name, depTokens.map(tokenToString).join(", "));
    this.recordEdges(token, depTokens);

    const deps: unknown[] = [];
    for (const t of depTokens) {
      deps.push(await this.resolveFrom(t, scope, path));
    }

    try {
      return new target(...deps);
    } catch (error) {
      throw ResolveError.providerFailed(token, error);
    }
  }

  private recordEdges(from: InjectionToken, to: InjectionToken[]): void {
    let set = this.edges.get(from);
    if (!set) {
      set = new Set();
      this.edges.set(from, set);
    }
    for (const dep of to) {
      set.add(dep);
    }
  }
}
