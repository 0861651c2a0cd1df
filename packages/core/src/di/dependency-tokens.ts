import "reflect-metadata";
import type {
  Type,
  InjectionToken,
  Provider,
  ClassProvider,
  FactoryProvider,
  ValueProvider,
  ServiceLifetime,
} from "@scopebound/types";
import { INJECT_METADATA, LIFETIME_METADATA } from "../metadata/constants";

export function isClassProvider<T>(p: Provider<T>): p is ClassProvider<T> {
  return "useClass" in p;
}

export function isFactoryProvider<T>(p: Provider<T>): p is FactoryProvider<T> {
  return "useFactory" in p;
}

export function isValueProvider<T>(p: Provider<T>): p is ValueProvider<T> {
  return "useValue" in p;
}

/**
 * Reads reflect-metadata to determine the constructor dependency tokens for a class.
 * Applies @Inject() overrides where present; an override also covers a parameter
 * whose design type was never emitted.
 *
 * Pure function — reads metadata only, no container side effects.
 */
export function getClassDependencyTokens(target: Type): InjectionToken[] {
  const paramTypes: Type[] = Reflect.getMetadata("design:paramtypes", target) ?? [];
  const injectOverrides: Map<number, InjectionToken> =
    Reflect.getMetadata(INJECT_METADATA, target) ?? new Map();

  const count = Math.max(paramTypes.length, ...[...injectOverrides.keys()].map((i) => i + 1));
  const tokens: InjectionToken[] = [];
  for (let index = 0; index < count; index++) {
    const token = injectOverrides.get(index) ?? paramTypes[index];
    if (token === undefined) {
      throw new Error(
        `Cannot determine dependency ${index} of ${target.name}: ` +
          "no design type was emitted. Add @Inject(token) to the constructor parameter.",
      );
    }
    tokens.push(token);
  }
  return tokens;
}

/**
 * Determines the dependency tokens for a provider (class, factory, or value).
 *
 * Pure function — reads metadata only, no container side effects.
 */
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export function getProviderDependencyTokens(provider: Provider<any>): InjectionToken[] {
  if (isClassProvider(provider)) {
    return getClassDependencyTokens(provider.useClass);
  }
  if (isFactoryProvider(provider) && provider.inject) {
    return [...provider.inject];
  }
  return [];
}

// eslint-disable-next-line @typescript-eslint/no-explicit-any
export function getProviderLifetime(provider: Provider<any>): ServiceLifetime {
  if (isValueProvider(provider)) return "singleton";
  if (provider.lifetime) return provider.lifetime;
  if (isClassProvider(provider)) {
    const declared: ServiceLifetime | undefined = Reflect.getOwnMetadata(
      LIFETIME_METADATA,
      provider.useClass,
    );
    return declared ?? "singleton";
  }
  return "singleton";
}
