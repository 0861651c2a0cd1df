// Constructor type for DI — uses `any[]` for constructor params because
// TypeScript's contravariance rejects typed constructors against `unknown[]`.
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Type<T = unknown> = new (...args: any[]) => T;

// Token for dependency injection — class reference, string, or symbol
export type InjectionToken = string | symbol | Type;

/**
 * How long a resolved instance lives.
 *
 * - `singleton`: one instance per container, shared by every request.
 * - `scoped`: one instance per scope (per request).
 * - `transient`: a new instance on every resolution.
 */
export type ServiceLifetime = "singleton" | "scoped" | "transient";

export type ClassProvider<T = unknown> = {
  useClass: Type<T>;
  lifetime?: ServiceLifetime;
  onClose?: (value: T) => Promise<void> | void;
};

export type FactoryProvider<T = unknown> = {
  // eslint-disable-next-line @typescript-eslint/no-explicit-any
  useFactory: (...args: any[]) => T | Promise<T>;
  inject?: InjectionToken[];
  lifetime?: ServiceLifetime;
  onClose?: (value: T) => Promise<void> | void;
};

export type ValueProvider<T = unknown> = {
  useValue: T;
  onClose?: (value: T) => Promise<void> | void;
};

export type Provider<T = unknown> = ClassProvider<T> | FactoryProvider<T> | ValueProvider<T>;
