import type { InjectionToken, Provider } from "./common";

/** Per-request resolution context derived from a {@link ServiceContainer}. */
export interface ServiceScope {
  /** Unique within the process; distinct for every scope created. */
  readonly id: string;
  resolve<T>(token: InjectionToken): Promise<T>;
  has(token: InjectionToken): boolean;
  /** Closes every instance the scope owns. Later `resolve` calls reject. */
  dispose(): Promise<void>;
  readonly disposed: boolean;
}

/** Long-lived DI container shared by every request of one application instance. */
export interface ServiceContainer {
  resolve<T>(token: InjectionToken): Promise<T>;
  register<T>(token: InjectionToken, provider: Provider<T>): void;
  has(token: InjectionToken): boolean;
  createScope(): ServiceScope;
  closeAll(): Promise<void>;
}
