import type { AppDataReader, DataKey } from "@scopebound/types";

export function dataKey<T>(name: string): DataKey<T> {
  return Object.freeze({ name });
}

/**
 * Application-wide data owned by one application instance. Requests only see
 * it through {@link AppDataReader}; writes happen while the app is being built.
 */
export class AppData implements AppDataReader {
  private readonly values = new Map<DataKey<unknown>, unknown>();

  get<T>(key: DataKey<T>): T | undefined {
    return this.values.get(key) as T | undefined;
  }

  has(key: DataKey<unknown>): boolean {
    return this.values.has(key);
  }

  set<T>(key: DataKey<T>, value: T): void {
    this.values.set(key, value);
  }
}
