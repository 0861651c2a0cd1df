import type { Logger } from "./logger";

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE" | "HEAD" | "OPTIONS";

export type HttpRequest = {
  method: HttpMethod;
  path: string;
  pathParams: Record<string, string>;
  query: Record<string, string | string[]>;
  headers: Record<string, string | string[]>;
  cookies: Record<string, string>;
  textBody: string | null;
  contentType: string | null;
  requestId: string;
  requestTime: string;
  clientIp: string | null;
  userAgent: string | null;
};

export type HttpResponse = {
  status: number;
  headers?: Record<string, string>;
  body?: string;
};

/**
 * Typed key into an application's data store. Keys are compared by identity;
 * `__value` is never set and only ties `get` results to the stored type.
 */
export interface DataKey<T> {
  readonly name: string;
  readonly __value?: T;
}

/** Read side of the application-wide data store, as seen from a request. */
export interface AppDataReader {
  get<T>(key: DataKey<T>): T | undefined;
  has(key: DataKey<unknown>): boolean;
}

export type RequestCleanup = () => Promise<void> | void;

/** Per-request carrier created by the host for every incoming request. */
export interface RequestContext {
  readonly request: HttpRequest;
  readonly appData: AppDataReader;
  /** Request-scoped logger, enriched with requestId, method and path. */
  readonly logger: Logger;
  /** Registers work to run once the request has completed, in reverse registration order. */
  onComplete(cleanup: RequestCleanup): void;
}
