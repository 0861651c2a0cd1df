import { AsyncLocalStorage } from "node:async_hooks";
import type {
  AppDataReader,
  HttpRequest,
  Logger,
  RequestCleanup,
  RequestContext,
} from "@scopebound/types";

const requestStore = new AsyncLocalStorage<RequestContext>();

/**
 * Get the context of the request currently being handled.
 *
 * Works anywhere in the async call chain during request handling.
 * Returns `undefined` outside a request (startup code, background tasks).
 */
export function currentRequestContext(): RequestContext | undefined {
  return requestStore.getStore();
}

/** Get the request-scoped logger from the current async context. */
export function getRequestLogger(): Logger | undefined {
  return requestStore.getStore()?.logger;
}

export function runInRequestContext<T>(context: RequestContext, fn: () => T): T {
  return requestStore.run(context, fn);
}

/** The host's implementation of {@link RequestContext}, owning the completion hooks. */
export class ManagedRequestContext implements RequestContext {
  private cleanups: RequestCleanup[] = [];
  private completed = false;

  constructor(
    readonly request: HttpRequest,
    readonly appData: AppDataReader,
    readonly logger: Logger,
  ) {}

  onComplete(cleanup: RequestCleanup): void {
    if (this.completed) {
      throw new Error(`Request ${this.request.requestId} has already completed`);
    }
    this.cleanups.push(cleanup);
  }

  get isCompleted(): boolean {
    return this.completed;
  }

  /** Runs completion hooks in reverse registration order. Failures are logged, not rethrown. */
  async complete(): Promise<void> {
    if (this.completed) return;
    this.completed = true;

    const cleanups = this.cleanups.reverse();
    this.cleanups = [];
    for (const cleanup of cleanups) {
      try {
        await cleanup();
      } catch (error) {
        this.logger.error("Request cleanup failed", {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }
}
