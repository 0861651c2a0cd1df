import { vi } from "vitest";
import type { AppDataReader, HttpRequest } from "@scopebound/types";
import { ManagedRequestContext } from "../src/context/request-context";
import { mockRequest } from "../src/testing/test-app";

/** A logger whose child loggers are itself, so assertions see every call. */
export function createMockLogger() {
  const logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: vi.fn(),
    withContext: vi.fn(),
  };
  logger.child.mockReturnValue(logger);
  logger.withContext.mockReturnValue(logger);
  return logger;
}

/** Awaits a promise expected to reject with `type` and returns the error. */
export async function rejectionOf<E>(
  promise: Promise<unknown>,
  type: new (...args: never[]) => E,
): Promise<E> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof type) return error;
    throw error;
  }
  throw new Error(`expected promise to reject with ${type.name}`);
}

/** A request context as the pipeline would create it, for driving handlers directly. */
export function createRequestContext(
  appData: AppDataReader,
  request: HttpRequest = mockRequest("GET", "/test"),
): ManagedRequestContext {
  return new ManagedRequestContext(request, appData, createMockLogger());
}
