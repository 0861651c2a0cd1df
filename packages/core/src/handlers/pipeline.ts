import type { AppDataReader, HttpRequest, HttpResponse, Logger } from "@scopebound/types";
import { HttpException } from "../errors/http-exception";
import { NotAttachedError } from "../errors/bridge-errors";
import { ResolveError } from "../errors/resolve-error";
import { extractParam } from "../decorators/params";
import { tokenToString } from "../di/token";
import { ManagedRequestContext, runInRequestContext } from "../context/request-context";
import type { ResolvedRoute } from "./registry";

export type PipelineOptions = {
  appData: AppDataReader;
  logger: Logger;
};

/**
 * Runs one request through its route inside a fresh request context. Whatever
 * the outcome, the context's completion hooks (scope disposal among them) run
 * before the response is returned.
 */
export async function executeHandlerPipeline(
  route: ResolvedRoute,
  request: HttpRequest,
  options: PipelineOptions,
): Promise<HttpResponse> {
  const context = new ManagedRequestContext(
    request,
    options.appData,
    options.logger.withContext({
      requestId: request.requestId,
      method: request.method,
      path: request.path,
    }),
  );

  try {
    const result = await runInRequestContext(context, () => invokeRoute(route, request));
    return normalizeResponse(result);
  } catch (error) {
    return toErrorResponse(error, context.logger);
  } finally {
    await context.complete();
  }
}

async function invokeRoute(route: ResolvedRoute, request: HttpRequest): Promise<unknown> {
  if (route.receivesRequest) {
    return route.handlerFn(request);
  }

  const args: unknown[] = [];
  const sorted = [...route.paramMetadata].sort((a, b) => a.index - b.index);
  for (const meta of sorted) {
    args[meta.index] = extractParam(meta, request);
  }

  return route.handlerFn(...args);
}

export function toErrorResponse(error: unknown, logger: Logger): HttpResponse {
  if (error instanceof HttpException) {
    return jsonResponse(error.statusCode, {
      message: error.message,
      ...(error.details !== undefined ? { details: error.details } : {}),
    });
  }

  if (error instanceof NotAttachedError) {
    logger.error("No container attached to the application", { error: error.message });
    return jsonResponse(500, { message: error.message });
  }

  if (error instanceof ResolveError) {
    logger.error("Dependency resolution failed", {
      token: tokenToString(error.token),
      reason: error.reason,
      error: error.message,
    });
    return jsonResponse(500, { message: "Internal Server Error" });
  }

  const message = error instanceof Error ? error.message : String(error);
  logger.error("Unhandled error in handler pipeline", {
    error: message,
    ...(error instanceof Error && error.stack ? { stack: error.stack } : {}),
  });
  return jsonResponse(500, { message: "Internal Server Error" });
}

function jsonResponse(status: number, body: Record<string, unknown>): HttpResponse {
  return {
    status,
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body),
  };
}

function normalizeResponse(result: unknown): HttpResponse {
  if (isHttpResponse(result)) {
    return result;
  }

  if (result === undefined || result === null) {
    return { status: 204 };
  }

  const body = typeof result === "string" ? result : JSON.stringify(result);
  return {
    status: 200,
    headers: { "content-type": "application/json" },
    body,
  };
}

function isHttpResponse(value: unknown): value is HttpResponse {
  return (
    typeof value === "object" &&
    value !== null &&
    "status" in value &&
    typeof value.status === "number"
  );
}
