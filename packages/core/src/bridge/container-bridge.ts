import createDebug from "debug";
import type {
  AppDataReader,
  RequestContext,
  ServiceContainer,
  ServiceScope,
} from "@scopebound/types";
import { ContainerAlreadyAttachedError, NotAttachedError } from "../errors/bridge-errors";
import { dataKey, type AppData } from "./app-data";

const debug = createDebug("scopebound:core:bridge");

export const CONTAINER_KEY = dataKey<ServiceContainer>("scopebound.container");

/**
 * Stores the shared container on an application instance. Attaching is a
 * one-way transition: a second attach throws {@link ContainerAlreadyAttachedError}.
 */
export function attachContainer(data: AppData, container: ServiceContainer): void {
  if (data.has(CONTAINER_KEY)) {
    throw new ContainerAlreadyAttachedError();
  }
  data.set(CONTAINER_KEY, container);
  debug("attachContainer: container attached");
}

export function isContainerAttached(data: AppDataReader): boolean {
  return data.has(CONTAINER_KEY);
}

/**
 * Derives a fresh scope for one request from the container attached to the
 * request's application. Every call yields a new scope.
 */
export function scopeFor(context: Pick<RequestContext, "appData" | "request">): ServiceScope {
  const container = context.appData.get(CONTAINER_KEY);
  if (!container) {
    debug("scopeFor %s: no container attached", context.request.requestId);
    throw new NotAttachedError(context.request.requestId);
  }
  const scope = container.createScope();
  debug("scopeFor %s → %s", context.request.requestId, scope.id);
  return scope;
}
