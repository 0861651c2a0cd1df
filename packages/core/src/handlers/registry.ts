import "reflect-metadata";
import createDebug from "debug";
import type { HttpMethod, Type } from "@scopebound/types";
import {
  CONTROLLER_METADATA,
  HTTP_METHOD_METADATA,
  INJECTED_PARAM_METADATA,
  PARAM_METADATA,
  ROUTE_PATH_METADATA,
} from "../metadata/constants";
import type { ControllerMetadata } from "../decorators/controller";
import { assertRoutePath } from "../decorators/http";
import type { ParamMetadata } from "../decorators/params";
import { InjectionDefinitionError } from "../errors/injection-definition-error";
import { BadRequestException } from "../errors/http-exception";
import {
  ordinaryParameters,
  reducedExtractors,
  type HandlerDescriptor,
} from "../injection/handler-descriptor";
import { getHandlerDescriptor, type HandlerFunction } from "../injection/transform";

const debug = createDebug("scopebound:core:registry");

export type ResolvedRoute = {
  method: HttpMethod;
  path: string;
  /** Extractors indexed by position in the handler's public (reduced) signature. */
  paramMetadata: ParamMetadata[];
  handlerFn: HandlerFunction;
  /** Plain functions without parameter metadata are called with the request itself. */
  receivesRequest: boolean;
};

export type RouteMatch = {
  route: ResolvedRoute;
  pathParams: Record<string, string>;
};

/**
 * Joins a controller prefix with a method-level path.
 * Both use the `{param}` format.
 *
 * @example
 * joinHandlerPath("/orders", "/{orderId}") => "/orders/{orderId}"
 * joinHandlerPath("/", "/health") => "/health"
 */
export function joinHandlerPath(prefix: string, methodPath: string): string {
  return `/${prefix}/${methodPath}`.replaceAll(/\/+/g, "/").replace(/\/$/, "") || "/";
}

function decodePathSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    throw new BadRequestException(`Malformed path segment "${segment}"`);
  }
}

/** Matches `{param}` segments; a matched segment that is not valid percent-encoding is a 400. */
export function matchRoute(pattern: string, actual: string): Record<string, string> | null {
  const patternParts = pattern.split("/").filter(Boolean);
  const actualParts = actual.split("/").filter(Boolean);

  if (patternParts.length !== actualParts.length) return null;

  const params: Record<string, string> = {};
  for (const [i, part] of patternParts.entries()) {
    if (part.startsWith("{") && part.endsWith("}")) {
      params[part.slice(1, -1)] = decodePathSegment(actualParts[i]);
    } else if (part !== actualParts[i]) {
      return null;
    }
  }
  return params;
}

export class HandlerRegistry {
  private routes: ResolvedRoute[] = [];

  match(method: HttpMethod, path: string): RouteMatch | undefined {
    for (const route of this.routes) {
      if (route.method !== method) continue;
      const pathParams = matchRoute(route.path, path);
      if (pathParams) return { route, pathParams };
    }
    return undefined;
  }

  getAllRoutes(): ResolvedRoute[] {
    return [...this.routes];
  }

  registerController(controllerClass: Type): void {
    const controllerMeta: ControllerMetadata | undefined = Reflect.getOwnMetadata(
      CONTROLLER_METADATA,
      controllerClass,
    );
    if (!controllerMeta) {
      throw new Error(`${controllerClass.name} is not decorated with @Controller()`);
    }
    if (controllerClass.length > 0) {
      throw new InjectionDefinitionError(
        controllerClass.name,
        "controllers take no constructor parameters; declare dependencies as @Injected handler parameters",
      );
    }

    const instance = new controllerClass();
    const prototype: object = controllerClass.prototype;
    const methods = Object.getOwnPropertyNames(prototype).filter((name) => name !== "constructor");

    for (const methodName of methods) {
      const method: HttpMethod | undefined = Reflect.getOwnMetadata(
        HTTP_METHOD_METADATA,
        prototype,
        methodName,
      );
      if (!method) continue;

      const descriptor = Object.getOwnPropertyDescriptor(prototype, methodName);
      const handlerFn: unknown = descriptor?.value;
      if (typeof handlerFn !== "function") continue;

      const name = `${controllerClass.name}.${methodName}`;
      const hasInjected = Reflect.hasOwnMetadata(INJECTED_PARAM_METADATA, prototype, methodName);
      const handlerDescriptor = getHandlerDescriptor(handlerFn);
      if (hasInjected && !handlerDescriptor) {
        throw new InjectionDefinitionError(
          name,
          "has @Injected parameters but is not decorated with @InjectHandler()",
        );
      }
      if (handlerDescriptor) {
        assertRoutable(name, handlerDescriptor);
      }

      const routePath: string =
        Reflect.getOwnMetadata(ROUTE_PATH_METADATA, prototype, methodName) ?? "/";
      const paramMetadata: ParamMetadata[] =
        Reflect.getOwnMetadata(PARAM_METADATA, prototype, methodName) ?? [];

      this.add({
        method,
        path: joinHandlerPath(controllerMeta.prefix ?? "", routePath),
        paramMetadata,
        handlerFn: (...args) => Reflect.apply(handlerFn, instance, args),
        receivesRequest: false,
      });
    }
  }

  registerFunction(method: HttpMethod, path: string, handler: HandlerFunction): void {
    assertRoutePath(path);
    const handlerDescriptor = getHandlerDescriptor(handler);
    if (handlerDescriptor) {
      assertRoutable(handlerDescriptor.name, handlerDescriptor);
    }

    this.add({
      method,
      path: joinHandlerPath("", path),
      paramMetadata: handlerDescriptor ? reducedExtractors(handlerDescriptor) : [],
      handlerFn: handler,
      receivesRequest: !handlerDescriptor,
    });
  }

  private add(route: ResolvedRoute): void {
    debug("route %s %s", route.method, route.path);
    this.routes.push(route);
  }
}

function assertRoutable(name: string, descriptor: HandlerDescriptor): void {
  const missing = ordinaryParameters(descriptor).filter((parameter) => !parameter.extractor);
  if (missing.length > 0) {
    throw new InjectionDefinitionError(
      name,
      `parameters ${missing.map((p) => p.index).join(", ")} have no request extractor ` +
        "and cannot be supplied when the handler is routed",
    );
  }
}
