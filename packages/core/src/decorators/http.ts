import "reflect-metadata";
import type { HttpMethod } from "@scopebound/types";
import { HTTP_METHOD_METADATA, ROUTE_PATH_METADATA } from "../metadata/constants";

const PATH_PARAM = /^\{[A-Za-z_][A-Za-z0-9_]*\}$/;

/**
 * Route paths use `{name}` placeholders for whole segments. A brace anywhere
 * else is rejected when the route is declared rather than at match time.
 */
export function assertRoutePath(path: string): void {
  for (const segment of path.split("/")) {
    if ((segment.includes("{") || segment.includes("}")) && !PATH_PARAM.test(segment)) {
      throw new Error(`Invalid route path "${path}": segment "${segment}" is not a {param}`);
    }
  }
}

function route(method: HttpMethod, path = "/"): MethodDecorator {
  assertRoutePath(path);
  return (target, propertyKey) => {
    Reflect.defineMetadata(HTTP_METHOD_METADATA, method, target, propertyKey);
    Reflect.defineMetadata(ROUTE_PATH_METADATA, path, target, propertyKey);
  };
}

export const Get = (path?: string): MethodDecorator => route("GET", path);
export const Post = (path?: string): MethodDecorator => route("POST", path);
export const Put = (path?: string): MethodDecorator => route("PUT", path);
export const Patch = (path?: string): MethodDecorator => route("PATCH", path);
export const Delete = (path?: string): MethodDecorator => route("DELETE", path);
