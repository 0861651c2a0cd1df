import "reflect-metadata";
import createDebug from "debug";
import type { ServiceScope } from "@scopebound/types";
import { HANDLER_DESCRIPTOR_METADATA, INNER_HANDLER_METADATA } from "../metadata/constants";
import { currentRequestContext } from "../context/request-context";
import { scopeFor } from "../bridge/container-bridge";
import { RequestContextUnavailableError } from "../errors/bridge-errors";
import {
  injectedParameters,
  ordinaryParameters,
  type HandlerDescriptor,
} from "./handler-descriptor";

const debug = createDebug("scopebound:core:injection");

// Any handler, whatever its parameter types — uses `any[]` because typed
// parameter lists are rejected against `unknown[]` under strictFunctionTypes.
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type HandlerFunction<R = unknown> = (...args: any[]) => R;

export type OuterHandler<A extends unknown[], R> = (
  this: unknown,
  ...args: A
) => Promise<Awaited<R>>;

/**
 * Rewrites `inner` into an outer function taking only the ordinary
 * parameters. The outer function resolves every injected parameter from one
 * fresh scope of the current request, in declared order, then calls `inner`
 * with the full argument list. A resolution failure rejects before `inner`
 * runs. With no injected parameters the outer function forwards its arguments
 * as they are and never touches the request context.
 */
export function transformHandler<A extends unknown[], R>(
  descriptor: HandlerDescriptor,
  inner: HandlerFunction<R>,
): OuterHandler<A, R> {
  const injected = injectedParameters(descriptor);

  const outer = async function (this: unknown, ...ordinary: A): Promise<Awaited<R>> {
    if (injected.length === 0) {
      return await Reflect.apply(inner, this, ordinary);
    }

    const context = currentRequestContext();
    if (!context) {
      throw new RequestContextUnavailableError(descriptor.name);
    }

    // Registered first: a completed request refuses the hook before any scope exists.
    let scope: ServiceScope | undefined;
    context.onComplete(() => scope?.dispose());
    scope = scopeFor(context);

    debug("%s: resolving %d injected parameters in %s", descriptor.name, injected.length, scope.id);
    const args = await resolveArguments(descriptor, scope, ordinary);
    return await Reflect.apply(inner, this, args);
  };

  Object.defineProperty(outer, "name", { value: descriptor.name, configurable: true });
  Object.defineProperty(outer, "length", {
    value: ordinaryParameters(descriptor).length,
    configurable: true,
  });
  Reflect.defineMetadata(HANDLER_DESCRIPTOR_METADATA, descriptor, outer);
  Reflect.defineMetadata(INNER_HANDLER_METADATA, inner, outer);
  return outer;
}

/**
 * Builds the inner function's argument list: ordinary arguments in order,
 * resolved values spliced in at their declared positions, surplus arguments
 * (rest parameters) appended.
 */
export async function resolveArguments(
  descriptor: HandlerDescriptor,
  scope: ServiceScope,
  ordinary: readonly unknown[],
): Promise<unknown[]> {
  const args: unknown[] = [];
  let next = 0;

  for (const parameter of descriptor.parameters) {
    if (parameter.kind === "injected") {
      args.push(await scope.resolve(parameter.token));
    } else {
      args.push(ordinary[next]);
      next++;
    }
  }

  args.push(...ordinary.slice(next));
  return args;
}

export function getHandlerDescriptor(handler: unknown): HandlerDescriptor | undefined {
  if (typeof handler !== "function") return undefined;
  return Reflect.getOwnMetadata(HANDLER_DESCRIPTOR_METADATA, handler);
}

export function getInnerHandler(handler: unknown): HandlerFunction | undefined {
  if (typeof handler !== "function") return undefined;
  return Reflect.getOwnMetadata(INNER_HANDLER_METADATA, handler);
}
