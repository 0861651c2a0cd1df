import type { InjectionToken, Schema } from "@scopebound/types";
import { buildExtractor, type ParamExtractor, type ParamMetadata } from "../decorators/params";
import { InjectionDefinitionError } from "../errors/injection-definition-error";
import { describeHandler } from "./handler-descriptor";
import { transformHandler, type OuterHandler } from "./transform";

export type InjectedSlot = {
  readonly kind: "injected";
  readonly token: InjectionToken;
};

export type OrdinarySlot = {
  readonly kind: "ordinary";
  readonly extractor?: ParamExtractor;
};

export type ParamSlot = InjectedSlot | OrdinarySlot;

type Reduce<P extends unknown[], S extends readonly ParamSlot[]> =
  S extends readonly [infer Head, ...infer Tail extends readonly ParamSlot[]]
    ? P extends [infer First, ...infer Rest]
      ? Head extends InjectedSlot
        ? Reduce<Rest, Tail>
        : [First, ...Reduce<Rest, Tail>]
      : []
    : P;

/** `P` with every position whose slot is injected removed. */
export type ReducedParameters<P extends unknown[], S extends readonly ParamSlot[]> = Extract<
  Reduce<P, S>,
  unknown[]
>;

export function injected(token: InjectionToken): InjectedSlot {
  return { kind: "injected", token };
}

/** An ordinary argument with no request extractor; only usable when calling the handler directly. */
export function passthrough(): OrdinarySlot {
  return { kind: "ordinary" };
}

export function fromBody(schema?: Schema): OrdinarySlot {
  return { kind: "ordinary", extractor: buildExtractor("body", schema) };
}

export function fromQuery(keyOrSchema?: string | Schema, schema?: Schema): OrdinarySlot {
  return { kind: "ordinary", extractor: buildExtractor("query", keyOrSchema, schema) };
}

export function fromParam(keyOrSchema?: string | Schema, schema?: Schema): OrdinarySlot {
  return { kind: "ordinary", extractor: buildExtractor("param", keyOrSchema, schema) };
}

export function fromHeaders(key?: string): OrdinarySlot {
  return { kind: "ordinary", extractor: buildExtractor("headers", key) };
}

export function fromRequest(): OrdinarySlot {
  return { kind: "ordinary", extractor: buildExtractor("request") };
}

export function fromRequestId(): OrdinarySlot {
  return { kind: "ordinary", extractor: buildExtractor("requestId") };
}

/**
 * Function form of `@InjectHandler()`: one slot per handler parameter, in
 * declared order. The returned function takes only the non-injected
 * parameters.
 *
 * @example
 * const getUser = injectHandler(
 *   [fromParam("id"), injected(USER_SERVICE)],
 *   async (id: string, users: UserService) => users.find(id),
 * );
 * // getUser: (id: string) => Promise<User | undefined>
 */
export function injectHandler<const S extends readonly ParamSlot[], P extends unknown[], R>(
  slots: S,
  handler: (...args: P) => R,
): OuterHandler<ReducedParameters<P, S>, R> {
  const name = handler.name || "anonymous";
  if (slots.length < handler.length) {
    throw new InjectionDefinitionError(
      name,
      `declares ${handler.length} parameters but only ${slots.length} slots were given`,
    );
  }

  const injectedTokens = new Map<number, InjectionToken>();
  const extractors: ParamMetadata[] = [];
  const declared: readonly ParamSlot[] = slots;
  declared.forEach((slot, index) => {
    if (slot.kind === "injected") {
      injectedTokens.set(index, slot.token);
    } else if (slot.extractor) {
      extractors.push({ ...slot.extractor, index });
    }
  });

  const descriptor = describeHandler({
    name,
    arity: slots.length,
    injected: injectedTokens,
    extractors,
  });
  return transformHandler<ReducedParameters<P, S>, R>(descriptor, handler);
}
