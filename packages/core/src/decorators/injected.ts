import "reflect-metadata";
import type { InjectionToken, Type } from "@scopebound/types";
import { INJECTED_PARAM_METADATA, PARAM_METADATA } from "../metadata/constants";
import { InjectionDefinitionError } from "../errors/injection-definition-error";
import type { ParamMetadata } from "./params";
import { describeHandler, reducedExtractors } from "../injection/handler-descriptor";
import { transformHandler, type HandlerFunction } from "../injection/transform";

// Design types that say nothing about the capability: interfaces and
// structural types are emitted as Object.
const NON_CAPABILITY_TYPES = new Set<unknown>([
  Object,
  Function,
  String,
  Number,
  Boolean,
  Symbol,
  BigInt,
  Array,
  Promise,
]);

function memberName(target: object, propertyKey: string | symbol | undefined): string {
  const owner = typeof target === "function" ? target.name : target.constructor.name;
  return propertyKey === undefined ? owner : `${owner}.${String(propertyKey)}`;
}

function isConstructor(value: unknown): value is Type {
  return typeof value === "function" && value.prototype !== undefined;
}

function isHandlerFunction(value: unknown): value is HandlerFunction {
  return typeof value === "function";
}

function designTypeToken(
  target: object,
  propertyKey: string | symbol,
  parameterIndex: number,
): InjectionToken {
  const paramTypes: unknown[] = Reflect.getMetadata("design:paramtypes", target, propertyKey) ?? [];
  const designType = paramTypes[parameterIndex];
  if (!isConstructor(designType) || NON_CAPABILITY_TYPES.has(designType)) {
    throw new InjectionDefinitionError(
      memberName(target, propertyKey),
      `cannot infer a capability token for parameter ${parameterIndex}; ` +
        "interfaces have no runtime type, pass the token explicitly with @Injected(TOKEN)",
    );
  }
  return designType;
}

/**
 * Marks a handler parameter as supplied by the request's scope. Without a
 * token, the parameter's class type is used, which requires decorator
 * metadata and a concrete class.
 */
export function Injected(token?: InjectionToken): ParameterDecorator {
  return (target, propertyKey, parameterIndex) => {
    if (propertyKey === undefined) {
      throw new InjectionDefinitionError(
        memberName(target, propertyKey),
        "@Injected() applies to handler method parameters; use @Inject(token) for constructors",
      );
    }

    const resolved = token ?? designTypeToken(target, propertyKey, parameterIndex);
    const existing: Map<number, InjectionToken> =
      Reflect.getOwnMetadata(INJECTED_PARAM_METADATA, target, propertyKey) ?? new Map();
    if (existing.has(parameterIndex)) {
      throw new InjectionDefinitionError(
        memberName(target, propertyKey),
        `parameter ${parameterIndex} is marked @Injected more than once`,
      );
    }
    existing.set(parameterIndex, resolved);
    Reflect.defineMetadata(INJECTED_PARAM_METADATA, existing, target, propertyKey);
  };
}

/**
 * Rewrites the decorated method so its `@Injected` parameters are resolved
 * from the current request's scope. Request extractor metadata on the method
 * is re-indexed to the reduced signature.
 */
export function InjectHandler() {
  return (
    target: object,
    propertyKey: string | symbol,
    descriptor: PropertyDescriptor,
  ): PropertyDescriptor => {
    const name = memberName(target, propertyKey);
    const inner: unknown = descriptor.value;
    if (!isHandlerFunction(inner)) {
      throw new InjectionDefinitionError(name, "@InjectHandler() must decorate a method");
    }

    const injected: Map<number, InjectionToken> =
      Reflect.getOwnMetadata(INJECTED_PARAM_METADATA, target, propertyKey) ?? new Map();
    const extractors: ParamMetadata[] =
      Reflect.getOwnMetadata(PARAM_METADATA, target, propertyKey) ?? [];

    const handlerDescriptor = describeHandler({
      name,
      arity: inner.length,
      injected,
      extractors,
    });

    Reflect.defineMetadata(PARAM_METADATA, reducedExtractors(handlerDescriptor), target, propertyKey);
    return { ...descriptor, value: transformHandler(handlerDescriptor, inner) };
  };
}
