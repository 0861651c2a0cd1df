import "reflect-metadata";
import type { InjectionToken, ServiceLifetime } from "@scopebound/types";
import { INJECTABLE_METADATA, INJECT_METADATA, LIFETIME_METADATA } from "../metadata/constants";

export type InjectableOptions = {
  /** Defaults to `singleton` unless the registering provider says otherwise. */
  lifetime?: ServiceLifetime;
};

export function Injectable(options: InjectableOptions = {}): ClassDecorator {
  return (target) => {
    Reflect.defineMetadata(INJECTABLE_METADATA, true, target);
    if (options.lifetime) {
      Reflect.defineMetadata(LIFETIME_METADATA, options.lifetime, target);
    }
  };
}

export function Inject(token: InjectionToken): ParameterDecorator {
  return (target, _propertyKey, parameterIndex) => {
    const existing: Map<number, InjectionToken> =
      Reflect.getOwnMetadata(INJECT_METADATA, target) ?? new Map();
    existing.set(parameterIndex, token);
    Reflect.defineMetadata(INJECT_METADATA, existing, target);
  };
}
