import type { InjectionToken } from "@scopebound/types";
import type { ParamExtractor, ParamMetadata } from "../decorators/params";
import { InjectionDefinitionError } from "../errors/injection-definition-error";
import { tokenToString } from "../di/token";

/** A parameter whose value is resolved from the request's scope. */
export type InjectedParameter = {
  kind: "injected";
  index: number;
  token: InjectionToken;
  /** `handlerName[index]`, used in diagnostics. */
  label: string;
};

/** A parameter supplied by the caller, or by a request extractor when routed. */
export type OrdinaryParameter = {
  kind: "ordinary";
  index: number;
  extractor?: ParamExtractor;
};

export type ParameterDescriptor = InjectedParameter | OrdinaryParameter;

/**
 * Definition-time view of a handler's parameter list, in declared order.
 * The outer function's signature is this list restricted to ordinary parameters.
 */
export type HandlerDescriptor = {
  name: string;
  parameters: readonly ParameterDescriptor[];
};

export type DescribeHandlerInput = {
  name: string;
  /** Declared parameter count; positions beyond it are added when metadata references them. */
  arity: number;
  injected: ReadonlyMap<number, InjectionToken>;
  extractors?: readonly ParamMetadata[];
};

export function describeHandler(input: DescribeHandlerInput): HandlerDescriptor {
  const extractorsByIndex = new Map<number, ParamMetadata>();
  for (const meta of input.extractors ?? []) {
    if (extractorsByIndex.has(meta.index)) {
      throw new InjectionDefinitionError(
        input.name,
        `parameter ${meta.index} has more than one request extractor`,
      );
    }
    if (input.injected.has(meta.index)) {
      throw new InjectionDefinitionError(
        input.name,
        `parameter ${meta.index} is both injected and extracted from the request (${meta.type})`,
      );
    }
    extractorsByIndex.set(meta.index, meta);
  }

  const referenced = [...input.injected.keys(), ...extractorsByIndex.keys()];
  const count = Math.max(input.arity, ...referenced.map((index) => index + 1));

  const parameters: ParameterDescriptor[] = [];
  for (let index = 0; index < count; index++) {
    const token = input.injected.get(index);
    if (token !== undefined) {
      parameters.push({ kind: "injected", index, token, label: `${input.name}[${index}]` });
      continue;
    }

    const meta = extractorsByIndex.get(index);
    if (meta) {
      const { index: _index, ...extractor } = meta;
      parameters.push({ kind: "ordinary", index, extractor });
    } else {
      parameters.push({ kind: "ordinary", index });
    }
  }

  return { name: input.name, parameters };
}

export function injectedParameters(descriptor: HandlerDescriptor): InjectedParameter[] {
  return descriptor.parameters.filter(
    (parameter): parameter is InjectedParameter => parameter.kind === "injected",
  );
}

export function ordinaryParameters(descriptor: HandlerDescriptor): OrdinaryParameter[] {
  return descriptor.parameters.filter(
    (parameter): parameter is OrdinaryParameter => parameter.kind === "ordinary",
  );
}

/** Extractor metadata re-indexed to positions in the reduced (outer) signature. */
export function reducedExtractors(descriptor: HandlerDescriptor): ParamMetadata[] {
  const reduced: ParamMetadata[] = [];
  ordinaryParameters(descriptor).forEach((parameter, position) => {
    if (parameter.extractor) {
      reduced.push({ ...parameter.extractor, index: position });
    }
  });
  return reduced;
}

export function formatDescriptor(descriptor: HandlerDescriptor): string {
  const parts = descriptor.parameters.map((parameter) =>
    parameter.kind === "injected"
      ? `@${tokenToString(parameter.token)}`
      : (parameter.extractor?.type ?? "arg"),
  );
  return `${descriptor.name}(${parts.join(", ")})`;
}
