import "reflect-metadata";
import type { HttpRequest, Schema } from "@scopebound/types";
import { PARAM_METADATA } from "../metadata/constants";
import { BadRequestException } from "../errors/http-exception";

export type ParamType = "body" | "query" | "param" | "headers" | "request" | "requestId";

/** How a request-derived argument is produced. */
export type ParamExtractor = {
  type: ParamType;
  key?: string;
  schema?: Schema;
};

export type ParamMetadata = ParamExtractor & {
  index: number;
};

export function buildExtractor(
  type: ParamType,
  keyOrSchema?: string | Schema,
  schema?: Schema,
): ParamExtractor {
  const extractor: ParamExtractor = { type };

  if (typeof keyOrSchema === "string") {
    extractor.key = keyOrSchema;
    if (schema) extractor.schema = schema;
  } else if (keyOrSchema && typeof keyOrSchema === "object") {
    extractor.schema = keyOrSchema;
  }

  return extractor;
}

function createParamDecorator(
  type: ParamType,
  keyOrSchema?: string | Schema,
  schema?: Schema,
): ParameterDecorator {
  return (target, propertyKey, parameterIndex) => {
    if (!propertyKey) return;

    const existing: ParamMetadata[] =
      Reflect.getOwnMetadata(PARAM_METADATA, target, propertyKey) ?? [];

    existing.push({ index: parameterIndex, ...buildExtractor(type, keyOrSchema, schema) });
    Reflect.defineMetadata(PARAM_METADATA, existing, target, propertyKey);
  };
}

export function Body(schema?: Schema): ParameterDecorator {
  return createParamDecorator("body", schema);
}

export function Query(): ParameterDecorator;
export function Query(key: string): ParameterDecorator;
export function Query(schema: Schema): ParameterDecorator;
export function Query(key: string, schema: Schema): ParameterDecorator;
export function Query(keyOrSchema?: string | Schema, schema?: Schema): ParameterDecorator {
  return createParamDecorator("query", keyOrSchema, schema);
}

export function Param(): ParameterDecorator;
export function Param(key: string): ParameterDecorator;
export function Param(schema: Schema): ParameterDecorator;
export function Param(key: string, schema: Schema): ParameterDecorator;
export function Param(keyOrSchema?: string | Schema, schema?: Schema): ParameterDecorator {
  return createParamDecorator("param", keyOrSchema, schema);
}

export function Headers(): ParameterDecorator;
export function Headers(key: string): ParameterDecorator;
export function Headers(keyOrSchema?: string): ParameterDecorator {
  return createParamDecorator("headers", keyOrSchema);
}

export function Req(): ParameterDecorator {
  return createParamDecorator("request");
}

export function RequestId(): ParameterDecorator {
  return createParamDecorator("requestId");
}

function readRaw(type: ParamType, key: string | undefined, request: HttpRequest): unknown {
  switch (type) {
    case "body":
      return parseBody(request);
    case "query":
      return key ? request.query[key] : request.query;
    case "param":
      return key ? request.pathParams[key] : request.pathParams;
    case "headers":
      return key ? request.headers[key.toLowerCase()] : request.headers;
    case "request":
      return request;
    case "requestId":
      return request.requestId;
  }
}

function parseBody(request: HttpRequest): unknown {
  if (!request.textBody) return null;
  if (request.contentType && !request.contentType.includes("json")) {
    return request.textBody;
  }
  try {
    return JSON.parse(request.textBody);
  } catch (error) {
    throw new BadRequestException("Malformed JSON body", formatError(error));
  }
}

export function extractParam(extractor: ParamExtractor, request: HttpRequest): unknown {
  const raw = readRaw(extractor.type, extractor.key, request);
  if (!extractor.schema) return raw;

  try {
    return extractor.schema.parse(raw);
  } catch (error) {
    const target = extractor.key ? `${extractor.type} "${extractor.key}"` : extractor.type;
    throw new BadRequestException(`Validation failed for ${target}`, formatError(error));
  }
}

function formatError(error: unknown): unknown {
  if (error instanceof Error && "issues" in error) {
    return error.issues;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return error;
}
