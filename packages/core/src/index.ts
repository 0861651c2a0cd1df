import "reflect-metadata";

// Decorators
export { Controller } from "./decorators/controller";
export { Get, Post, Put, Patch, Delete, assertRoutePath } from "./decorators/http";
export { Body, Query, Param, Headers, Req, RequestId } from "./decorators/params";
export { Injectable, Inject } from "./decorators/injectable";
export { Injected, InjectHandler } from "./decorators/injected";

// Handler injection
export {
  injectHandler,
  injected,
  passthrough,
  fromBody,
  fromQuery,
  fromParam,
  fromHeaders,
  fromRequest,
  fromRequestId,
} from "./injection/inject-handler";
export {
  transformHandler,
  resolveArguments,
  getHandlerDescriptor,
  getInnerHandler,
} from "./injection/transform";
export {
  describeHandler,
  injectedParameters,
  ordinaryParameters,
  reducedExtractors,
  formatDescriptor,
} from "./injection/handler-descriptor";

// Container bridge
export { AppData, dataKey } from "./bridge/app-data";
export {
  attachContainer,
  isContainerAttached,
  scopeFor,
  CONTAINER_KEY,
} from "./bridge/container-bridge";

// Request context
export {
  currentRequestContext,
  getRequestLogger,
  runInRequestContext,
  ManagedRequestContext,
} from "./context/request-context";

// DI
export { Container } from "./di/container";
export { Scope } from "./di/scope";
export { tokenToString } from "./di/token";

// Application
export { Application } from "./application/application";
export { HandlerRegistry, joinHandlerPath, matchRoute } from "./handlers/registry";
export { executeHandlerPipeline, toErrorResponse } from "./handlers/pipeline";
export { createRequestListener, buildHttpRequest, parseCookies } from "./server/node-http";

// Config & logging
export { readAppConfig } from "./config/env";
export { createLogger, PinoLogger } from "./logging/logger";

// Errors
export {
  HttpException,
  BadRequestException,
  NotFoundException,
  MethodNotAllowedException,
} from "./errors/http-exception";
export { ResolveError } from "./errors/resolve-error";
export {
  NotAttachedError,
  ContainerAlreadyAttachedError,
  RequestContextUnavailableError,
} from "./errors/bridge-errors";
export { InjectionDefinitionError } from "./errors/injection-definition-error";

// Testing
export { mockRequest } from "./testing/test-app";

// Metadata constants
export {
  CONTROLLER_METADATA,
  HTTP_METHOD_METADATA,
  ROUTE_PATH_METADATA,
  PARAM_METADATA,
  INJECT_METADATA,
  INJECTABLE_METADATA,
  INJECTED_PARAM_METADATA,
  HANDLER_DESCRIPTOR_METADATA,
  INNER_HANDLER_METADATA,
} from "./metadata/constants";

// Re-export key types from @scopebound/types
export type {
  Type,
  InjectionToken,
  Provider,
  ServiceLifetime,
  HttpMethod,
  HttpRequest,
  HttpResponse,
  RequestContext,
  DataKey,
  AppDataReader,
  ServiceContainer,
  ServiceScope,
  Logger,
  LogLevel,
  Schema,
} from "@scopebound/types";

// Re-export types defined in core
export type { ControllerMetadata } from "./decorators/controller";
export type { ParamType, ParamExtractor, ParamMetadata } from "./decorators/params";
export type { InjectableOptions } from "./decorators/injectable";
export type {
  InjectedSlot,
  OrdinarySlot,
  ParamSlot,
  ReducedParameters,
} from "./injection/inject-handler";
export type { HandlerFunction, OuterHandler } from "./injection/transform";
export type {
  HandlerDescriptor,
  ParameterDescriptor,
  InjectedParameter,
  OrdinaryParameter,
  DescribeHandlerInput,
} from "./injection/handler-descriptor";
export type { ResolveErrorReason } from "./errors/resolve-error";
export type { ResolvedRoute, RouteMatch } from "./handlers/registry";
export type { PipelineOptions } from "./handlers/pipeline";
export type { ApplicationOptions } from "./application/application";
export type { AppConfig, LogFormat } from "./config/env";
export type { LoggingConfig } from "./logging/logger";
export type { MockRequestOptions } from "./testing/test-app";
export type { RawRequestParts, RequestHandler } from "./server/node-http";
