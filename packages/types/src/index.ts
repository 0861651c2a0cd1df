export type {
  Type,
  InjectionToken,
  ServiceLifetime,
  ClassProvider,
  FactoryProvider,
  ValueProvider,
  Provider,
} from "./common";

export type {
  HttpMethod,
  HttpRequest,
  HttpResponse,
  DataKey,
  AppDataReader,
  RequestCleanup,
  RequestContext,
} from "./http";

export type { ServiceContainer, ServiceScope } from "./container";

export type { LogLevel, Logger } from "./logger";

export type { Schema } from "./validation";
