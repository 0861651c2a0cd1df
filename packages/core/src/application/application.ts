import { createServer, type Server } from "node:http";
import type { AddressInfo } from "node:net";
import createDebug from "debug";
import type {
  AppDataReader,
  HttpMethod,
  HttpRequest,
  HttpResponse,
  Logger,
  ServiceContainer,
  Type,
} from "@scopebound/types";
import { AppData } from "../bridge/app-data";
import { attachContainer, CONTAINER_KEY } from "../bridge/container-bridge";
import { HandlerRegistry, type RouteMatch } from "../handlers/registry";
import { executeHandlerPipeline, toErrorResponse } from "../handlers/pipeline";
import { NotFoundException } from "../errors/http-exception";
import type { HandlerFunction } from "../injection/transform";
import { readAppConfig, type AppConfig } from "../config/env";
import { createLogger } from "../logging/logger";
import { createRequestListener } from "../server/node-http";

const debug = createDebug("scopebound:core:application");

export type ApplicationOptions = {
  config?: AppConfig;
  logger?: Logger;
};

/**
 * One application instance: its routes, its application-wide data (the
 * attached container among it) and, once listening, its HTTP server.
 * Instances share nothing, so several can run side by side.
 */
export class Application {
  private readonly data = new AppData();
  private readonly registry = new HandlerRegistry();
  private readonly config: AppConfig;
  private readonly logger: Logger;
  private server: Server | null = null;

  constructor(options: ApplicationOptions = {}) {
    this.config = options.config ?? readAppConfig();
    this.logger = options.logger ?? createLogger(this.config);
  }

  /**
   * Attaches the container every injected handler resolves from. Call once,
   * before {@link Application.listen}.
   */
  registerContainer(container: ServiceContainer): this {
    if (this.server) {
      throw new Error("registerContainer() must be called before listen()");
    }
    attachContainer(this.data, container);
    return this;
  }

  controller(controllerClass: Type): this {
    this.registry.registerController(controllerClass);
    return this;
  }

  route(method: HttpMethod, path: string, handler: HandlerFunction): this {
    this.registry.registerFunction(method, path, handler);
    return this;
  }

  async handle(request: HttpRequest): Promise<HttpResponse> {
    let match: RouteMatch | undefined;
    try {
      match = this.registry.match(request.method, request.path);
    } catch (error) {
      return toErrorResponse(error, this.logger);
    }
    if (!match) {
      return toErrorResponse(
        new NotFoundException(`No handler found for ${request.method} ${request.path}`),
        this.logger,
      );
    }

    return executeHandlerPipeline(
      match.route,
      { ...request, pathParams: { ...request.pathParams, ...match.pathParams } },
      { appData: this.data, logger: this.logger },
    );
  }

  async listen(port = this.config.port, host = this.config.host): Promise<AddressInfo> {
    if (this.server) {
      throw new Error("Application is already listening");
    }
    if (!this.data.has(CONTAINER_KEY)) {
      this.logger.warn("Starting without a container; injected handlers will fail");
    }

    const server = createServer(createRequestListener(this, this.logger));
    await new Promise<void>((resolve, reject) => {
      server.once("error", reject);
      server.listen(port, host, () => {
        server.off("error", reject);
        resolve();
      });
    });
    this.server = server;

    const address = server.address();
    if (address === null || typeof address === "string") {
      throw new Error(`Unexpected server address: ${String(address)}`);
    }
    this.logger.info("Listening", { host: address.address, port: address.port });
    return address;
  }

  async close(): Promise<void> {
    debug("close: shutting down application");
    const server = this.server;
    this.server = null;
    if (server) {
      await new Promise<void>((resolve, reject) => {
        server.close((error) => (error ? reject(error) : resolve()));
      });
    }

    await this.data.get(CONTAINER_KEY)?.closeAll();
  }

  getAppData(): AppDataReader {
    return this.data;
  }

  getRegistry(): HandlerRegistry {
    return this.registry;
  }
}
