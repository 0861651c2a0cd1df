import "reflect-metadata";
import { describe, it, expect, beforeEach, vi } from "vitest";
import type { HttpRequest, HttpResponse } from "@scopebound/types";
import { Application } from "../../src/application/application";
import { Container } from "../../src/di/container";
import { Injectable } from "../../src/decorators/injectable";
import { Controller } from "../../src/decorators/controller";
import { Get, Post, Delete } from "../../src/decorators/http";
import { Body, Param } from "../../src/decorators/params";
import { Injected, InjectHandler } from "../../src/decorators/injected";
import { injectHandler, injected, fromBody } from "../../src/injection/inject-handler";
import { NotFoundException } from "../../src/errors/http-exception";
import { ContainerAlreadyAttachedError } from "../../src/errors/bridge-errors";
import { isContainerAttached } from "../../src/bridge/container-bridge";
import { readAppConfig } from "../../src/config/env";
import { mockRequest } from "../../src/testing/test-app";
import { createMockLogger } from "../helpers";

// ---------------------------------------------------------------------------
// Test application
// ---------------------------------------------------------------------------

type User = { id: string; name: string };

const USERS = "UserRepository";
const CLOCK = "Clock";

interface UserRepository {
  find(id: string): User | undefined;
  remove(id: string): void;
}

interface Clock {
  now(): number;
}

@Injectable({ lifetime: "scoped" })
class UnitOfWork {
  static closed = 0;
  close() {
    UnitOfWork.closed++;
  }
}

@Controller("/users")
class UsersController {
  @Get("/{id}")
  @InjectHandler()
  async show(@Param("id") id: string, @Injected(USERS) users: UserRepository) {
    const user = users.find(id);
    if (!user) throw new NotFoundException(`User ${id} not found`);
    return user;
  }

  @Delete("/{id}")
  @InjectHandler()
  async remove(
    @Param("id") id: string,
    @Injected(USERS) users: UserRepository,
    @Injected() _uow: UnitOfWork,
  ) {
    users.remove(id);
  }
}

function createRepository(): UserRepository {
  const users = new Map<string, User>([["1", { id: "1", name: "Ada" }]]);
  return {
    find: (id) => users.get(id),
    remove: (id) => {
      users.delete(id);
    },
  };
}

function jsonBody(response: HttpResponse): unknown {
  return JSON.parse(response.body ?? "");
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("Application", () => {
  let logger: ReturnType<typeof createMockLogger>;
  let container: Container;
  let app: Application;

  beforeEach(() => {
    logger = createMockLogger();
    container = new Container();
    container.registerValue(USERS, createRepository());
    container.registerValue(CLOCK, { now: () => 1700 });
    app = new Application({ config: readAppConfig({}), logger });
  });

  describe("with a container attached", () => {
    beforeEach(() => {
      app.registerContainer(container).controller(UsersController);
    });

    it("should serve a controller method with injected parameters", async () => {
      // Act
      const response = await app.handle(mockRequest("GET", "/users/1"));

      // Assert
      expect(response.status).toBe(200);
      expect(response.headers).toEqual({ "content-type": "application/json" });
      expect(jsonBody(response)).toEqual({ id: "1", name: "Ada" });
    });

    it("should map an HttpException thrown by the handler", async () => {
      // Act
      const response = await app.handle(mockRequest("GET", "/users/9"));

      // Assert
      expect(response.status).toBe(404);
      expect(jsonBody(response)).toEqual({ message: "User 9 not found" });
    });

    it("should answer 404 when no route matches", async () => {
      // Act
      const response = await app.handle(mockRequest("GET", "/orders"));

      // Assert
      expect(response.status).toBe(404);
      expect(jsonBody(response)).toEqual({ message: "No handler found for GET /orders" });
    });

    it("should answer 204 and dispose the request scope after the handler returns", async () => {
      // Arrange
      const closedBefore = UnitOfWork.closed;

      // Act
      const response = await app.handle(mockRequest("DELETE", "/users/1"));
      const after = await app.handle(mockRequest("GET", "/users/1"));

      // Assert
      expect(response.status).toBe(204);
      expect(UnitOfWork.closed).toBe(closedBefore + 1);
      expect(after.status).toBe(404);
    });

    it("should serve a function handler built with injectHandler", async () => {
      // Arrange
      app.route(
        "POST",
        "/events",
        injectHandler(
          [fromBody(), injected(CLOCK)],
          async (body: { name: string }, clock: Clock) => ({ name: body.name, at: clock.now() }),
        ),
      );

      // Act
      const response = await app.handle(mockRequest("POST", "/events", { body: { name: "signup" } }));

      // Assert
      expect(response.status).toBe(200);
      expect(jsonBody(response)).toEqual({ name: "signup", at: 1700 });
    });

    it("should call a plain function handler with the request", async () => {
      // Arrange
      app.route("GET", "/health", (request: HttpRequest) => ({
        status: 200,
        body: `ok ${request.requestId}`,
      }));

      // Act
      const response = await app.handle(mockRequest("GET", "/health", { requestId: "req-5" }));

      // Assert
      expect(response).toEqual({ status: 200, body: "ok req-5" });
    });

    it("should answer 500 and log when an injected service is missing", async () => {
      // Arrange
      app.route(
        "GET",
        "/time",
        injectHandler([injected("MissingClock")], async (clock: Clock) => clock.now()),
      );

      // Act
      const response = await app.handle(mockRequest("GET", "/time"));

      // Assert
      expect(response.status).toBe(500);
      expect(jsonBody(response)).toEqual({ message: "Internal Server Error" });
      expect(logger.error).toHaveBeenCalledWith(
        "Dependency resolution failed",
        expect.objectContaining({ token: "MissingClock", reason: "not-registered" }),
      );
    });

    it("should answer 400 for a malformed percent-escape in a path parameter", async () => {
      // Arrange
      app.route("GET", "/items/{id}", () => "ok");

      // Act
      const response = await app.handle(mockRequest("GET", "/items/%E0%A4%A"));

      // Assert
      expect(response.status).toBe(400);
      expect(jsonBody(response)).toEqual({ message: 'Malformed path segment "%E0%A4%A"' });
    });

    it("should expose its routes and attached container", () => {
      // Act
      const routes = app
        .getRegistry()
        .getAllRoutes()
        .map((route) => `${route.method} ${route.path}`);

      // Assert
      expect(routes).toEqual(["GET /users/{id}", "DELETE /users/{id}"]);
      expect(isContainerAttached(app.getAppData())).toBe(true);
    });

    it("should reject a second container", () => {
      // Act & Assert
      expect(() => app.registerContainer(new Container())).toThrow(ContainerAlreadyAttachedError);
    });

    it("should close container singletons on close()", async () => {
      // Arrange
      const onClose = vi.fn();
      container.register("pool", { useFactory: () => ({ size: 2 }), onClose });
      await container.resolve("pool");

      // Act
      await app.close();

      // Assert
      expect(onClose).toHaveBeenCalledWith({ size: 2 });
    });
  });

  describe("without a container attached", () => {
    it("should answer 500 with the not-registered message", async () => {
      // Arrange
      app.controller(UsersController);

      // Act
      const response = await app.handle(mockRequest("GET", "/users/1"));

      // Assert
      expect(response.status).toBe(500);
      expect(jsonBody(response)).toEqual({ message: "Container not registered" });
      expect(logger.error).toHaveBeenCalledWith("No container attached to the application", {
        error: "Container not registered",
      });
    });

    it("should still serve handlers without injected parameters", async () => {
      // Arrange
      app.route(
        "POST",
        "/echo",
        injectHandler([fromBody()], async (body: unknown) => body),
      );

      // Act
      const response = await app.handle(mockRequest("POST", "/echo", { body: { hello: "world" } }));

      // Assert
      expect(response.status).toBe(200);
      expect(jsonBody(response)).toEqual({ hello: "world" });
    });
  });
});

describe("Application routing errors", () => {
  it("should reject @Injected parameters on a method without @InjectHandler", () => {
    // Arrange
    @Controller("/broken")
    class BrokenController {
      @Post("/")
      async create(@Body() body: unknown, @Injected(USERS) _users: UserRepository) {
        return body;
      }
    }
    const app = new Application({ config: readAppConfig({}), logger: createMockLogger() });

    // Act & Assert
    expect(() => app.controller(BrokenController)).toThrow(
      "BrokenController.create: has @Injected parameters but is not decorated with @InjectHandler()",
    );
  });

  it("should reject an ordinary parameter that has no request extractor", () => {
    // Arrange
    @Controller("/broken")
    class BrokenController {
      @Get("/")
      @InjectHandler()
      async list(_limit: number, @Injected(USERS) _users: UserRepository) {
        return [];
      }
    }
    const app = new Application({ config: readAppConfig({}), logger: createMockLogger() });

    // Act & Assert
    expect(() => app.controller(BrokenController)).toThrow(
      "BrokenController.list: parameters 0 have no request extractor " +
        "and cannot be supplied when the handler is routed",
    );
  });
});
