import "reflect-metadata";
import { describe, it, expect } from "vitest";
import { HandlerRegistry, joinHandlerPath, matchRoute } from "../../src/handlers/registry";
import { Controller } from "../../src/decorators/controller";
import { Get, Patch, assertRoutePath } from "../../src/decorators/http";
import { Body, Param } from "../../src/decorators/params";
import { Injected, InjectHandler } from "../../src/decorators/injected";
import { BadRequestException } from "../../src/errors/http-exception";
import { injectHandler, injected, fromParam, passthrough } from "../../src/injection/inject-handler";

describe("joinHandlerPath", () => {
  it.each([
    ["/orders", "/{orderId}", "/orders/{orderId}"],
    ["/", "/health", "/health"],
    ["orders/", "/", "/orders"],
    ["", "/", "/"],
  ])("should join %s and %s into %s", (prefix, methodPath, expected) => {
    expect(joinHandlerPath(prefix, methodPath)).toBe(expected);
  });
});

describe("matchRoute", () => {
  it("should extract decoded path parameters", () => {
    expect(matchRoute("/files/{name}", "/files/a%20b.txt")).toEqual({ name: "a b.txt" });
  });

  it("should reject a malformed percent-escape with 400", () => {
    expect(() => matchRoute("/items/{id}", "/items/%E0%A4%A")).toThrow(
      new BadRequestException('Malformed path segment "%E0%A4%A"'),
    );
  });

  it("should return null when a literal segment differs", () => {
    expect(matchRoute("/files/{name}", "/folders/x")).toBeNull();
  });

  it("should return null when the segment count differs", () => {
    expect(matchRoute("/files/{name}", "/files/x/y")).toBeNull();
  });
});

@Controller("/orders")
class OrdersController {
  @Get("/{orderId}")
  async show(@Param("orderId") orderId: string) {
    return { orderId };
  }

  @Patch("/{orderId}")
  @InjectHandler()
  async update(
    @Injected("OrderRepository") _orders: unknown,
    @Param("orderId") orderId: string,
    @Body() body: unknown,
  ) {
    return { orderId, body };
  }

  helper() {
    return "not a route";
  }
}

describe("HandlerRegistry", () => {
  it("should register every routed controller method with its reduced extractors", () => {
    // Arrange
    const registry = new HandlerRegistry();

    // Act
    registry.registerController(OrdersController);

    // Assert
    const routes = registry.getAllRoutes().map(({ method, path, paramMetadata }) => ({
      method,
      path,
      paramMetadata,
    }));
    expect(routes).toEqual([
      {
        method: "GET",
        path: "/orders/{orderId}",
        paramMetadata: [{ index: 0, type: "param", key: "orderId" }],
      },
      {
        method: "PATCH",
        path: "/orders/{orderId}",
        paramMetadata: [
          { index: 0, type: "param", key: "orderId" },
          { index: 1, type: "body" },
        ],
      },
    ]);
  });

  it("should match by method and path", () => {
    // Arrange
    const registry = new HandlerRegistry();
    registry.registerController(OrdersController);

    // Act
    const match = registry.match("PATCH", "/orders/o-7");

    // Assert
    expect(match?.route.method).toBe("PATCH");
    expect(match?.pathParams).toEqual({ orderId: "o-7" });
    expect(registry.match("DELETE", "/orders/o-7")).toBeUndefined();
  });

  it("should reject a class without @Controller", () => {
    // Arrange
    class Plain {}

    // Act & Assert
    expect(() => new HandlerRegistry().registerController(Plain)).toThrow(
      "Plain is not decorated with @Controller()",
    );
  });

  it("should reject controllers with constructor parameters", () => {
    // Arrange
    @Controller()
    class WithDeps {
      constructor(public readonly dep: string) {}
    }

    // Act & Assert
    expect(() => new HandlerRegistry().registerController(WithDeps)).toThrow(
      "WithDeps: controllers take no constructor parameters",
    );
  });

  it("should mark plain functions as receiving the request", () => {
    // Arrange
    const registry = new HandlerRegistry();

    // Act
    registry.registerFunction("GET", "health", () => "ok");

    // Assert
    const [route] = registry.getAllRoutes();
    expect(route.path).toBe("/health");
    expect(route.receivesRequest).toBe(true);
    expect(route.paramMetadata).toEqual([]);
  });

  it("should take extractors from an injected function handler", () => {
    // Arrange
    const registry = new HandlerRegistry();
    const handler = injectHandler(
      [injected("OrderRepository"), fromParam("orderId")],
      async (_orders: unknown, orderId: string) => orderId,
    );

    // Act
    registry.registerFunction("GET", "/orders/{orderId}", handler);

    // Assert
    const [route] = registry.getAllRoutes();
    expect(route.receivesRequest).toBe(false);
    expect(route.paramMetadata).toEqual([{ type: "param", key: "orderId", index: 0 }]);
  });

  it("should refuse a function handler with an argument no request can supply", () => {
    // Arrange
    const registry = new HandlerRegistry();
    const handler = injectHandler(
      [passthrough(), injected("OrderRepository")],
      async (limit: number, _orders: unknown) => limit,
    );

    // Act & Assert
    expect(() => registry.registerFunction("GET", "/orders", handler)).toThrow(
      "anonymous: parameters 0 have no request extractor",
    );
  });
});

describe("assertRoutePath", () => {
  it("should accept whole-segment placeholders", () => {
    expect(() => assertRoutePath("/orders/{orderId}/items/{item_id}")).not.toThrow();
  });

  it.each(["/orders/{orderId", "/orders/id-{orderId}", "/orders/{}"])(
    "should reject %s",
    (path) => {
      expect(() => assertRoutePath(path)).toThrow(`Invalid route path "${path}"`);
    },
  );

  it("should reject a malformed path when a function route is registered", () => {
    expect(() => new HandlerRegistry().registerFunction("GET", "/files/{name", () => null)).toThrow(
      'Invalid route path "/files/{name": segment "{name" is not a {param}',
    );
  });
});
