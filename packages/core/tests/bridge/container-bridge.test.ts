import "reflect-metadata";
import { describe, it, expect } from "vitest";
import { Container } from "../../src/di/container";
import { AppData, dataKey } from "../../src/bridge/app-data";
import {
  attachContainer,
  isContainerAttached,
  scopeFor,
} from "../../src/bridge/container-bridge";
import { ContainerAlreadyAttachedError, NotAttachedError } from "../../src/errors/bridge-errors";
import { mockRequest } from "../../src/testing/test-app";
import { createRequestContext } from "../helpers";

describe("AppData", () => {
  it("should store values under identity-compared keys", () => {
    // Arrange
    const data = new AppData();
    const first = dataKey<number>("counter");
    const second = dataKey<number>("counter");

    // Act
    data.set(first, 1);

    // Assert
    expect(data.get(first)).toBe(1);
    expect(data.has(second)).toBe(false);
    expect(data.get(second)).toBeUndefined();
  });
});

describe("container bridge", () => {
  it("should report whether a container is attached", () => {
    // Arrange
    const data = new AppData();

    // Act
    const before = isContainerAttached(data);
    attachContainer(data, new Container());

    // Assert
    expect(before).toBe(false);
    expect(isContainerAttached(data)).toBe(true);
  });

  it("should reject a second attach on the same application instance", () => {
    // Arrange
    const data = new AppData();
    attachContainer(data, new Container());

    // Act & Assert
    expect(() => attachContainer(data, new Container())).toThrow(ContainerAlreadyAttachedError);
  });

  it("should fail with NotAttachedError when no container is attached", () => {
    // Arrange
    const context = createRequestContext(
      new AppData(),
      mockRequest("GET", "/orders", { requestId: "req-1" }),
    );

    // Act
    let caught: unknown;
    try {
      scopeFor(context);
    } catch (error) {
      caught = error;
    }

    // Assert
    expect(caught).toBeInstanceOf(NotAttachedError);
    expect(caught).toMatchObject({ message: "Container not registered", requestId: "req-1" });
  });

  it("should derive a fresh scope on every call", () => {
    // Arrange
    const data = new AppData();
    attachContainer(data, new Container());
    const context = createRequestContext(data);

    // Act
    const first = scopeFor(context);
    const second = scopeFor(context);

    // Assert
    expect(first).not.toBe(second);
    expect(first.id).not.toBe(second.id);
  });

  it("should keep application instances independent", async () => {
    // Arrange
    const appA = new AppData();
    const appB = new AppData();
    const containerA = new Container();
    const containerB = new Container();
    containerA.registerValue("name", "a");
    containerB.registerValue("name", "b");
    attachContainer(appA, containerA);
    attachContainer(appB, containerB);

    // Act
    const fromA = await scopeFor(createRequestContext(appA)).resolve("name");
    const fromB = await scopeFor(createRequestContext(appB)).resolve("name");

    // Assert
    expect(fromA).toBe("a");
    expect(fromB).toBe("b");
  });

  it("should let a scope resolve singletons shared with the container", async () => {
    // Arrange
    const data = new AppData();
    const container = new Container();
    container.register("pool", { useFactory: () => ({ connections: 4 }) });
    attachContainer(data, container);

    // Act
    const fromScope = await scopeFor(createRequestContext(data)).resolve("pool");
    const fromRoot = await container.resolve("pool");

    // Assert
    expect(fromScope).toBe(fromRoot);
  });
});
