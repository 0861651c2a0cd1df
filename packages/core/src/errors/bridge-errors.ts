/**
 * Raised when a request asks for a scope but the application instance never
 * had a container attached. Surfaces through the handler's rejection instead
 * of crashing the process.
 */
export class NotAttachedError extends Error {
  constructor(public readonly requestId?: string) {
    super("Container not registered");
    this.name = "NotAttachedError";
  }
}

export class ContainerAlreadyAttachedError extends Error {
  constructor() {
    super(
      "A container is already attached to this application instance. " +
        "Build one container and register it once, before the server starts.",
    );
    this.name = "ContainerAlreadyAttachedError";
  }
}

export class RequestContextUnavailableError extends Error {
  constructor(public readonly handlerName: string) {
    super(
      `Handler "${handlerName}" has injected parameters and must run inside a request ` +
        "(Application.handle or runInRequestContext).",
    );
    this.name = "RequestContextUnavailableError";
  }
}
