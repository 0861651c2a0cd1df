import type { InjectionToken } from "@scopebound/types";
import { tokenToString } from "../di/token";

export type ResolveErrorReason =
  | "not-registered"
  | "circular"
  | "scoped-outside-scope"
  | "provider-failed"
  | "scope-disposed";

/** A capability could not be produced by the container. */
export class ResolveError extends Error {
  constructor(
    public readonly reason: ResolveErrorReason,
    public readonly token: InjectionToken,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ResolveError";
  }

  static notRegistered(token: InjectionToken): ResolveError {
    return new ResolveError(
      "not-registered",
      token,
      `No provider registered for ${tokenToString(token)}.\n` +
        "Register a provider for it on the container before attaching the container to the application.",
    );
  }

  static circular(path: readonly InjectionToken[]): ResolveError {
    const token = path[path.length - 1];
    return new ResolveError(
      "circular",
      token,
      `Circular dependency detected: ${path.map(tokenToString).join(" → ")}`,
    );
  }

  static scopedOutsideScope(token: InjectionToken): ResolveError {
    return new ResolveError(
      "scoped-outside-scope",
      token,
      `${tokenToString(token)} is scoped and cannot be resolved outside a scope ` +
        "(or from a singleton's dependencies).",
    );
  }

  static providerFailed(token: InjectionToken, cause: unknown): ResolveError {
    const detail = cause instanceof Error ? cause.message : String(cause);
    return new ResolveError(
      "provider-failed",
      token,
      `Provider for ${tokenToString(token)} failed: ${detail}`,
      { cause },
    );
  }

  static scopeDisposed(token: InjectionToken, scopeId: string): ResolveError {
    return new ResolveError(
      "scope-disposed",
      token,
      `Cannot resolve ${tokenToString(token)}: scope ${scopeId} has been disposed`,
    );
  }
}
