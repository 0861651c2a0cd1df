/** Misuse of the injection decorators or helpers, detected when a handler is defined or registered. */
export class InjectionDefinitionError extends Error {
  constructor(
    public readonly handlerName: string,
    message: string,
  ) {
    super(`${handlerName}: ${message}`);
    this.name = "InjectionDefinitionError";
  }
}
