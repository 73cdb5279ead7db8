/**
 * Fatal environment problems: the runtime is unreachable or the compose
 * definition is missing. Everything else is reported through result objects.
 */
export class EnvironmentError extends Error {
  constructor(
    public check: "runtime" | "compose-file",
    message: string,
  ) {
    super(message);
    this.name = "EnvironmentError";
  }
}

/** Raised by runtime adapters when a container primitive fails */
export class RuntimeCommandError extends Error {
  constructor(
    public operation: string,
    public target: string,
    message: string,
  ) {
    super(`${operation} ${target}: ${message}`);
    this.name = "RuntimeCommandError";
  }
}
