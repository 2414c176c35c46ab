import type { ResourceName } from "@wirebox/types";

export class InjectorException extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InjectorException";
  }
}

/**
 * Raised when a consumer cannot be invoked: its signature has an illegal shape,
 * or a required parameter has no override, provider or default.
 */
export class InjectionError extends InjectorException {
  constructor(
    message: string,
    public readonly consumer: string,
    public readonly path: readonly ResourceName[] = [],
  ) {
    super(path.length > 0 ? `${message} (while resolving ${path.join(" → ")})` : message);
    this.name = "InjectionError";
  }
}

export class CircularDependencyError extends InjectorException {
  constructor(public readonly cycle: readonly ResourceName[]) {
    super(`Circular dependency detected: ${cycle.join(" → ")}`);
    this.name = "CircularDependencyError";
  }
}
