// Constructor type for DI: uses `any[]` for constructor params because
// TypeScript's contravariance rejects typed constructors against `unknown[]`.
// The injector binds arguments by declared name at runtime.
// eslint-disable-next-line @typescript-eslint/no-explicit-any
export type Type<T = unknown> = new (...args: any[]) => T;

// Key into the provider map, derived from the provider method's name
export type ResourceName = string;

/**
 * How a declared parameter receives its value:
 * - `positional`: passed in declaration order
 * - `keyword`: collected into a single trailing options object
 * - `rest`: a catch-all that name-based injection never fills
 */
export type ParameterKind = "positional" | "keyword" | "rest";

export type ParameterSpec = {
  name: ResourceName;
  kind?: ParameterKind;
  // Presence of the key marks the parameter as defaulted, even when undefined.
  default?: unknown;
};

// A bare name is shorthand for a required positional parameter.
export type ParameterDeclaration = ResourceName | ParameterSpec;
