export const PROVIDER_METADATA = Symbol.for("wirebox:provider");
export const INJECTION_METHODS_METADATA = Symbol.for("wirebox:injection-methods");
export const INJECTABLE_METADATA = Symbol.for("wirebox:injectable");
export const CUSTOM_METADATA = Symbol.for("wirebox:custom");
