import type {
  DependencyMap,
  ParameterDeclaration,
  ParameterKind,
  ResourceName,
} from "@wirebox/types";

export type Parameter = {
  name: ResourceName;
  kind: ParameterKind;
  hasDefault: boolean;
  defaultValue: unknown;
};

export type Signature = {
  readonly parameters: readonly Parameter[];
  /** Set when the declared shape cannot be satisfied by name-based injection. */
  readonly illegal?: string;
};

export const EMPTY_SIGNATURE: Signature = { parameters: [] };

function normalize(declaration: ParameterDeclaration): Parameter {
  if (typeof declaration === "string") {
    return { name: declaration, kind: "positional", hasDefault: false, defaultValue: undefined };
  }
  return {
    name: declaration.name,
    kind: declaration.kind ?? "positional",
    hasDefault: "default" in declaration,
    defaultValue: declaration.default,
  };
}

function findIllegalShape(parameters: readonly Parameter[]): string | undefined {
  const seen = new Set<ResourceName>();
  let rest: Parameter | undefined;
  for (const param of parameters) {
    if (seen.has(param.name)) {
      return `parameter "${param.name}" is declared more than once`;
    }
    seen.add(param.name);

    if (param.kind === "rest") {
      if (rest) {
        return `rest parameters "${rest.name}" and "${param.name}" cannot both be declared`;
      }
      rest = param;
    } else if (rest && param.kind === "positional") {
      return `positional parameter "${param.name}" follows rest parameter "${rest.name}"`;
    }
  }

  if (rest) {
    const keyword = parameters.find((p) => p.kind === "keyword");
    if (keyword) {
      return (
        `rest parameter "${rest.name}" cannot be combined with keyword parameter ` +
        `"${keyword.name}"`
      );
    }
  }
  return undefined;
}

/**
 * Normalizes declared parameters into a signature. Shape problems are recorded
 * rather than thrown so that a malformed consumer only fails when invoked.
 */
export function createSignature(declarations: readonly ParameterDeclaration[]): Signature {
  const parameters = declarations.map(normalize);
  const illegal = findIllegalShape(parameters);
  return illegal ? { parameters, illegal } : { parameters };
}

/** Parameters that name-based injection supplies a value for. */
export function injectableParameters(signature: Signature): Parameter[] {
  return signature.parameters.filter((p) => p.kind !== "rest");
}

/**
 * Lays out resolved values as call arguments: positional parameters in order,
 * followed by one object holding every keyword parameter when there are any.
 */
export function bindArguments(signature: Signature, values: DependencyMap): unknown[] {
  const args: unknown[] = [];
  const keywords: DependencyMap = {};
  let hasKeywords = false;

  for (const param of signature.parameters) {
    if (param.kind === "positional") {
      args.push(values[param.name]);
    } else if (param.kind === "keyword") {
      keywords[param.name] = values[param.name];
      hasKeywords = true;
    }
  }

  if (hasKeywords) {
    args.push(keywords);
  }
  return args;
}
