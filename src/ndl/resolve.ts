import { SymbolError, atLine } from "../errors.js";
import type { NdlNode } from "./types.js";
import { isReference } from "./types.js";

/**
 * Follow one reference step: a parameter to its current binding, a variable
 * or placeholder to the symbol it names. Returns undefined when nothing
 * (other than the reference itself) answers to the name yet.
 */
export function resolveReference(node: NdlNode): NdlNode | undefined {
  switch (node.kind) {
    case "parameter": {
      const bound = node.owner.symbols.get(node.name);
      return bound === node ? undefined : bound;
    }
    case "optionalParameter":
      return node.params[0];
    case "variable":
    case "undetermined":
    case "dotParameter": {
      const found = node.owner.findNode(node.value);
      return found === node ? undefined : found;
    }
    default:
      return node;
  }
}

/**
 * Follow references until a non-reference node. Returns undefined for an
 * unresolved or circular chain.
 */
export function resolveDeep(node: NdlNode): NdlNode | undefined {
  const seen = new Set<NdlNode>();
  let current: NdlNode | undefined = node;
  while (current && (isReference(current) || current.kind === "optionalParameter")) {
    if (seen.has(current)) return undefined;
    seen.add(current);
    current = resolveReference(current);
  }
  return current;
}

/** Text of a scalar parameter, which must resolve to a constant */
export function scalarText(param: NdlNode): string {
  const resolved = resolveDeep(param);
  if (!resolved || resolved.kind !== "constant") {
    throw new SymbolError(
      atLine(
        param.line,
        `Scalar expected, "${param.name}" must be a constant or a variable that resolves to a constant`,
      ),
      param.name,
    );
  }
  return resolved.value;
}
