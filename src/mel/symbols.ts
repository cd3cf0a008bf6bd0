import { StateError } from "../errors.js";
import type { NetworkBinding } from "../ndl/NetworkBinding.js";
import type { NetworkNode } from "../network/types.js";
import { hasWildcard, matchWildcard, splitFirst, substituteWildcard } from "../utils.js";

/** Models an editing script can address */
export interface ModelLookup {
  getModel(name: string): NetworkBinding | undefined;
  readonly defaultModel: NetworkBinding | undefined;
}

/** A node symbol split into the model it addresses and the name within it */
export type SymbolTarget = {
  model: NetworkBinding;
  /** Node name or pattern, without the model prefix */
  name: string;
  /** The symbol as written */
  symbol: string;
};

/**
 * `model.node` addresses `node` in a registered model; anything else
 * addresses the default model.
 */
export function locateSymbol(models: ModelLookup, symbol: string): SymbolTarget {
  const [head, rest] = splitFirst(symbol);
  if (rest !== undefined) {
    const model = models.getModel(head);
    if (model) return { model, name: rest, symbol };
  }
  const model = models.defaultModel;
  if (!model) {
    throw new StateError(`No default model: "${symbol}" needs a model to resolve in`, symbol);
  }
  return { model, name: symbol, symbol };
}

/**
 * Nodes a symbol stands for: the node built for the NDL symbol of that name,
 * else the network node of that name, else every node a `*` pattern
 * matches. Throws when nothing matches.
 */
export function findSymbols(target: SymbolTarget): NetworkNode[] {
  const { model, name, symbol } = target;
  if (!hasWildcard(name)) {
    const ndl = name.includes(".") ? undefined : model.script.symbols.get(name);
    const handle = ndl ? model.builder.handleOf(ndl) : undefined;
    if (handle) return [handle];
    const node = model.network.getNode(name);
    if (node) return [node];
    throw new StateError(`Symbol "${symbol}" not found in model ${model.name}`, symbol);
  }
  const nodes = model.network.nodesMatching(name);
  if (nodes.length === 0) {
    throw new StateError(`Pattern "${symbol}" does not match any node in model ${model.name}`, symbol);
  }
  return nodes;
}

/**
 * Pair each source node with the name it maps to. A `*` in the target is
 * replaced by what the source pattern's `*` matched.
 */
export function generateNames(from: SymbolTarget, to: SymbolTarget): [NetworkNode, string][] {
  const sources = findSymbols(from);
  const sourceWild = hasWildcard(from.name);
  const targetWild = hasWildcard(to.name);

  if (targetWild && !sourceWild) {
    throw new StateError(
      `Target "${to.symbol}" has a wildcard but source "${from.symbol}" does not`,
      to.symbol,
    );
  }
  if (!targetWild && sources.length > 1) {
    throw new StateError(
      `"${from.symbol}" matches ${sources.length} nodes but "${to.symbol}" names only one`,
      to.symbol,
    );
  }
  return sources.map((node): [NetworkNode, string] => {
    if (!targetWild) return [node, to.name];
    const capture = matchWildcard(from.name, node.name) ?? "";
    return [node, substituteWildcard(to.name, capture)];
  });
}
