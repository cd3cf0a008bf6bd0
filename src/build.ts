import { MacroRegistry } from "./ndl/MacroRegistry.js";
import { NetworkBinding } from "./ndl/NetworkBinding.js";
import { Script } from "./ndl/Script.js";
import { Pass } from "./ndl/types.js";
import { ComputationNetwork } from "./network/ComputationNetwork.js";
import { resolveOptions, type NdlkitOptions } from "./options.js";

export type BuildOptions = NdlkitOptions & {
  /** Model name used in logs and spans. Defaults to `"ndl"`. */
  name?: string;
  /** Last pass to run. Defaults to `Pass.Final`. */
  passUntil?: Pass;
  /** Validate the network after the last pass. Defaults to true when running through Final. */
  validate?: boolean;
};

/**
 * Build a network from an NDL file's text with a fresh macro registry.
 *
 * @example
 * ```ts
 * const { network } = buildNetwork(`
 *   features = Input(784)
 *   W0 = Parameter(256, 784)
 *   h1 = Sigmoid(Times(W0, features))
 * `);
 * network.getNode("h1")?.op; // "Sigmoid"
 * ```
 */
export function buildNetwork(text: string, options: BuildOptions = {}): NetworkBinding {
  const resolved = resolveOptions(options);
  const registry = new MacroRegistry({
    maxMacroDepth: resolved.maxMacroDepth,
    separator: resolved.separator,
  });
  const script = new Script(registry);
  script.parseFile(text);

  const passUntil = options.passUntil ?? Pass.Final;
  const binding = new NetworkBinding(options.name ?? "ndl", new ComputationNetwork(), script, resolved.logger);
  binding.build(passUntil, options.validate ?? passUntil === Pass.Final);
  return binding;
}
