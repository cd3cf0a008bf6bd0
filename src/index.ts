export { buildNetwork } from "./build.js";
export type { BuildOptions } from "./build.js";
export { ModelEditor, DEFAULT_MODEL_NAME } from "./mel/ModelEditor.js";
export { COMMANDS, PROPERTIES } from "./mel/commands.js";
export type { CommandDef, CommandName, PropertyDef, PropertyName } from "./mel/commands.js";
export { Script } from "./ndl/Script.js";
export type { ScriptOptions } from "./ndl/Script.js";
export { MacroRegistry } from "./ndl/MacroRegistry.js";
export { NetworkBinding } from "./ndl/NetworkBinding.js";
export { FUNCTIONS, findFunction } from "./ndl/functions.js";
export type { FunctionDef } from "./ndl/functions.js";
export { HandleMap, Pass, PASSES } from "./ndl/types.js";
export type { NdlNode, NodeEvaluator, NodeKind } from "./ndl/types.js";
export { NetworkBuilder } from "./builder/NetworkBuilder.js";
export { ScriptDumper, dumpScript } from "./builder/ScriptDumper.js";
export { ComputationNetwork } from "./network/ComputationNetwork.js";
export { MODEL_FORMAT, MODEL_VERSION, serializeNetwork } from "./network/serialize.js";
export { NODE_ROLES } from "./network/types.js";
export type { CopyFlags, Network, NetworkNode, NodeRole, NodeSpec } from "./network/types.js";
export { parseStatements } from "./parser/index.js";
export type { ArgSyntax, CallSyntax, StatementSyntax, ValueSyntax } from "./types.js";
export {
  ArityError,
  MacroDepthError,
  ModelFormatError,
  NdlSyntaxError,
  NdlkitError,
  ReferenceScopeError,
  StateError,
  SymbolError,
} from "./errors.js";
export { nodeFiles } from "./options.js";
export type { FileAccess, Logger, NdlkitOptions } from "./options.js";
export { lookupName, matchName } from "./utils.js";
