import {
  ArityError,
  ModelFormatError,
  NdlSyntaxError,
  ReferenceScopeError,
  StateError,
  atLine,
} from "../errors.js";
import { MacroRegistry } from "../ndl/MacroRegistry.js";
import { NetworkBinding } from "../ndl/NetworkBinding.js";
import { Script } from "../ndl/Script.js";
import { Pass } from "../ndl/types.js";
import { ComputationNetwork } from "../network/ComputationNetwork.js";
import type { CopyFlags } from "../network/types.js";
import { resolveOptions, type NdlkitOptions, type ResolvedOptions } from "../options.js";
import { parseStatements, renderValue } from "../parser/index.js";
import { instrumentCommand } from "../telemetry.js";
import type { CallSyntax, StatementSyntax, ValueSyntax } from "../types.js";
import { lookupName, parseBoolean, splitFirst } from "../utils.js";
import { COMMANDS, MODEL_FORMATS, PROPERTIES, type CommandDef, type CommandName } from "./commands.js";
import { findSymbols, generateNames, locateSymbol, type ModelLookup, type SymbolTarget } from "./symbols.js";

/** Name models get when a command does not give one */
export const DEFAULT_MODEL_NAME = "default";

/** Parameters of one command: values in order, `name=value` options by canonical name */
type CommandArgs = {
  values: string[];
  options: Map<string, string>;
};

/**
 * Interpreter for model editing scripts.
 *
 * Owns the registered models (each a network plus the NDL script that
 * builds it) and the default model that unqualified names address. Calls
 * are editing commands; assignments and macro definitions are NDL, appended
 * to the addressed model's script and built through the Initial pass.
 *
 * @example
 * ```ts
 * const editor = new ModelEditor({ files });
 * editor.run(`
 *   LoadModel(base.json)
 *   h2 = Sigmoid(Plus(Times(W2, h1), b2))
 *   SetNodeInput(out, 1, h2)
 *   SaveDefaultModel(edited.json)
 * `);
 * ```
 */
export class ModelEditor implements ModelLookup {
  /** Macros and library constants shared by every model's script */
  readonly registry: MacroRegistry;
  private readonly options: ResolvedOptions;
  private readonly models = new Map<string, NetworkBinding>();
  private current: NetworkBinding | undefined;

  constructor(options?: NdlkitOptions) {
    this.options = resolveOptions(options);
    this.registry = new MacroRegistry({
      maxMacroDepth: this.options.maxMacroDepth,
      separator: this.options.separator,
    });
  }

  get defaultModel(): NetworkBinding | undefined {
    return this.current;
  }

  getModel(name: string): NetworkBinding | undefined {
    return this.models.get(name);
  }

  /** Registered model names, in registration order */
  get modelNames(): string[] {
    return [...this.models.keys()];
  }

  /** Parse an editing script and execute its statements in order */
  run(text: string): void {
    let statements: StatementSyntax[];
    try {
      statements = parseStatements(text, this.options.separator);
    } catch (err) {
      this.options.logger.error("[mel] parse failed: %s", err instanceof Error ? err.message : String(err));
      throw err;
    }
    for (const stmt of statements) this.execute(stmt);
  }

  /** Execute one parsed statement */
  execute(stmt: StatementSyntax): void {
    switch (stmt.kind) {
      case "call":
        this.runCommand(stmt.call);
        return;
      case "assign":
      case "macro": {
        const inline = stmt;
        instrumentCommand("NDL", { "ndlkit.mel.line": inline.line }, this.options.logger, () =>
          this.readInlineNdl(inline),
        );
        return;
      }
      case "section":
        throw new NdlSyntaxError(
          atLine(stmt.line, `Section "${stmt.key}" is not allowed in an editing script`),
          stmt.key,
        );
    }
  }

  // ── Commands ─────────────────────────────────────────────────────────────

  private runCommand(call: CallSyntax): void {
    const def = lookupName(call.name, COMMANDS);
    if (!def) {
      const message = atLine(call.line, `Unknown editing command "${call.name}"`);
      this.options.logger.error("[mel] %s failed: %s", call.name, message);
      throw new StateError(message, call.name);
    }
    instrumentCommand(def.name, { "ndlkit.mel.line": call.line }, this.options.logger, () =>
      this.dispatch(def.name, collectArgs(def, call)),
    );
  }

  private dispatch(command: CommandName, args: CommandArgs): void {
    const { values, options } = args;
    switch (command) {
      case "CreateModel":
        this.register(this.createBinding(DEFAULT_MODEL_NAME));
        return;
      case "CreateModelWithName":
        this.register(this.createBinding(values[0]));
        return;
      case "LoadModel":
        this.loadModel(DEFAULT_MODEL_NAME, values[0], options.get("format"));
        return;
      case "LoadModelWithName":
        this.loadModel(values[0], values[1], options.get("format"));
        return;
      case "LoadNDLSnippet":
        this.loadSnippet(values[0], values[1], options.get("section"));
        return;
      case "SaveDefaultModel":
        this.saveModel(this.requireDefault(), values[0], options.get("format"));
        return;
      case "SaveModel":
        this.saveModel(this.requireModel(values[0]), values[1], options.get("format"));
        return;
      case "SetDefaultModel":
        this.current = this.requireModel(values[0]);
        return;
      case "UnloadModel":
        for (const name of values) this.unload(name);
        return;
      case "DumpModel": {
        const model = this.requireModel(values[0]);
        model.build(Pass.Final, true);
        this.options.files.writeText(values[1], model.network.dump(includeData(options)));
        return;
      }
      case "DumpNode": {
        const target = locateSymbol(this, values[0]);
        target.model.build(Pass.Final);
        const nodes = findSymbols(target);
        this.options.files.writeText(values[1], target.model.network.dump(includeData(options), nodes));
        return;
      }
      case "CopyNode":
        this.copyNodes(values[0], values[1], copyFlags(options));
        return;
      case "CopySubTree":
        this.copySubTree(values[0], values[1], values[2], copyFlags(options));
        return;
      case "CopyNodeInputs":
        this.copyInputs(values[0], values[1]);
        return;
      case "SetNodeInput":
        this.setNodeInput(values[0], values[1], values[2]);
        return;
      case "SetNodeInputs":
        this.setNodeInputs(values[0], values.slice(1));
        return;
      case "SetProperty":
        this.setProperty(values[0], values[1], values[2]);
        return;
      case "SetPropertyForSubTree":
        this.setPropertyForSubTree(values[0], values[1], values[2]);
        return;
      case "RemoveNode":
      case "DeleteNode":
        this.removeNodes(values);
        return;
      case "Rename":
        this.rename(values[0], values[1]);
        return;
      default: {
        const unreachable: never = command;
        throw new StateError(`Unknown editing command "${String(unreachable)}"`);
      }
    }
  }

  // ── Models ───────────────────────────────────────────────────────────────

  private createBinding(name: string): NetworkBinding {
    return new NetworkBinding(
      name,
      new ComputationNetwork(),
      new Script(this.registry),
      this.options.logger,
    );
  }

  /** Register a model under its name and make it the default */
  private register(binding: NetworkBinding): void {
    const existing = this.models.get(binding.name);
    if (existing) {
      this.options.logger.warn("[mel] model %s already exists and is replaced", binding.name);
      existing.release();
      if (this.current === existing) this.current = undefined;
    }
    this.models.set(binding.name, binding);
    this.current = binding;
  }

  private requireModel(name: string): NetworkBinding {
    const model = this.models.get(name);
    if (!model) throw new StateError(`Model "${name}" does not exist`, name);
    return model;
  }

  private requireDefault(symbol?: string): NetworkBinding {
    if (!this.current) {
      throw new StateError("No default model: create or load a model first", symbol);
    }
    return this.current;
  }

  private loadModel(name: string, path: string, format: string | undefined): void {
    checkFormat(format);
    const binding = this.createBinding(name);
    binding.network.loadFromFile(path, this.options.files);
    this.register(binding);
  }

  private loadSnippet(name: string, path: string, section: string | undefined): void {
    const binding = this.createBinding(name);
    const text = this.options.files.readText(path);
    if (section !== undefined) binding.script.parseSection(text, section);
    else binding.script.parseFile(text);
    binding.build(Pass.Initial);
    this.register(binding);
  }

  private saveModel(model: NetworkBinding, path: string, format: string | undefined): void {
    checkFormat(format);
    model.build(Pass.Final, true);
    model.network.saveToFile(path, this.options.files);
  }

  private unload(name: string): void {
    const model = this.requireModel(name);
    model.release();
    this.models.delete(name);
    if (this.current === model) this.current = undefined;
  }

  // ── Node edits ───────────────────────────────────────────────────────────

  private copyNodes(from: string, to: string, flags: CopyFlags): void {
    const source = locateSymbol(this, from);
    const target = locateSymbol(this, to);
    source.model.build();
    if (target.model !== source.model) target.model.build();
    for (const [node, name] of generateNames(source, target)) {
      target.model.network.copyNode(source.model.network, node.name, name, flags);
    }
  }

  private copySubTree(from: string, toModel: string, prefix: string, flags: CopyFlags): void {
    const source = locateSymbol(this, from);
    const destination = this.requireModel(toModel);
    source.model.build();
    if (destination !== source.model) destination.build();
    for (const root of findSymbols(source)) {
      destination.network.copySubTree(source.model.network, root.name, prefix, flags);
    }
  }

  private copyInputs(from: string, to: string): void {
    const source = locateSymbol(this, from);
    const target = locateSymbol(this, to);
    sameModel("CopyNodeInputs", source, target);
    source.model.build();
    for (const [node, name] of generateNames(source, target)) {
      target.model.network.copyNode(source.model.network, node.name, name, "inputs");
    }
  }

  private setNodeInput(to: string, indexText: string, from: string): void {
    const target = locateSymbol(this, to);
    const source = locateSymbol(this, from);
    sameModel("SetNodeInput", target, source);
    target.model.build(Pass.Resolve);

    const inputs = findSymbols(source);
    if (inputs.length !== 1) {
      throw new StateError(`SetNodeInput needs a single input node, "${from}" matches ${inputs.length}`, from);
    }
    const index = Number(indexText);
    if (!Number.isInteger(index) || index < 0) {
      throw new StateError(`Input index must be a non-negative integer, got "${indexText}"`, indexText);
    }
    for (const node of findSymbols(target)) {
      target.model.network.setInput(node, index, inputs[0]);
    }
  }

  private setNodeInputs(to: string, from: readonly string[]): void {
    const target = locateSymbol(this, to);
    target.model.build(Pass.Resolve);
    const nodes = findSymbols(target);
    if (nodes.length !== 1) {
      throw new StateError(`SetNodeInputs needs exactly one target node, "${to}" matches ${nodes.length}`, to);
    }
    const inputs = from.map((symbol) => {
      const source = locateSymbol(this, symbol);
      sameModel("SetNodeInputs", target, source);
      const found = findSymbols(source);
      if (found.length !== 1) {
        throw new StateError(`SetNodeInputs needs one node per input, "${symbol}" matches ${found.length}`, symbol);
      }
      return found[0];
    });
    target.model.network.attachInputs(nodes[0], inputs);
  }

  private setProperty(symbol: string, propertyName: string, valueText: string): void {
    const property = lookupName(propertyName, PROPERTIES);
    if (!property) throw new StateError(`Invalid property "${propertyName}"`, propertyName);
    const value = parseFlag(valueText);

    const target = locateSymbol(this, symbol);
    target.model.build(Pass.Resolve);
    const { network } = target.model;
    for (const node of findSymbols(target)) {
      if (property.role) network.setRole(node, property.role, value);
      else node.needsGradient = value;
    }
  }

  private setPropertyForSubTree(symbol: string, propertyName: string, valueText: string): void {
    const property = lookupName(propertyName, PROPERTIES);
    if (property?.name !== "ComputeGradient") {
      throw new StateError(
        `Invalid property "${propertyName}": only ComputeGradient can be set for a subtree`,
        propertyName,
      );
    }
    const value = parseFlag(valueText);

    const target = locateSymbol(this, symbol);
    target.model.build(Pass.Resolve);
    for (const root of findSymbols(target)) {
      target.model.network.setLearnableNodesBelowNeedGradient(value, root);
    }
  }

  private removeNodes(symbols: readonly string[]): void {
    const built = new Set<NetworkBinding>();
    for (const symbol of symbols) {
      const target = locateSymbol(this, symbol);
      // build each model once; later statements may refer to removed nodes
      if (!built.has(target.model)) {
        target.model.build();
        built.add(target.model);
      }
      for (const node of findSymbols(target)) target.model.network.deleteNode(node.name);
    }
  }

  private rename(from: string, to: string): void {
    const source = locateSymbol(this, from);
    const target = locateSymbol(this, to);
    sameModel("Rename", source, target);
    source.model.build();
    for (const [node, name] of generateNames(source, target)) {
      source.model.network.renameNode(node, name);
    }
  }

  // ── Inline NDL ───────────────────────────────────────────────────────────

  /**
   * `model.key = value` goes to the named model (with the model prefix
   * dropped from its own names), `key = value` to the default model. Macro
   * definitions are global.
   */
  private readInlineNdl(stmt: Extract<StatementSyntax, { kind: "assign" | "macro" }>): void {
    if (stmt.kind === "macro") {
      this.registry.global.readStatements([stmt]);
      return;
    }
    const [head, rest] = splitFirst(stmt.key);
    const named = rest !== undefined ? this.models.get(head) : undefined;
    const model = named ?? this.requireDefault(stmt.key);
    const key = named && rest !== undefined ? rest : stmt.key;
    model.script.readStatements([
      { ...stmt, key, value: stripModelPrefix(stmt.value, model.name) },
    ]);
    model.build(Pass.Initial);
  }
}

// ── Parameters ─────────────────────────────────────────────────────────────

/**
 * Check the parameter count and sort parameters into values and options.
 * Optional parameters may be given by position after the required ones.
 */
function collectArgs(def: CommandDef, call: CallSyntax): CommandArgs {
  const values: string[] = [];
  const options = new Map<string, string>();
  for (const arg of call.args) {
    const text = argText(arg.value);
    if (arg.name === undefined) {
      values.push(text);
      continue;
    }
    const lower = arg.name.toLowerCase();
    const option = def.optional.find((o) => o.toLowerCase() === lower);
    if (!option) {
      throw new StateError(
        atLine(call.line, `Unknown option "${arg.name}". Valid parameters: ${def.usage}`),
        arg.name,
      );
    }
    options.set(option, text);
  }

  const count = call.args.length;
  const max = def.required + def.optional.length;
  if (values.length < def.required || (!def.variadic && count > max)) {
    const expected = def.variadic ? `${def.required}+` : max === def.required ? `${max}` : `${def.required}-${max}`;
    throw new ArityError(
      atLine(call.line, `Invalid number of parameters. Valid parameters: ${def.usage}`),
      expected,
      count,
      def.name,
    );
  }
  if (def.variadic) return { values, options };

  // within the count limit, positional options never collide with named ones
  values.slice(def.required).forEach((text, i) => options.set(def.optional[i], text));
  return { values: values.slice(0, def.required), options };
}

/** Commands take names and literals only */
function argText(value: ValueSyntax): string {
  switch (value.kind) {
    case "ref":
      return value.name;
    case "number":
    case "string":
      return value.text;
    default:
      throw new NdlSyntaxError(
        atLine(value.line, `Expected a name or a literal, got ${renderValue(value)}`),
        renderValue(value),
      );
  }
}

function parseFlag(text: string): boolean {
  const flag = parseBoolean(text);
  if (flag === undefined) throw new StateError(`Expected true or false, got "${text}"`, text);
  return flag;
}

function includeData(options: Map<string, string>): boolean {
  const text = options.get("includeData");
  return text === undefined ? false : parseFlag(text);
}

function copyFlags(options: Map<string, string>): CopyFlags {
  const text = options.get("copy")?.toLowerCase() ?? "all";
  if (text !== "all" && text !== "value") {
    throw new StateError(`Invalid copy option "${text}": expected all or value`, text);
  }
  return text;
}

function checkFormat(format: string | undefined): void {
  if (format !== undefined && !MODEL_FORMATS.includes(format.toLowerCase())) {
    throw new ModelFormatError(`Unsupported model format "${format}"`, format);
  }
}

function sameModel(command: string, a: SymbolTarget, b: SymbolTarget): void {
  if (a.model !== b.model) {
    throw new ReferenceScopeError(
      `${command} needs symbols from the same model, "${a.symbol}" and "${b.symbol}" are in different models`,
      b.symbol,
    );
  }
}

/** Drop a `model.` prefix from the names in an inline NDL value */
function stripModelPrefix(value: ValueSyntax, model: string): ValueSyntax {
  switch (value.kind) {
    case "ref": {
      const [head, rest] = splitFirst(value.name);
      return head === model && rest !== undefined ? { ...value, name: rest } : value;
    }
    case "call":
      return {
        ...value,
        args: value.args.map((arg) => ({ ...arg, value: stripModelPrefix(arg.value, model) })),
      };
    case "array":
      return { ...value, items: value.items.map((item) => stripModelPrefix(item, model)) };
    default:
      return value;
  }
}
