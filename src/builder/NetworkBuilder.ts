import { SymbolError, atLine } from "../errors.js";
import { bindArguments, expandMacro } from "../ndl/expand-macro.js";
import { DIM_SCALARS, scalarCount } from "../ndl/functions.js";
import { resolveDeep, resolveReference, scalarText } from "../ndl/resolve.js";
import {
  HandleMap,
  Pass,
  isReference,
  optionalParams,
  positionalParams,
  type FunctionNode,
  type NdlNode,
  type NodeEvaluator,
  type OptionalParameterNode,
} from "../ndl/types.js";
import type { Network, NetworkNode, NodeRole } from "../network/types.js";
import { defaultLogger, type Logger } from "../options.js";
import { parseBoolean, qualify } from "../utils.js";

/** `tag=` values and the role each one sets */
const TAG_ROLES: Record<string, NodeRole> = {
  feature: "feature",
  label: "label",
  criteria: "finalCriterion",
  criterion: "finalCriterion",
  finalcriterion: "finalCriterion",
  eval: "evaluation",
  evaluation: "evaluation",
  output: "output",
};

/**
 * Builds a network from NDL.
 *
 *  - Initial: create a node per function call (named `baseName.name`),
 *    turning constants used as inputs into `Constant` nodes
 *  - Resolve: fill inputs that were forward references
 *  - Final: every input must be connected
 *
 * Names NDL cannot resolve fall back to network nodes, so inline NDL in an
 * editing script can refer to nodes that were loaded from a model file.
 */
export class NetworkBuilder implements NodeEvaluator<NetworkNode> {
  readonly handles = new HandleMap<NetworkNode>();
  private readonly optionsApplied = new WeakSet<NetworkNode>();

  constructor(
    readonly network: Network,
    private readonly logger: Logger = defaultLogger,
  ) {}

  evaluate(node: NdlNode, baseName: string, pass: Pass): void {
    switch (node.kind) {
      case "function":
        this.evaluateFunction(node, baseName, pass);
        return;
      case "macroCall":
        expandMacro(node, this, baseName, pass);
        this.processOptionalParameters(node);
        return;
      case "variable": {
        // named scalars stay out of the network
        if (resolveDeep(node)?.kind === "constant") return;
        const resolved = this.evaluateParameter(node, node, baseName, pass);
        if (resolved && resolved !== node) {
          const handle = this.handles.get(resolved);
          if (handle) this.handles.set(node, handle);
          return;
        }
        if (!resolved && pass > Pass.Initial) {
          throw new SymbolError(atLine(node.line, `Undefined symbol "${node.value}"`), node.value);
        }
        return;
      }
      // literals, arrays and placeholders only matter where they are used
      case "constant":
      case "array":
      case "parameter":
      case "dotParameter":
      case "undetermined":
      case "optionalParameter":
      case "macro":
        return;
    }
  }

  evaluateParameter(node: NdlNode, param: NdlNode, baseName: string, pass: Pass): NdlNode | undefined {
    const seen = new Set<NdlNode>();
    let current: NdlNode | undefined = param;

    while (current && (isReference(current) || current.kind === "optionalParameter")) {
      if (seen.has(current)) return undefined;
      seen.add(current);
      if (this.liveHandle(current)) return current;

      if (current.kind === "dotParameter" || current.kind === "undetermined") {
        // dotted names go by their qualified network name first: the macro
        // body they point into is shared by every call of that macro
        const fromNetwork = this.networkFallback(current.value, current.owner.baseName);
        const resolved = resolveReference(current);
        if (fromNetwork && (current.kind === "dotParameter" || !resolved)) {
          this.handles.set(current, fromNetwork);
          return current;
        }
        current = resolved;
        continue;
      }
      current = resolveReference(current);
    }
    if (!current) return undefined;

    const owner = current.owner;
    switch (current.kind) {
      case "function":
      case "macroCall":
        if (owner.isStatement(current)) return this.statementHandle(current) ? current : undefined;
        if (current.kind === "function") {
          this.evaluateFunction(current, owner.baseName, pass);
        } else {
          expandMacro(current, this, owner.baseName, pass);
          this.processOptionalParameters(current);
        }
        return this.handles.get(current) ? current : undefined;
      case "constant":
        this.constantHandle(current);
        return current;
      case "array":
        throw new SymbolError(
          atLine(current.line, `Array "${current.name}" cannot be used as an input of ${node.name}`),
          current.name,
        );
      default:
        return undefined;
    }
  }

  evaluateParameters(
    node: NdlNode,
    baseName: string,
    start: number,
    count: number,
    pass: Pass,
  ): (NetworkNode | undefined)[] {
    return positionalParams(node)
      .slice(start, start + count)
      .map((param) => {
        const resolved = this.evaluateParameter(node, param, baseName, pass);
        return resolved ? this.liveHandle(resolved) : undefined;
      });
  }

  findSymbol(name: string): NetworkNode | undefined {
    return this.network.getNode(name);
  }

  /** Network node built for an NDL node, if it is still in the network */
  handleOf(node: NdlNode): NetworkNode | undefined {
    return this.liveHandle(node);
  }

  /** `tag`, `needGradient` and other `name=value` options of a macro call, once per result node */
  processOptionalParameters(node: NdlNode): void {
    if (node.kind !== "macroCall") return;
    const handle = this.liveHandle(node);
    if (!handle || this.optionsApplied.has(handle)) return;
    this.optionsApplied.add(handle);
    this.applyOptions(handle, bindArguments(node).optional);
  }

  // ── Functions ────────────────────────────────────────────────────────────

  private evaluateFunction(node: FunctionNode, baseName: string, pass: Pass): void {
    const name = qualify(baseName, node.name);
    const positional = positionalParams(node);
    const scalars = scalarCount(node.fn, positional.length);
    const inputCount = positional.length - scalars;

    let handle = this.liveHandle(node);
    if (!handle && pass > Pass.Initial) handle = this.network.getNode(name);

    if (!handle) {
      if (pass > Pass.Initial) {
        throw new SymbolError(atLine(node.line, `Node "${name}" was not created`), name);
      }
      const inputs = this.evaluateParameters(node, baseName, scalars, inputCount, pass);
      handle = this.network.createNode({
        name,
        op: node.fn.name,
        ...this.scalarFields(node, positional.slice(0, scalars)),
        inputs: inputs.map((input) => input ?? null),
        learnable: node.fn.learnable ?? false,
      });
      this.handles.set(node, handle);
      this.applyOptions(handle, optionalParams(node));
      this.logger.debug("[ndl] created %s = %s", name, node.fn.name);
      return;
    }
    this.handles.set(node, handle);
    if (pass === Pass.Initial) return;

    const target = handle;
    if (target.inputs.some((input) => input === null)) {
      const inputs = this.evaluateParameters(node, baseName, scalars, inputCount, pass);
      target.inputs.forEach((input, i) => {
        const resolved = inputs[i];
        if (input === null && resolved) this.network.setInput(target, i, resolved);
      });
    }
    const open = target.inputs.findIndex((input) => input === null);
    if (open !== -1) {
      const param = positional[scalars + open];
      const symbol = param ? (isReference(param) ? param.value : param.name) : `#${open}`;
      throw new SymbolError(
        atLine(node.line, `Undefined symbol "${symbol}" used as input ${open} of ${name}`),
        symbol,
      );
    }
  }

  /** Dims, value and attributes from the leading scalar parameters */
  private scalarFields(node: FunctionNode, params: NdlNode[]) {
    const dims: number[] = [];
    const attributes: Record<string, string> = {};
    let value: string | undefined;
    params.forEach((param, i) => {
      const scalarName = node.fn.scalars[i];
      const text = scalarText(param);
      if (scalarName === "value") {
        value = text;
      } else if (DIM_SCALARS.has(scalarName)) {
        const n = Number(text);
        if (!Number.isInteger(n) || n < 0) {
          throw new SymbolError(
            atLine(node.line, `${node.fn.name} ${scalarName} must be a non-negative integer, got "${text}"`),
            text,
          );
        }
        dims.push(n);
      } else {
        attributes[scalarName] = text;
      }
    });
    return { dims, attributes, ...(value !== undefined ? { value } : {}) };
  }

  private applyOptions(handle: NetworkNode, options: readonly OptionalParameterNode[]): void {
    for (const option of options) {
      const text = optionText(option);
      const key = option.name.toLowerCase();
      if (key === "tag") {
        const role = TAG_ROLES[text.toLowerCase()];
        if (role) this.network.setRole(handle, role, true);
        else handle.attributes.tag = text;
      } else if (key === "needgradient" || key === "computegradient") {
        const flag = parseBoolean(text);
        if (flag === undefined) {
          throw new SymbolError(atLine(option.line, `${option.name} expects true or false, got "${text}"`), text);
        }
        handle.needsGradient = flag;
      } else {
        handle.attributes[option.name] = text;
      }
    }
  }

  // ── Handles ──────────────────────────────────────────────────────────────

  /** Cached handle, as long as the node is still in the network */
  private liveHandle(node: NdlNode): NetworkNode | undefined {
    const handle = this.handles.get(node);
    if (handle && this.network.has(handle)) return handle;
    return undefined;
  }

  /** Handle of a statement evaluated earlier (this pass or a previous one) */
  private statementHandle(node: NdlNode): NetworkNode | undefined {
    const cached = this.liveHandle(node);
    if (cached) return cached;
    const found = this.network.getNode(qualify(node.owner.baseName, node.name));
    if (found) this.handles.set(node, found);
    return found;
  }

  /** Constants used as inputs become `Constant` nodes */
  private constantHandle(node: NdlNode): NetworkNode {
    const cached = this.liveHandle(node);
    if (cached) return cached;
    const name = qualify(node.owner.baseName, node.name);
    const handle =
      this.network.getNode(name) ??
      this.network.createNode({ name, op: "Constant", value: node.value, dims: [1, 1] });
    this.handles.set(node, handle);
    return handle;
  }

  private networkFallback(name: string, baseName: string): NetworkNode | undefined {
    return this.network.getNode(qualify(baseName, name)) ?? this.network.getNode(name);
  }
}

/** Literal text of an option: the constant it resolves to, else its raw text */
function optionText(option: OptionalParameterNode): string {
  const value = option.params[0];
  if (value?.kind === "constant") return value.value;
  return option.value;
}
