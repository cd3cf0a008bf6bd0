import { expandMacro } from "../ndl/expand-macro.js";
import { resolveReference } from "../ndl/resolve.js";
import type { Script } from "../ndl/Script.js";
import {
  HandleMap,
  Pass,
  isReference,
  positionalParams,
  type FunctionNode,
  type NdlNode,
  type NodeEvaluator,
} from "../ndl/types.js";
import { qualify } from "../utils.js";

/**
 * Renders a script with its macros expanded, one `qualified.name = Op(arg, ...)`
 * line per statement. Handles are the text a node renders as where it is used.
 */
export class ScriptDumper implements NodeEvaluator<string> {
  readonly handles = new HandleMap<string>();
  readonly lines: string[] = [];

  evaluate(node: NdlNode, baseName: string, pass: Pass): void {
    const name = qualify(baseName, node.name);
    switch (node.kind) {
      case "function":
        this.lines.push(`${name} = ${this.render(node, baseName, pass)}`);
        this.handles.set(node, name);
        return;
      case "macroCall":
        expandMacro(node, this, baseName, pass);
        return;
      case "constant":
        this.lines.push(`${name} = ${node.value}`);
        this.handles.set(node, name);
        return;
      case "variable":
      case "array":
        this.lines.push(`${name} = ${this.argText(node, node, baseName, pass)}`);
        this.handles.set(node, name);
        return;
      default:
        return;
    }
  }

  evaluateParameter(node: NdlNode, param: NdlNode, baseName: string, pass: Pass): NdlNode | undefined {
    const seen = new Set<NdlNode>();
    let current: NdlNode | undefined = param;
    while (current && (isReference(current) || current.kind === "optionalParameter")) {
      if (current !== node && this.handles.get(current) !== undefined) return current;
      if (seen.has(current)) return undefined;
      seen.add(current);
      if (current.kind === "dotParameter") {
        // a name inside another expansion reads as its qualified name
        this.handles.set(current, qualify(current.owner.baseName, current.value));
        return current;
      }
      current = resolveReference(current);
    }
    if (!current) return undefined;

    const owner = current.owner;
    if (owner.isStatement(current) && current !== node) {
      this.handles.set(current, qualify(owner.baseName, current.name));
      return current;
    }
    switch (current.kind) {
      case "constant":
        this.handles.set(current, current.value);
        return current;
      case "function":
        this.handles.set(current, this.render(current, owner.baseName, pass));
        return current;
      case "macroCall":
        expandMacro(current, this, owner.baseName, pass);
        return current;
      case "array": {
        const array = current;
        const items = array.params.map((item) => this.argText(array, item, baseName, pass));
        this.handles.set(array, items.join(":"));
        return array;
      }
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
  ): (string | undefined)[] {
    return positionalParams(node)
      .slice(start, start + count)
      .map((param) => {
        const resolved = this.evaluateParameter(node, param, baseName, pass);
        return resolved ? this.handles.get(resolved) : undefined;
      });
  }

  /** The dump has no host symbols: every name comes from the script */
  findSymbol(): string | undefined {
    return undefined;
  }

  /** Options are rendered inline where they are written, never applied */
  processOptionalParameters(): void {}

  text(): string {
    return this.lines.map((line) => `${line}\n`).join("");
  }

  private render(node: FunctionNode, baseName: string, pass: Pass): string {
    const args = node.params.map((param) => this.argText(node, param, baseName, pass));
    return `${node.fn.name}(${args.join(", ")})`;
  }

  /** How a parameter reads: its handle, or the unresolved name */
  private argText(node: NdlNode, param: NdlNode, baseName: string, pass: Pass): string {
    if (param.kind === "optionalParameter") return `${param.name}=${param.value}`;
    const resolved = this.evaluateParameter(node, param, baseName, pass);
    const handle = resolved ? this.handles.get(resolved) : undefined;
    if (handle !== undefined) return handle;
    return isReference(param) ? param.value : param.name;
  }
}

/** Text of a script with every macro call expanded */
export function dumpScript(script: Script): string {
  const dumper = new ScriptDumper();
  script.evaluate(dumper, "", Pass.Initial);
  return dumper.text();
}
