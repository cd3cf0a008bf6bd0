import type { FunctionDef } from "./functions.js";
import type { Script } from "./Script.js";

/** Ordered evaluation passes. The caller drives them in increasing order. */
export enum Pass {
  /** create graph nodes for each statement */
  Initial = 0,
  /** bind forward references left open during Initial */
  Resolve = 1,
  /** run once shapes are knowable, before save or dump */
  Final = 2,
}

export const PASSES: readonly Pass[] = [Pass.Initial, Pass.Resolve, Pass.Final];

// ── Node model ─────────────────────────────────────────────────────────────

interface NodeBase {
  /** Index in the owner's arena */
  readonly id: number;
  /** Unique within its defining scope; `unnamed<N>` when not given */
  name: string;
  /**
   * Literal text (constants, optional parameters), canonical function name,
   * referenced symbol (variables and placeholders) or macro name (calls).
   */
  value: string;
  /** Ordered parameter list, positional and optional */
  readonly params: NdlNode[];
  readonly owner: Script;
  /** Source line, when the node came from text */
  readonly line?: number;
}

/** Numeric or string literal. Terminal. */
export interface ConstantNode extends NodeBase {
  readonly kind: "constant";
}

/** Call of a built-in function */
export interface FunctionNode extends NodeBase {
  readonly kind: "function";
  readonly fn: FunctionDef;
}

/** `key = otherName` */
export interface VariableNode extends NodeBase {
  readonly kind: "variable";
}

/** Formal parameter of a macro body, rebound on every call */
export interface ParameterNode extends NodeBase {
  readonly kind: "parameter";
}

/** Macro definition. Lives in the registry's global script. */
export interface MacroNode extends NodeBase {
  readonly kind: "macro";
  readonly formals: readonly string[];
  readonly body: Script;
}

/**
 * Call of a macro. Captures the macro's formals at lookup time and shares
 * its body script.
 */
export interface MacroCallNode extends NodeBase {
  readonly kind: "macroCall";
  readonly macro: MacroNode;
  readonly formals: readonly string[];
  readonly body: Script;
}

/** `a:b:c`; the items are the params */
export interface ArrayNode extends NodeBase {
  readonly kind: "array";
}

/** Unresolved dotted reference such as `L1.W` */
export interface DotParameterNode extends NodeBase {
  readonly kind: "dotParameter";
}

/** `name=value` argument. Raw text in `value`, parsed value in `params[0]`. */
export interface OptionalParameterNode extends NodeBase {
  readonly kind: "optionalParameter";
}

/** Forward reference to be resolved in a later pass */
export interface UndeterminedNode extends NodeBase {
  readonly kind: "undetermined";
}

export type NdlNode =
  | ConstantNode
  | FunctionNode
  | VariableNode
  | ParameterNode
  | MacroNode
  | MacroCallNode
  | ArrayNode
  | DotParameterNode
  | OptionalParameterNode
  | UndeterminedNode;

export type NodeKind = NdlNode["kind"];

/** Kinds that stand for another symbol and are followed during resolution */
export function isReference(
  node: NdlNode,
): node is VariableNode | ParameterNode | DotParameterNode | UndeterminedNode {
  return (
    node.kind === "variable" ||
    node.kind === "parameter" ||
    node.kind === "dotParameter" ||
    node.kind === "undetermined"
  );
}

/** Positional parameters (everything but `name=value`) */
export function positionalParams(node: NdlNode): NdlNode[] {
  return node.params.filter((p) => p.kind !== "optionalParameter");
}

export function optionalParams(node: NdlNode): OptionalParameterNode[] {
  return node.params.filter((p): p is OptionalParameterNode => p.kind === "optionalParameter");
}

// ── Host capability ────────────────────────────────────────────────────────

/**
 * Host handles keyed by node identity. Each evaluator owns one, so the node
 * model stays free of host types.
 */
export class HandleMap<H> {
  private map = new WeakMap<NdlNode, H>();

  get(node: NdlNode): H | undefined {
    return this.map.get(node);
  }

  set(node: NdlNode, handle: H): void {
    this.map.set(node, handle);
  }

  delete(node: NdlNode): void {
    this.map.delete(node);
  }

  /** Drop the handles of every node in a script's arena */
  clearScript(script: Script): void {
    for (const node of script.nodes) this.map.delete(node);
  }

  clear(): void {
    this.map = new WeakMap();
  }
}

/** Backend driven by `Script.evaluate` (graph builder, script dumper, ...) */
export interface NodeEvaluator<H> {
  readonly handles: HandleMap<H>;

  /** Evaluate one statement node */
  evaluate(node: NdlNode, baseName: string, pass: Pass): void;

  /**
   * Evaluate one parameter of `node`. Returns the node the parameter
   * resolved to (its handle is then in `handles`), or undefined when it is
   * not resolvable yet.
   */
  evaluateParameter(node: NdlNode, param: NdlNode, baseName: string, pass: Pass): NdlNode | undefined;

  /** Handles of `count` positional parameters starting at `start` */
  evaluateParameters(
    node: NdlNode,
    baseName: string,
    start: number,
    count: number,
    pass: Pass,
  ): (H | undefined)[];

  /** Look a fully qualified name up in the host's own symbols */
  findSymbol(name: string): H | undefined;

  /** Apply the `name=value` parameters of a macro call to its result */
  processOptionalParameters(node: NdlNode): void;
}
