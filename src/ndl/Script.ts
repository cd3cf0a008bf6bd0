import { ArityError, NdlSyntaxError, StateError, SymbolError, atLine } from "../errors.js";
import { parseStatements, renderValue } from "../parser/index.js";
import type { ArgSyntax, CallSyntax, StatementSyntax, ValueSyntax } from "../types.js";
import { bindArguments, expandMacro } from "./expand-macro.js";
import { arityRange, findFunction } from "./functions.js";
import type { MacroRegistry } from "./MacroRegistry.js";
import { SymbolTable } from "./SymbolTable.js";
import type {
  ArrayNode,
  ConstantNode,
  DotParameterNode,
  FunctionNode,
  MacroCallNode,
  MacroNode,
  NdlNode,
  NodeEvaluator,
  OptionalParameterNode,
  ParameterNode,
  Pass,
  UndeterminedNode,
  VariableNode,
} from "./types.js";
import { positionalParams } from "./types.js";

export type ScriptOptions = {
  /**
   * Whether `name(formals) = body` definitions are accepted. False for
   * one-line macro bodies and call-only snippets.
   */
  allowDefinitions?: boolean;
};

type SectionSyntax = Extract<StatementSyntax, { kind: "section" }>;
type MacroSyntax = Extract<StatementSyntax, { kind: "macro" }>;

type ReadContext = {
  /** Inline `key = [ ... ]` sections into this script (file level without load/run) */
  flattenSections: boolean;
  /** Constants go to the registry's global script (load sections) */
  globalConstants: boolean;
};

const PLAIN: ReadContext = { flattenSections: false, globalConstants: false };

const SYMBOL_NAME = /^[A-Za-z_]\w*$/;

/** Fields shared by every node kind */
type NodeFields = {
  id: number;
  name: string;
  value: string;
  params: NdlNode[];
  owner: Script;
  line: number | undefined;
};

/**
 * An NDL script: ordered statements, a symbol table and the arena that owns
 * every node created while reading it.
 *
 * Macro bodies are scripts too, owned by their macro node in the registry's
 * global script.
 */
export class Script {
  readonly symbols = new SymbolTable();
  allowDefinitions: boolean;
  /** Dotted base name of the evaluation in progress */
  baseName = "";

  private readonly arena: NdlNode[] = [];
  private readonly statementList: NdlNode[] = [];
  private readonly statementSet = new Set<NdlNode>();

  constructor(
    readonly registry: MacroRegistry,
    options: ScriptOptions = {},
  ) {
    this.allowDefinitions = options.allowDefinitions ?? true;
  }

  /** Every node this script owns, in creation order */
  get nodes(): readonly NdlNode[] {
    return this.arena;
  }

  /** Statement nodes in declaration order */
  get statements(): readonly NdlNode[] {
    return this.statementList;
  }

  /** Whether the node is one of this script's statements (not a nested call or literal) */
  isStatement(node: NdlNode): boolean {
    return this.statementSet.has(node);
  }

  // ── Reading ──────────────────────────────────────────────────────────────

  /** Read statements from text. Sections are not allowed. */
  parse(text: string): void {
    this.readStatements(parseStatements(text, this.registry.separator));
  }

  /**
   * Read a whole NDL file. When `load` and/or `run` name sections, those are
   * read in order, load sections first. Otherwise every section and
   * statement is read in textual order.
   */
  parseFile(text: string): void {
    const statements = parseStatements(text, this.registry.separator);
    const sections = collectSections(statements);
    const load = directive(statements, "load");
    const run = directive(statements, "run");

    if (!load && !run) {
      for (const stmt of statements) {
        this.readStatement(stmt, { flattenSections: true, globalConstants: false });
      }
      return;
    }
    for (const name of load ?? []) {
      this.readSection(sections, name, { flattenSections: false, globalConstants: true });
    }
    for (const name of run ?? []) {
      this.readSection(sections, name, PLAIN);
    }
  }

  /** Read only the named section of an NDL file */
  parseSection(text: string, section: string): void {
    const sections = collectSections(parseStatements(text, this.registry.separator));
    this.readSection(sections, section, PLAIN);
  }

  /** Read already-parsed statements (inline NDL in editing scripts) */
  readStatements(statements: readonly StatementSyntax[]): void {
    for (const stmt of statements) this.readStatement(stmt, PLAIN);
  }

  private readSection(sections: Map<string, SectionSyntax>, name: string, ctx: ReadContext): void {
    const section = sections.get(name.toLowerCase());
    if (!section) throw new StateError(`Section "${name}" not found`, name);
    for (const stmt of section.statements) this.readStatement(stmt, ctx);
  }

  private readStatement(stmt: StatementSyntax, ctx: ReadContext): void {
    switch (stmt.kind) {
      case "section":
        if (!ctx.flattenSections) {
          throw new NdlSyntaxError(
            atLine(stmt.line, `Section "${stmt.key}" is only allowed at file level`),
            stmt.key,
          );
        }
        for (const inner of stmt.statements) this.readStatement(inner, PLAIN);
        return;
      case "macro":
        this.defineMacro(stmt);
        return;
      case "call":
        this.addStatement(this.readCall(stmt.call), stmt.line);
        return;
      case "assign":
        this.readAssignment(stmt.key, stmt.value, stmt.line, ctx.globalConstants);
        return;
      default: {
        const unreachable: never = stmt;
        throw new NdlSyntaxError(`Unknown statement ${JSON.stringify(unreachable)}`);
      }
    }
  }

  private readAssignment(key: string, value: ValueSyntax, line: number, globalConstants: boolean): void {
    this.checkKey(key, line);
    switch (value.kind) {
      case "call": {
        const node = this.readCall(value);
        node.name = key;
        this.addStatement(node, line);
        return;
      }
      case "number":
      case "string": {
        const target = globalConstants ? this.registry.global : this;
        target.addStatement(target.createConstant(key, value.text, line), line);
        return;
      }
      case "ref":
        this.addStatement(this.createVariable(key, value.name, line), line);
        return;
      case "array": {
        const node = this.createArray(key, line);
        for (const item of value.items) node.params.push(this.readValue(item));
        this.addStatement(node, line);
        return;
      }
    }
  }

  /** `name(formals) = body`, registered in the global script */
  private defineMacro(stmt: MacroSyntax): void {
    const { name, formals, line } = stmt;
    if (!this.allowDefinitions) {
      throw new NdlSyntaxError(atLine(line, `Macro definitions are not allowed here: "${name}"`), name);
    }
    if (!SYMBOL_NAME.test(name)) {
      throw new NdlSyntaxError(atLine(line, `Invalid macro name "${name}"`), name);
    }
    if (this.isDefined(name)) {
      throw new SymbolError(atLine(line, `Function "${name}" already defined`), name);
    }

    const global = this.registry.global;
    const body = new Script(this.registry, { allowDefinitions: stmt.body.kind === "block" });
    const macro = global.adopt(
      (id): MacroNode => ({ kind: "macro", ...global.fields(id, name, name, line), formals, body }),
    );
    global.symbols.add(name, macro, line);

    try {
      for (const formal of formals) {
        const param = body.adopt(
          (id): ParameterNode => ({ kind: "parameter", ...body.fields(id, formal, formal, line) }),
        );
        body.symbols.add(formal, param, line);
        macro.params.push(param);
      }
      if (stmt.body.kind === "block") {
        body.readStatements(stmt.body.statements);
      } else {
        const value = stmt.body.value;
        const node =
          value.kind === "ref" ? body.createVariable("", value.name, line) : body.readValue(value);
        body.addStatement(node, line);
      }
    } catch (err) {
      // leave no half-defined macro behind
      global.symbols.delete(name);
      throw err;
    }
  }

  /** A call becomes a fresh, nameless function or macro-call node */
  private readCall(call: CallSyntax): FunctionNode | MacroCallNode {
    if (this.symbols.has(call.name)) {
      throw new SymbolError(atLine(call.line, `"${call.name}" is not a function or macro`), call.name);
    }
    const callee = this.checkName(call.name, false, call.line);
    if (!callee) {
      throw new SymbolError(atLine(call.line, `Undefined function or macro "${call.name}"`), call.name);
    }
    if (callee.kind !== "function" && callee.kind !== "macroCall") {
      throw new SymbolError(atLine(call.line, `"${call.name}" is not a function or macro`), call.name);
    }
    const formals = callee.kind === "macroCall" ? callee.formals : [];
    for (const arg of call.args) callee.params.push(this.readArgument(arg, formals, call.line));
    this.checkArity(callee, call.line);
    return callee;
  }

  /**
   * `name=value` arguments keep their raw text. Unless the name binds a macro
   * formal, an unknown name in the value is taken literally (`init=uniform`).
   */
  private readArgument(arg: ArgSyntax, formals: readonly string[], line: number): NdlNode {
    const argName = arg.name;
    if (argName === undefined) return this.readValue(arg.value);

    const lower = argName.toLowerCase();
    const bindsFormal = formals.some((f) => f.toLowerCase() === lower);
    const node = this.adopt(
      (id): OptionalParameterNode => ({
        kind: "optionalParameter",
        ...this.fields(id, argName, renderValue(arg.value), line),
      }),
    );
    node.params.push(this.readValue(arg.value, !bindsFormal));
    return node;
  }

  private readValue(value: ValueSyntax, literalNames = false): NdlNode {
    switch (value.kind) {
      case "number":
      case "string":
        return this.createConstant("", value.text, value.line);
      case "call":
        return this.readCall(value);
      case "array": {
        const node = this.createArray("", value.line);
        for (const item of value.items) node.params.push(this.readValue(item, literalNames));
        return node;
      }
      case "ref":
        return this.readReference(value.name, value.line, literalNames);
    }
  }

  /**
   * A name in a parameter list. Unknown names become placeholders in the
   * symbol table, resolved in a later pass once the name is defined.
   */
  private readReference(name: string, line: number, literal: boolean): NdlNode {
    const local = this.findSymbol(name);
    if (local) return local;
    const found = this.checkName(name, false, line);
    if (found) {
      if (found.kind === "function" || found.kind === "macroCall") this.checkArity(found, line);
      return found;
    }
    if (literal) return this.createConstant("", name, line);

    const placeholder = name.includes(".")
      ? this.adopt(
          (id): DotParameterNode => ({ kind: "dotParameter", ...this.fields(id, name, name, line) }),
        )
      : this.adopt(
          (id): UndeterminedNode => ({ kind: "undetermined", ...this.fields(id, name, name, line) }),
        );
    this.symbols.add(name, placeholder, line);
    return placeholder;
  }

  private checkArity(node: FunctionNode | MacroCallNode, line: number): void {
    if (node.kind === "macroCall") {
      bindArguments(node);
      return;
    }
    const count = positionalParams(node).length;
    const [min, max] = arityRange(node.fn);
    if (count < min || count > max) {
      const expected = min === max ? `${min}` : `${min}-${max}`;
      throw new ArityError(
        atLine(line, `Parameter mismatch, ${count} parameters provided, ${expected} expected in call to ${node.fn.name}`),
        expected,
        count,
        node.fn.name,
      );
    }
  }

  /** Statement keys must be plain names that are not also function names */
  private checkKey(key: string, line: number): void {
    if (!SYMBOL_NAME.test(key)) {
      throw new NdlSyntaxError(atLine(line, `Invalid symbol name "${key}"`), key);
    }
    if (findFunction(key)) {
      throw new SymbolError(
        atLine(line, `Variable "${key}" is reserved because it is also the name of a function`),
        key,
      );
    }
  }

  private addStatement(node: NdlNode, line: number): void {
    this.symbols.add(node.name, node, line);
    this.statementList.push(node);
    this.statementSet.add(node);
  }

  // ── Name resolution ──────────────────────────────────────────────────────

  /**
   * Resolve a name: local scope, then the global scope (a macro comes back
   * wrapped in a fresh macro-call node), then the built-in functions.
   */
  checkName(name: string, localOnly = false, line?: number): NdlNode | undefined {
    const local = this.findSymbol(name);
    if (local) return local;

    if (!localOnly) {
      const global = this.registry.global.findSymbol(name);
      if (global) {
        if (global.kind !== "macro") return global;
        return this.adopt(
          (id): MacroCallNode => ({
            kind: "macroCall",
            ...this.fields(id, "", global.name, line),
            macro: global,
            formals: global.formals,
            body: global.body,
          }),
        );
      }
    }

    const fn = findFunction(name);
    if (fn) {
      return this.adopt(
        (id): FunctionNode => ({ kind: "function", ...this.fields(id, "", fn.name, line), fn }),
      );
    }
    return undefined;
  }

  /**
   * Look a symbol up in this script. With `dotted`, `a.b.c` walks into the
   * body of the macro call named `a`.
   */
  findSymbol(name: string, dotted = false): NdlNode | undefined {
    if (!dotted) return this.symbols.get(name);

    const dot = name.indexOf(".");
    if (dot === -1) return this.symbols.get(name);
    const head = name.slice(0, dot);
    const found = this.symbols.get(head);
    if (!found) return undefined;
    if (found.kind === "macroCall") return found.body.findSymbol(name.slice(dot + 1), true);
    if (found.kind === "macro") {
      throw new SymbolError(`Symbol name not valid, ${head} is not a macro call, so ${name} cannot be interpreted`, name);
    }
    // a variable or parameter with further dotted parts
    return found;
  }

  /** This script's symbols, then the global script's */
  findNode(name: string): NdlNode | undefined {
    return this.findSymbol(name, true) ?? this.registry.global.findSymbol(name, true);
  }

  private isDefined(name: string): boolean {
    return (
      this.findSymbol(name) !== undefined ||
      this.registry.global.findSymbol(name) !== undefined ||
      findFunction(name) !== undefined
    );
  }

  // ── Evaluation ───────────────────────────────────────────────────────────

  /**
   * Evaluate the statements in declaration order. Macro calls are expanded,
   * everything else goes to the evaluator. With `skipThrough`, every
   * statement up to and including that node is skipped.
   *
   * @returns the last node evaluated (or `skipThrough` when nothing new ran)
   */
  evaluate<H>(
    evaluator: NodeEvaluator<H>,
    baseName: string,
    pass: Pass,
    skipThrough?: NdlNode,
  ): NdlNode | undefined {
    let last = skipThrough;
    let skipping = skipThrough !== undefined;
    const previousBase = this.baseName;
    this.baseName = baseName;
    try {
      for (const node of this.statementList) {
        if (skipping) {
          if (node === skipThrough) skipping = false;
          continue;
        }
        if (node.kind === "macroCall") {
          expandMacro(node, evaluator, baseName, pass);
          evaluator.processOptionalParameters(node);
        } else {
          evaluator.evaluate(node, baseName, pass);
        }
        last = node;
      }
    } finally {
      this.baseName = previousBase;
    }
    return last;
  }

  /** Drop every statement, symbol and owned node */
  release(): void {
    this.arena.length = 0;
    this.statementList.length = 0;
    this.statementSet.clear();
    this.symbols.clear();
  }

  // ── Node creation ────────────────────────────────────────────────────────

  private fields(id: number, name: string, value: string, line: number | undefined): NodeFields {
    return { id, name: name || this.registry.nextName(), value, params: [], owner: this, line };
  }

  private adopt<N extends NdlNode>(build: (id: number) => N): N {
    const node = build(this.arena.length);
    this.arena.push(node);
    return node;
  }

  private createConstant(name: string, text: string, line: number): ConstantNode {
    return this.adopt((id): ConstantNode => ({ kind: "constant", ...this.fields(id, name, text, line) }));
  }

  private createVariable(name: string, target: string, line: number): VariableNode {
    return this.adopt((id): VariableNode => ({ kind: "variable", ...this.fields(id, name, target, line) }));
  }

  private createArray(name: string, line: number): ArrayNode {
    return this.adopt((id): ArrayNode => ({ kind: "array", ...this.fields(id, name, "", line) }));
  }
}

// ── File-level helpers ─────────────────────────────────────────────────────

function collectSections(statements: readonly StatementSyntax[]): Map<string, SectionSyntax> {
  const sections = new Map<string, SectionSyntax>();
  for (const stmt of statements) {
    if (stmt.kind === "section") sections.set(stmt.key.toLowerCase(), stmt);
  }
  return sections;
}

/** Section names listed by a `load` or `run` key: `load = a` or `run = a:b` */
function directive(statements: readonly StatementSyntax[], key: "load" | "run"): string[] | undefined {
  const stmt = statements.find(
    (s): s is Extract<StatementSyntax, { kind: "assign" }> =>
      s.kind === "assign" && s.key.toLowerCase() === key,
  );
  if (!stmt) return undefined;
  const items = stmt.value.kind === "array" ? stmt.value.items : [stmt.value];
  return items.map((item) => {
    if (item.kind === "ref") return item.name;
    if (item.kind === "string") return item.text;
    throw new NdlSyntaxError(atLine(stmt.line, `"${key}" must name sections`), key);
  });
}
