/**
 * Chevrotain CstParser + imperative CST→syntax visitor for NDL and MEL.
 *
 * Both languages share one statement grammar; the visitor produces the
 * purely syntactic `StatementSyntax[]` that `Script` (NDL) and `ModelEditor`
 * (MEL) interpret.
 */
import { CstParser, type CstElement, type CstNode, type IToken } from "chevrotain";
import {
  allTokens,
  Colon,
  Comma,
  Dot,
  Equals,
  Identifier,
  LCurly,
  LParen,
  LSquare,
  Newline,
  NdlLexer,
  NumberLiteral,
  OtherPunct,
  RCurly,
  RParen,
  RSquare,
  Semicolon,
  StringLiteral,
} from "./lexer.js";
import { NdlSyntaxError, atLine } from "../errors.js";
import type {
  ArgSyntax,
  CallSyntax,
  MacroBodySyntax,
  StatementSyntax,
  ValueSyntax,
} from "../types.js";

// ═══════════════════════════════════════════════════════════════════════════
//  Grammar (CstParser)
// ═══════════════════════════════════════════════════════════════════════════

class NdlParser extends CstParser {
  /** Statement separator besides newlines. Set before each parse. */
  separatorChar = ";";

  constructor() {
    super(allTokens, { maxLookahead: 3 });
    this.performSelfAnalysis();
  }

  // ── Top-level ──────────────────────────────────────────────────────────

  public program = this.RULE("program", () => {
    this.SUBRULE(this.statementList);
  });

  /**
   * Statements separated by one or more delimiters. Two statements with no
   * delimiter between them leave input unconsumed, which is reported as a
   * syntax error by the caller.
   */
  public statementList = this.RULE("statementList", () => {
    this.MANY(() => this.SUBRULE(this.delimiter));
    this.OPTION(() => {
      this.SUBRULE(this.statement);
      this.MANY2(() => {
        this.AT_LEAST_ONE(() => this.SUBRULE2(this.delimiter));
        this.OPTION2(() => this.SUBRULE2(this.statement));
      });
    });
  });

  /** Newline, or the configured separator (`;` by default) */
  public delimiter = this.RULE("delimiter", () => {
    this.OR([
      { ALT: () => this.CONSUME(Newline) },
      {
        GATE: () => this.separatorChar === ";",
        ALT: () => this.CONSUME(Semicolon),
      },
      {
        GATE: () => this.LA(1).image === this.separatorChar,
        ALT: () => this.CONSUME(OtherPunct),
      },
    ]);
  });

  /**
   * A statement.
   *
   * Ambiguity fix: `key = value`, `name(args)` and `name(formals) = body`
   * share the prefix `dottedName`, so they are merged into one rule that
   * parses the name then branches on `=` vs `(`. Whether a call is a macro
   * definition is decided by the trailing `= body`.
   */
  public statement = this.RULE("statement", () => {
    this.SUBRULE(this.dottedName, { LABEL: "head" });
    this.OR([
      {
        ALT: () => {
          this.CONSUME(Equals, { LABEL: "assignOp" });
          this.MANY(() => this.CONSUME(Newline));
          this.SUBRULE(this.rhs, { LABEL: "assignValue" });
        },
      },
      {
        ALT: () => {
          this.SUBRULE(this.callArgs, { LABEL: "args" });
          this.OPTION(() => {
            this.CONSUME2(Equals, { LABEL: "defineOp" });
            this.MANY2(() => this.CONSUME2(Newline));
            this.SUBRULE2(this.rhs, { LABEL: "body" });
          });
        },
      },
    ]);
  });

  /** Right-hand side: a bracketed block or a value */
  public rhs = this.RULE("rhs", () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.block) },
      { ALT: () => this.SUBRULE(this.value) },
    ]);
  });

  /** [ statements ] | { statements } */
  public block = this.RULE("block", () => {
    this.OR([
      {
        ALT: () => {
          this.CONSUME(LSquare);
          this.SUBRULE(this.statementList);
          this.CONSUME(RSquare);
        },
      },
      {
        ALT: () => {
          this.CONSUME(LCurly);
          this.SUBRULE2(this.statementList);
          this.CONSUME(RCurly);
        },
      },
    ]);
  });

  // ── Values ─────────────────────────────────────────────────────────────

  /** atom (":" atom)*: more than one atom is an array */
  public value = this.RULE("value", () => {
    this.SUBRULE(this.atom);
    this.MANY(() => {
      this.CONSUME(Colon);
      this.SUBRULE2(this.atom);
    });
  });

  public atom = this.RULE("atom", () => {
    this.OR([
      { ALT: () => this.CONSUME(StringLiteral) },
      { ALT: () => this.CONSUME(NumberLiteral) },
      {
        ALT: () => {
          this.SUBRULE(this.dottedName);
          this.OPTION(() => this.SUBRULE(this.callArgs));
        },
      },
    ]);
  });

  /** ( arg, ... ): newlines are allowed anywhere inside the parentheses */
  public callArgs = this.RULE("callArgs", () => {
    this.CONSUME(LParen);
    this.MANY(() => this.CONSUME(Newline));
    this.OPTION(() => {
      this.SUBRULE(this.arg);
      this.MANY2(() => this.CONSUME2(Newline));
      this.MANY3(() => {
        this.CONSUME(Comma);
        this.MANY4(() => this.CONSUME3(Newline));
        this.SUBRULE2(this.arg);
        this.MANY5(() => this.CONSUME4(Newline));
      });
    });
    this.CONSUME(RParen);
  });

  /** name=value | value */
  public arg = this.RULE("arg", () => {
    this.OR([
      {
        ALT: () => {
          this.CONSUME(Identifier, { LABEL: "argName" });
          this.CONSUME(Equals);
          this.SUBRULE(this.value, { LABEL: "namedValue" });
        },
      },
      { ALT: () => this.SUBRULE2(this.value, { LABEL: "positional" }) },
    ]);
  });

  /** Dotted name: identifier segments separated by dots */
  public dottedName = this.RULE("dottedName", () => {
    this.CONSUME(Identifier, { LABEL: "first" });
    this.MANY(() => {
      this.CONSUME(Dot);
      this.CONSUME2(Identifier, { LABEL: "rest" });
    });
  });
}

// one parser instance, reset per call
const parserInstance = new NdlParser();

// ═══════════════════════════════════════════════════════════════════════════
//  Public API
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Parse NDL/MEL text into statements.
 *
 * @param separator - statement separator besides newlines (`;` by default)
 */
export function parseStatements(text: string, separator = ";"): StatementSyntax[] {
  // 1. Lex
  const lexResult = NdlLexer.tokenize(text);
  if (lexResult.errors.length > 0) {
    const e = lexResult.errors[0];
    const ch = text.charAt(e.offset);
    throw new NdlSyntaxError(atLine(e.line, `Unexpected character "${ch}"`), ch);
  }

  // 2. Parse
  parserInstance.separatorChar = separator;
  parserInstance.input = lexResult.tokens;
  const cst = parserInstance.program();
  if (parserInstance.errors.length > 0) {
    const e = parserInstance.errors[0];
    const tokens = lexResult.tokens;
    const lineNum = Number.isFinite(e.token.startLine)
      ? e.token.startLine
      : tokens[tokens.length - 1]?.endLine;
    throw new NdlSyntaxError(atLine(lineNum, e.message), e.token.image || undefined);
  }

  // 3. Visit → syntax tree
  return buildStatementList(need(cst, "statementList"));
}

// ═══════════════════════════════════════════════════════════════════════════
//  CST → syntax transformation (imperative visitor)
// ═══════════════════════════════════════════════════════════════════════════

// ── Token / CST node helpers ────────────────────────────────────────────

function isToken(el: CstElement): el is IToken {
  return "image" in el;
}

function subs(node: CstNode, ruleName: string): CstNode[] {
  return (node.children[ruleName] ?? []).filter((el): el is CstNode => !isToken(el));
}

function sub(node: CstNode, ruleName: string): CstNode | undefined {
  return subs(node, ruleName)[0];
}

/** A sub-rule the grammar guarantees once parsing succeeded */
function need(node: CstNode, ruleName: string): CstNode {
  const found = sub(node, ruleName);
  if (!found) throw new NdlSyntaxError(`Malformed ${node.name}: missing ${ruleName}`);
  return found;
}

function toks(node: CstNode, tokenName: string): IToken[] {
  return (node.children[tokenName] ?? []).filter(isToken);
}

function tok(node: CstNode, tokenName: string): IToken | undefined {
  return toks(node, tokenName)[0];
}

function unquote(image: string): string {
  return image.slice(1, -1).replace(/\\(.)/g, "$1");
}

/* ── extractDottedName: reassemble from dottedName CST node ── */
function extractDottedName(node: CstNode): { name: string; line: number } {
  const first = tok(node, "first");
  if (!first) throw new NdlSyntaxError("Malformed name");
  const rest = toks(node, "rest").map((t) => t.image);
  return { name: [first.image, ...rest].join("."), line: first.startLine ?? 0 };
}

// ── Statements ──────────────────────────────────────────────────────────

function buildStatementList(node: CstNode): StatementSyntax[] {
  return subs(node, "statement").map(buildStatement);
}

function buildBlock(node: CstNode): StatementSyntax[] {
  return buildStatementList(need(node, "statementList"));
}

function buildStatement(node: CstNode): StatementSyntax {
  const { name, line } = extractDottedName(need(node, "head"));

  if (tok(node, "assignOp")) {
    const rhs = need(node, "assignValue");
    const block = sub(rhs, "block");
    if (block) {
      return { kind: "section", key: name, statements: buildBlock(block), line };
    }
    return { kind: "assign", key: name, value: buildValue(need(rhs, "value")), line };
  }

  const call: CallSyntax = { kind: "call", name, args: buildArgs(need(node, "args")), line };
  const bodyNode = sub(node, "body");
  if (!bodyNode) return { kind: "call", call, line };

  // name(formals) = body → macro definition
  const formals = call.args.map((arg) => {
    if (arg.name !== undefined || arg.value.kind !== "ref" || arg.value.name.includes(".")) {
      throw new NdlSyntaxError(
        atLine(line, `Invalid macro definition "${name}": formal parameters must be plain names`),
        name,
      );
    }
    return arg.value.name;
  });
  const block = sub(bodyNode, "block");
  const body: MacroBodySyntax = block
    ? { kind: "block", statements: buildBlock(block) }
    : { kind: "inline", value: buildValue(need(bodyNode, "value")) };
  return { kind: "macro", name, formals, body, line };
}

// ── Values ──────────────────────────────────────────────────────────────

function buildValue(node: CstNode): ValueSyntax {
  const atoms = subs(node, "atom").map(buildAtom);
  if (atoms.length === 0) throw new NdlSyntaxError("Malformed value");
  if (atoms.length === 1) return atoms[0];
  return { kind: "array", items: atoms, line: atoms[0].line };
}

function buildAtom(node: CstNode): ValueSyntax {
  const str = tok(node, "StringLiteral");
  if (str) return { kind: "string", text: unquote(str.image), line: str.startLine ?? 0 };
  const num = tok(node, "NumberLiteral");
  if (num) return { kind: "number", text: num.image, line: num.startLine ?? 0 };

  const { name, line } = extractDottedName(need(node, "dottedName"));
  const args = sub(node, "callArgs");
  if (args) return { kind: "call", name, args: buildArgs(args), line };
  return { kind: "ref", name, line };
}

function buildArgs(node: CstNode): ArgSyntax[] {
  return subs(node, "arg").map((arg) => {
    const argName = tok(arg, "argName");
    const named = sub(arg, "namedValue");
    if (argName && named) return { name: argName.image, value: buildValue(named) };
    return { value: buildValue(need(arg, "positional")) };
  });
}

// ── Rendering ───────────────────────────────────────────────────────────

/** Render a value back to source text (MEL arguments, error messages) */
export function renderValue(value: ValueSyntax): string {
  switch (value.kind) {
    case "number":
    case "ref":
      return value.kind === "ref" ? value.name : value.text;
    case "string":
      return value.text;
    case "array":
      return value.items.map(renderValue).join(":");
    case "call":
      return `${value.name}(${value.args.map(renderArg).join(", ")})`;
  }
}

export function renderArg(arg: ArgSyntax): string {
  return arg.name !== undefined ? `${arg.name}=${renderValue(arg.value)}` : renderValue(arg.value);
}
