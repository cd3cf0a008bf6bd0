/**
 * Syntax tree produced by the parser, shared by NDL and MEL.
 *
 * The tree is purely syntactic: names are not resolved and no symbol table
 * is touched. `Script` (NDL) and `ModelEditor` (MEL) give it meaning.
 */

/** A value on the right of `=` or inside a call's parentheses */
export type ValueSyntax =
  | { kind: "number"; text: string; line: number }
  | { kind: "string"; text: string; line: number }
  /** Bare (possibly dotted or wildcarded) name: `x`, `L1.W`, `m1.*` */
  | { kind: "ref"; name: string; line: number }
  | CallSyntax
  /** Colon-joined list: `256:512`, `macros:network` */
  | { kind: "array"; items: ValueSyntax[]; line: number };

/** `name(arg, ...)` */
export type CallSyntax = {
  kind: "call";
  name: string;
  args: ArgSyntax[];
  line: number;
};

/**
 * A call argument. `name` is set for `name=value` arguments (optional
 * parameters in NDL, named options in MEL).
 */
export type ArgSyntax = {
  name?: string;
  value: ValueSyntax;
};

export type StatementSyntax =
  /** `key = value` */
  | { kind: "assign"; key: string; value: ValueSyntax; line: number }
  /** `key = [ ... ]`: a named section (file level only) */
  | { kind: "section"; key: string; statements: StatementSyntax[]; line: number }
  /** bare `name(args)` */
  | { kind: "call"; call: CallSyntax; line: number }
  /** `name(formals) = [ ... ]` or one-line `name(formals) = value` */
  | {
      kind: "macro";
      name: string;
      formals: string[];
      body: MacroBodySyntax;
      line: number;
    };

export type MacroBodySyntax =
  | { kind: "block"; statements: StatementSyntax[] }
  | { kind: "inline"; value: ValueSyntax };
