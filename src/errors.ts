/**
 * Error taxonomy for NDL parsing/evaluation and MEL editing.
 *
 * Every error is raised synchronously where it is detected and propagates
 * through parse → expand → evaluate → command. `token` names the offending
 * symbol or command token when there is one.
 */
export class NdlkitError extends Error {
  readonly token: string | undefined;

  constructor(message: string, token?: string) {
    super(message);
    this.name = new.target.name;
    this.token = token;
  }
}

/** Malformed statement: lexing/grammar failure, missing delimiter, unbalanced braces. */
export class NdlSyntaxError extends NdlkitError {}

/** Undefined, reserved or redefined symbol. */
export class SymbolError extends NdlkitError {}

/** Macro, function or command called with too few/many parameters. */
export class ArityError extends NdlkitError {
  constructor(
    message: string,
    readonly expected: string,
    readonly actual: number,
    token?: string,
  ) {
    super(message, token);
  }
}

/** Operands of one command live in different networks. */
export class ReferenceScopeError extends NdlkitError {}

/** Missing model or node, no default model, unknown command. */
export class StateError extends NdlkitError {}

/** Macro expansion nested deeper than the configured limit. */
export class MacroDepthError extends NdlkitError {
  constructor(
    message: string,
    readonly chain: readonly string[],
  ) {
    super(message, chain[chain.length - 1]);
  }
}

/** A serialized model could not be read. */
export class ModelFormatError extends NdlkitError {}

/** Prefix a message with its 1-based source line, when known. */
export function atLine(line: number | undefined, message: string): string {
  return line ? `Line ${line}: ${message}` : message;
}
