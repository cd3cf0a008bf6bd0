import { readFileSync, writeFileSync } from "node:fs";
import { StateError } from "./errors.js";
import { CUSTOM_SEPARATORS } from "./parser/lexer.js";

/**
 * Structured logger interface for engine events.
 * Accepts any compatible logger: pino, winston, bunyan, `console`, etc.
 * All methods default to silent no-ops when no logger is provided.
 */
export interface Logger {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
}

/** Synchronous file access used by LoadModel, SaveModel, Dump* and LoadNDLSnippet. */
export interface FileAccess {
  readText(path: string): string;
  writeText(path: string, text: string): void;
}

export type NdlkitOptions = {
  /**
   * Structured logger for engine-level events (command completion, failures,
   * replaced models). Defaults to silent no-ops.
   */
  logger?: Logger;
  /** Statement separator besides newlines. Defaults to `;`. */
  separator?: string;
  /** Maximum nesting of macro expansions before MacroDepthError. Defaults to 64. */
  maxMacroDepth?: number;
  /** File access for model and snippet files. Defaults to the local filesystem. */
  files?: FileAccess;
};

export type ResolvedOptions = Required<NdlkitOptions>;

const noop = () => {};
export const defaultLogger: Logger = { debug: noop, info: noop, warn: noop, error: noop };

export const nodeFiles: FileAccess = {
  readText: (path) => readFileSync(path, "utf8"),
  writeText: (path, text) => writeFileSync(path, text, "utf8"),
};

export const DEFAULT_SEPARATOR = ";";
export const DEFAULT_MAX_MACRO_DEPTH = 64;

export function resolveOptions(options?: NdlkitOptions): ResolvedOptions {
  const separator = options?.separator ?? DEFAULT_SEPARATOR;
  if (separator !== ";" && (separator.length !== 1 || !CUSTOM_SEPARATORS.includes(separator))) {
    throw new StateError(
      `Invalid separator "${separator}": expected ";" or one of ${CUSTOM_SEPARATORS}`,
      separator,
    );
  }
  const maxMacroDepth = options?.maxMacroDepth ?? DEFAULT_MAX_MACRO_DEPTH;
  if (!Number.isInteger(maxMacroDepth) || maxMacroDepth < 1) {
    throw new StateError(`Invalid maxMacroDepth ${maxMacroDepth}: expected a positive integer`);
  }
  return {
    logger: options?.logger ?? defaultLogger,
    separator,
    maxMacroDepth,
    files: options?.files ?? nodeFiles,
  };
}
