import { MacroDepthError, StateError } from "../errors.js";
import { DEFAULT_MAX_MACRO_DEPTH, DEFAULT_SEPARATOR } from "../options.js";
import { Script } from "./Script.js";

export type MacroRegistryOptions = {
  /** Maximum nesting of macro expansions. Defaults to 64. */
  maxMacroDepth?: number;
  /** Statement separator for scripts created against this registry */
  separator?: string;
};

/**
 * Global scope shared by every script created against it: macro definitions,
 * library constants, the generated-name counter and the expansion depth
 * guard. One registry per editor (or per test).
 */
export class MacroRegistry {
  /** Holds macros and load-section constants for the registry's lifetime */
  readonly global: Script;
  readonly maxMacroDepth: number;
  readonly separator: string;

  private nameCounter = 0;
  private readonly active: string[] = [];

  constructor(options: MacroRegistryOptions = {}) {
    this.maxMacroDepth = options.maxMacroDepth ?? DEFAULT_MAX_MACRO_DEPTH;
    this.separator = options.separator ?? DEFAULT_SEPARATOR;
    this.global = new Script(this);
  }

  /** Next generated node name: unnamed1, unnamed2, ... */
  nextName(): string {
    this.nameCounter += 1;
    return `unnamed${this.nameCounter}`;
  }

  /** Enter a macro expansion; throws past the depth limit */
  enter(macroName: string): void {
    if (this.active.length >= this.maxMacroDepth) {
      const chain = [...this.active, macroName];
      throw new MacroDepthError(
        `Macro expansion deeper than ${this.maxMacroDepth}: ${chain.slice(-4).join(" -> ")}`,
        chain,
      );
    }
    this.active.push(macroName);
  }

  exit(): void {
    if (this.active.pop() === undefined) {
      throw new StateError("Macro expansion stack underflow");
    }
  }

  /** Names of the expansions in progress, outermost first */
  get chain(): readonly string[] {
    return this.active;
  }
}
