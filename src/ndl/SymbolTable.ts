import { SymbolError, atLine } from "../errors.js";
import type { NdlNode } from "./types.js";

/** Case-insensitive name → node map. One per script. */
export class SymbolTable {
  private readonly symbols = new Map<string, NdlNode>();

  /**
   * Add a symbol. Redefining a name is an error unless the existing entry
   * is a forward-reference placeholder.
   */
  add(symbol: string, node: NdlNode, line?: number): void {
    const key = symbol.toLowerCase();
    const found = this.symbols.get(key);
    if (found && found.kind !== "undetermined") {
      throw new SymbolError(
        atLine(
          line,
          `Symbol "${symbol}" currently assigned to "${found.value}", reassigning to a different value not allowed`,
        ),
        symbol,
      );
    }
    this.symbols.set(key, node);
  }

  /** Rebind an existing symbol (macro parameter binding) */
  assign(symbol: string, node: NdlNode): void {
    const key = symbol.toLowerCase();
    if (!this.symbols.has(key)) {
      throw new SymbolError(`Symbol "${symbol}" does not exist and cannot be assigned`, symbol);
    }
    this.symbols.set(key, node);
  }

  get(symbol: string): NdlNode | undefined {
    return this.symbols.get(symbol.toLowerCase());
  }

  has(symbol: string): boolean {
    return this.symbols.has(symbol.toLowerCase());
  }

  delete(symbol: string): boolean {
    return this.symbols.delete(symbol.toLowerCase());
  }

  clear(): void {
    this.symbols.clear();
  }
}
