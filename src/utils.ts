/**
 * Shared name-matching utilities for NDL and MEL.
 */
import { NdlSyntaxError } from "./errors.js";

/**
 * Case-insensitive prefix match of `token` against `full`.
 * The token must cover at least half of the candidate (integer half, so a
 * 9-letter name accepts 4-letter prefixes).
 */
function prefixMatches(token: string, full: string): boolean {
  if (token.length > full.length) return false;
  if (token.length < Math.floor(full.length / 2)) return false;
  return full.toLowerCase().startsWith(token.toLowerCase());
}

/**
 * Match a (possibly abbreviated) token against a canonical name, falling back
 * to an alternate spelling. Returns the canonical name on a match.
 *
 * e.g. matchName("dump", "DumpModel") → "DumpModel"; matchName("Du", "DumpModel") → undefined
 */
export function matchName(token: string, full: string, alternate?: string): string | undefined {
  if (token.length === 0) return undefined;
  if (prefixMatches(token, full)) return full;
  if (alternate !== undefined && prefixMatches(token, alternate)) return full;
  return undefined;
}

/** Entry of a name vocabulary (built-in functions, MEL commands, properties) */
export interface NamedEntry {
  readonly name: string;
  readonly alias?: string;
}

/**
 * Look a token up in an ordered vocabulary. An exact (case-insensitive) name
 * or alias wins; otherwise the first entry in vocabulary order whose prefix
 * rule accepts the token.
 */
export function lookupName<T extends NamedEntry>(token: string, entries: readonly T[]): T | undefined {
  const lower = token.toLowerCase();
  const exact = entries.find(
    (e) => e.name.toLowerCase() === lower || e.alias?.toLowerCase() === lower,
  );
  if (exact) return exact;
  return entries.find((e) => matchName(token, e.name, e.alias) !== undefined);
}

/** Join a dotted base name and a local name: ("L1", "W") → "L1.W", ("", "W") → "W" */
export function qualify(baseName: string, name: string): string {
  return baseName ? `${baseName}.${name}` : name;
}

/** Split "a.b.c" into its first segment and the remainder ("a", "b.c") */
export function splitFirst(name: string): [string, string | undefined] {
  const dot = name.indexOf(".");
  if (dot === -1) return [name, undefined];
  return [name.slice(0, dot), name.slice(dot + 1)];
}

// ── Wildcards ──────────────────────────────────────────────────────────────

export function hasWildcard(pattern: string): boolean {
  return pattern.includes("*");
}

/**
 * Match a name against a pattern with at most one `*`.
 * Returns the text captured by the wildcard ("" when the pattern is literal),
 * or undefined when the name does not match.
 */
export function matchWildcard(pattern: string, name: string): string | undefined {
  const star = pattern.indexOf("*");
  if (star === -1) return pattern === name ? "" : undefined;
  const head = pattern.slice(0, star);
  const tail = pattern.slice(star + 1);
  if (tail.includes("*")) {
    throw new NdlSyntaxError(`Pattern "${pattern}" has more than one wildcard`, pattern);
  }
  if (name.length < head.length + tail.length) return undefined;
  if (!name.startsWith(head) || !name.endsWith(tail)) return undefined;
  return name.slice(head.length, name.length - tail.length);
}

/** Substitute a wildcard capture into a target pattern ("pfx_*", "W") → "pfx_W" */
export function substituteWildcard(pattern: string, capture: string): string {
  return pattern.replace("*", capture);
}

// ── Flags ──────────────────────────────────────────────────────────────────

const TRUE_WORDS = new Set(["true", "1", "yes"]);
const FALSE_WORDS = new Set(["false", "0", "no"]);

/** Parse true/false/1/0/yes/no (case-insensitive); undefined for anything else */
export function parseBoolean(text: string): boolean | undefined {
  const lower = text.trim().toLowerCase();
  if (TRUE_WORDS.has(lower)) return true;
  if (FALSE_WORDS.has(lower)) return false;
  return undefined;
}
