/**
 * Chevrotain Lexer for NDL and MEL.
 *
 * Both languages share one token vocabulary. Newlines are significant (they
 * end statements); spaces, tabs and `#` comments are skipped.
 */
import { createToken, Lexer } from "chevrotain";

/** Punctuation that may be configured as the statement separator besides `;` */
export const CUSTOM_SEPARATORS = "|!@$%^&?~/\\<>'`";

// ── Whitespace & comments ──────────────────────────────────────────────────

export const Newline = createToken({
  name: "Newline",
  pattern: /\r?\n/,
  line_breaks: true,
});

export const WS = createToken({
  name: "WS",
  pattern: /[ \t]+/,
  group: Lexer.SKIPPED,
});

export const Comment = createToken({
  name: "Comment",
  pattern: /#[^\r\n]*/,
  group: Lexer.SKIPPED,
});

// ── Names & literals ───────────────────────────────────────────────────────

/** Identifier segment; `*` is a wildcard in MEL node patterns */
export const Identifier = createToken({
  name: "Identifier",
  pattern: /[A-Za-z_*][\w*]*/,
});

export const StringLiteral = createToken({
  name: "StringLiteral",
  pattern: /"(?:[^"\\\r\n]|\\.)*"/,
});

export const NumberLiteral = createToken({
  name: "NumberLiteral",
  pattern: /[+-]?\d+(?:\.\d+)?(?:[eE][+-]?\d+)?/,
});

// ── Operators & punctuation ────────────────────────────────────────────────

export const Equals    = createToken({ name: "Equals",    pattern: /=/ });
export const LParen    = createToken({ name: "LParen",    pattern: /\(/ });
export const RParen    = createToken({ name: "RParen",    pattern: /\)/ });
export const LSquare   = createToken({ name: "LSquare",   pattern: /\[/ });
export const RSquare   = createToken({ name: "RSquare",   pattern: /\]/ });
export const LCurly    = createToken({ name: "LCurly",    pattern: /\{/ });
export const RCurly    = createToken({ name: "RCurly",    pattern: /\}/ });
export const Comma     = createToken({ name: "Comma",     pattern: /,/ });
export const Colon     = createToken({ name: "Colon",     pattern: /:/ });
export const Dot       = createToken({ name: "Dot",       pattern: /\./ });
export const Semicolon = createToken({ name: "Semicolon", pattern: /;/ });

/** Any other single punctuation character is only legal as a configured separator */
export const OtherPunct = createToken({
  name: "OtherPunct",
  pattern: /[|!@$%^&?~/\\<>'`]/,
});

// ── Token ordering ─────────────────────────────────────────────────────────

export const allTokens = [
  WS,
  Comment,
  Newline,
  StringLiteral,
  NumberLiteral,
  Identifier,
  Equals,
  LParen,
  RParen,
  LSquare,
  RSquare,
  LCurly,
  RCurly,
  Comma,
  Colon,
  Dot,
  Semicolon,
  OtherPunct,
];

export const NdlLexer = new Lexer(allTokens, {
  ensureOptimizations: true,
  positionTracking: "full",
});
