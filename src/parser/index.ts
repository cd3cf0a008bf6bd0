export { parseStatements, renderArg, renderValue } from "./parser.js";
export { CUSTOM_SEPARATORS, NdlLexer, allTokens } from "./lexer.js";
