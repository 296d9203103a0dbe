import { stringifyLiteral } from "./printer";
import { kindName } from "./types";
import type { LexicalError, ParseError, Token } from "./types";

export function formatLexicalError(error: LexicalError): string {
  return `[line ${error.line}:${error.column}] Error: ${error.message}`;
}

export function formatParseError(error: ParseError): string {
  const where =
    error.token.type === "eof" ? " at end" : ` at '${error.token.lexeme}'`;
  return `[line ${error.line}] Error${where}: ${error.message}`;
}

/** `KIND LEXEME LITERAL`, with `null` standing in for a missing literal. */
export function formatToken(token: Token): string {
  const literal =
    token.literal === undefined ? "null" : stringifyLiteral(token.literal);
  return `${kindName(token.type)} ${token.lexeme} ${literal}`;
}
