export { accept, binary, grouping, literal, unary } from "./ast";
export type { ExprVisitor } from "./ast";
export { formatLexicalError, formatParseError, formatToken } from "./errors";
export { Scanner, scan } from "./lexer";
export { Parser, parse } from "./parser";
export { AstPrinter, printExpr, stringifyLiteral } from "./printer";
export { andThen, err, isErr, isOk, map, ok } from "./result";
export type { Err, Ok, Result } from "./result";
export { run } from "./run";
export type { OutputLine, RunMode, RunOptions, RunOutcome } from "./run";
export { isKeyword, kindName } from "./types";
export type {
  Binary,
  BinaryToken,
  BinaryTokenType,
  Expr,
  Grouping,
  Keyword,
  LexicalError,
  Literal,
  ParseError,
  ScanResult,
  Token,
  TokenType,
  Unary,
  UnaryToken,
  UnaryTokenType,
} from "./types";
