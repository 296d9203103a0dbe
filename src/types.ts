export type TokenType =
  | Keyword
  | "left_paren"
  | "right_paren"
  | "left_brace"
  | "right_brace"
  | "comma"
  | "dot"
  | "minus"
  | "plus"
  | "semicolon"
  | "slash"
  | "star"
  | "bang"
  | "bang_equal"
  | "equal"
  | "equal_equal"
  | "greater"
  | "greater_equal"
  | "less"
  | "less_equal"
  | "identifier"
  | "string"
  | "number"
  | "eof";

export type Token = {
  readonly type: TokenType;
  readonly lexeme: string;
  readonly literal: string | number | undefined;
  readonly line: number;
};

export type LexicalError = {
  readonly line: number;
  readonly column: number;
  readonly message: string;
};

export type ScanResult =
  | { readonly type: "token"; readonly token: Token }
  | { readonly type: "error"; readonly error: LexicalError };

const keywords = [
  "and",
  "class",
  "else",
  "false",
  "for",
  "fun",
  "if",
  "nil",
  "or",
  "print",
  "return",
  "super",
  "this",
  "true",
  "var",
  "while",
] as const;
export type Keyword = typeof keywords[number];

const keywordSet: ReadonlySet<string> = new Set(keywords);

export function isKeyword(s: string): s is Keyword {
  return keywordSet.has(s);
}

/** Display name of a token kind, e.g. `bang_equal` → `BANG_EQUAL`. */
export function kindName(type: TokenType): string {
  return type.toUpperCase();
}

export type UnaryTokenType = "minus";

export type BinaryTokenType =
  | "minus"
  | "plus"
  | "slash"
  | "star"
  | "greater"
  | "greater_equal"
  | "less"
  | "less_equal"
  | "bang_equal"
  | "equal_equal";

export type BinaryToken = Token & { readonly type: BinaryTokenType };
export type UnaryToken = Token & { readonly type: UnaryTokenType };

export type Expr = Binary | Grouping | Literal | Unary;

export type Binary = {
  readonly type: "binary";
  readonly left: Expr;
  readonly operator: BinaryToken;
  readonly right: Expr;
};

export type Grouping = {
  readonly type: "grouping";
  readonly expression: Expr;
};

export type Literal = {
  readonly type: "literal";
  readonly value: number | string;
};

export type Unary = {
  readonly type: "unary";
  readonly operator: UnaryToken;
  readonly right: Expr;
};

export type ParseError = {
  /** What the parser was looking for, e.g. `expression` or `')'`. */
  readonly expected: string;
  readonly token: Token;
  readonly line: number;
  readonly message: string;
};
