import { binary, grouping, literal, unary } from "./ast";
import { andThen, err, map, ok } from "./result";
import type { Result } from "./result";
import type {
  BinaryTokenType,
  Expr,
  ParseError,
  Token,
  TokenType,
} from "./types";

type ParseResult<T> = Result<T, ParseError>;

type TokenOf<T extends TokenType> = Token & { readonly type: T };

// Bound on tree height, so parsing and later tree walks stay within the
// call stack.
const maxDepth = 1000;

export function parse(tokens: readonly Token[]): ParseResult<Expr> {
  return new Parser(tokens).parse();
}

/**
 * Recursive-descent parser for the expression grammar:
 *
 *     expression → equality
 *     equality   → comparison ( ( "!=" | "==" ) comparison )*
 *     comparison → term ( ( ">" | ">=" | "<" | "<=" ) term )*
 *     term       → factor ( ( "-" | "+" ) factor )*
 *     factor     → unary ( ( "/" | "*" ) unary )*
 *     unary      → "-" unary | primary
 *     primary    → NUMBER | STRING | "(" expression ")"
 *
 * The first syntax error ends the parse and is returned as an `err` result.
 * `parse` reads a prefix of the tokens; call `expectEnd` afterwards to
 * insist that nothing follows.
 *
 * Each "(", "-" and folded binary operator adds a level of nesting; past
 * `maxDepth` levels the parse fails with `Expression nested too deeply.`
 */
export class Parser {
  private readonly tokens: readonly Token[];
  private current = 0;
  private depth = 0;

  constructor(tokens: readonly Token[]) {
    this.tokens = withEof(tokens);
  }

  parse(): ParseResult<Expr> {
    return this.expression();
  }

  expectEnd(): ParseResult<void> {
    if (this.isAtEnd()) {
      return ok(undefined);
    }
    return err(
      this.error(this.peek(), "end of input", "Expect end of expression.")
    );
  }

  private expression(): ParseResult<Expr> {
    return this.equality();
  }

  private equality(): ParseResult<Expr> {
    return this.leftAssociative(
      () => this.comparison(),
      ["bang_equal", "equal_equal"]
    );
  }

  private comparison(): ParseResult<Expr> {
    return this.leftAssociative(
      () => this.term(),
      ["greater", "greater_equal", "less", "less_equal"]
    );
  }

  private term(): ParseResult<Expr> {
    return this.leftAssociative(() => this.factor(), ["minus", "plus"]);
  }

  private factor(): ParseResult<Expr> {
    return this.leftAssociative(() => this.unary(), ["slash", "star"]);
  }

  // operand (op operand)*, folded to the left.
  private leftAssociative(
    operand: () => ParseResult<Expr>,
    types: readonly BinaryTokenType[]
  ): ParseResult<Expr> {
    const first = operand();
    if (first.type === "err") {
      return first;
    }

    const base = this.depth;
    try {
      let expr: Expr = first.value;
      let operator = this.matchAny(types);
      while (operator !== null) {
        // The tree gets one level taller with every fold.
        if (this.depth >= maxDepth) {
          return err(this.tooDeep());
        }
        this.depth++;
        const right = operand();
        if (right.type === "err") {
          return right;
        }
        expr = binary(expr, operator, right.value);
        operator = this.matchAny(types);
      }
      return ok(expr);
    } finally {
      this.depth = base;
    }
  }

  private unary(): ParseResult<Expr> {
    const operator = this.matchAny(["minus"]);
    if (operator !== null) {
      return this.nested(() =>
        map(this.unary(), (right) => unary(operator, right))
      );
    }

    return this.primary();
  }

  private primary(): ParseResult<Expr> {
    const token = this.peek();
    const value = token.literal;
    if (
      (token.type === "number" || token.type === "string") &&
      value !== undefined
    ) {
      this.advance();
      return ok(literal(value));
    }
    if (this.matchAny(["left_paren"]) !== null) {
      return this.nested(() =>
        andThen(this.expression(), (expr) =>
          map(
            this.consume("right_paren", "')'", "Expect ')' after expression."),
            () => grouping(expr)
          )
        )
      );
    }
    return err(this.error(token, "expression", "Expect expression."));
  }

  private nested(parse: () => ParseResult<Expr>): ParseResult<Expr> {
    if (this.depth >= maxDepth) {
      return err(this.tooDeep());
    }
    this.depth++;
    try {
      return parse();
    } finally {
      this.depth--;
    }
  }

  private tooDeep(): ParseError {
    return this.error(
      this.peek(),
      "expression",
      "Expression nested too deeply."
    );
  }

  private consume(
    type: TokenType,
    expected: string,
    message: string
  ): ParseResult<Token> {
    if (this.check(type)) {
      return ok(this.advance());
    }
    return err(this.error(this.peek(), expected, message));
  }

  private error(token: Token, expected: string, message: string): ParseError {
    return {
      expected: expected,
      token: token,
      line: token.line,
      message: message,
    };
  }

  private matchAny<T extends TokenType>(
    types: readonly T[]
  ): TokenOf<T> | null {
    const token = this.peek();
    if (!this.isAtEnd() && hasType(token, types)) {
      this.advance();
      return token;
    }
    return null;
  }

  private check(type: TokenType): boolean {
    if (this.isAtEnd()) {
      return false;
    }
    return this.peek().type === type;
  }

  private advance(): Token {
    if (!this.isAtEnd()) {
      this.current++;
    }
    return this.previous();
  }

  private isAtEnd(): boolean {
    return this.peek().type === "eof";
  }

  private peek(): Token {
    return this.tokens[this.current];
  }

  private previous(): Token {
    return this.tokens[this.current - 1];
  }
}

function hasType<T extends TokenType>(
  token: Token,
  types: readonly T[]
): token is TokenOf<T> {
  return types.some((type) => type === token.type);
}

// The grammar relies on a trailing eof; supply one if the caller didn't.
function withEof(tokens: readonly Token[]): readonly Token[] {
  if (tokens.length > 0 && tokens[tokens.length - 1].type === "eof") {
    return tokens;
  }
  const line = tokens.length > 0 ? tokens[tokens.length - 1].line : 1;
  return [...tokens, { type: "eof", lexeme: "", literal: undefined, line }];
}
