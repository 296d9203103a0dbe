import { isKeyword } from "./types";
import type { ScanResult, TokenType } from "./types";

const alphabetic = /^\p{Alphabetic}$/u;

const singleCharTokens: ReadonlyMap<string, TokenType> = new Map<
  string,
  TokenType
>([
  ["(", "left_paren"],
  [")", "right_paren"],
  ["{", "left_brace"],
  ["}", "right_brace"],
  [",", "comma"],
  [".", "dot"],
  ["-", "minus"],
  ["+", "plus"],
  [";", "semicolon"],
  ["*", "star"],
]);

export function scan(source: string): ScanResult[] {
  return new Scanner(source).scanTokens();
}

/**
 * Turns source text into tokens. Lexical errors are emitted in place, in
 * source order, and scanning carries on after each one.
 *
 * Positions count code points, not UTF-16 units.
 */
export class Scanner {
  private readonly source: readonly string[];
  private readonly results: ScanResult[] = [];
  private start = 0;
  private current = 0;
  private line = 1;
  // Index of the first character of the current line.
  private lineStart = 0;
  private startLine = 1;
  private startColumn = 1;

  constructor(source: string) {
    this.source = Array.from(source);
  }

  scanTokens(): ScanResult[] {
    while (!this.isAtEnd()) {
      this.start = this.current;
      this.startLine = this.line;
      this.startColumn = this.column(this.start);
      this.scanToken();
    }

    this.results.push({
      type: "token",
      token: {
        type: "eof",
        lexeme: "",
        literal: undefined,
        line: this.line,
      },
    });
    return this.results;
  }

  private isAtEnd(): boolean {
    return this.current >= this.source.length;
  }

  private scanToken(): void {
    const c: string = this.advance();
    const single = singleCharTokens.get(c);
    if (single !== undefined) {
      this.addToken(single);
      return;
    }
    switch (c) {
      case "!":
        this.addToken(this.match("=") ? "bang_equal" : "bang");
        break;
      case "=":
        this.addToken(this.match("=") ? "equal_equal" : "equal");
        break;
      case "<":
        this.addToken(this.match("=") ? "less_equal" : "less");
        break;
      case ">":
        this.addToken(this.match("=") ? "greater_equal" : "greater");
        break;
      case "/":
        if (this.match("/")) {
          while (this.peek() !== "\n" && !this.isAtEnd()) {
            this.advance();
          }
        } else {
          this.addToken("slash");
        }
        break;
      case " ":
      case "\r":
      case "\t":
        // Ignore whitespace.
        break;
      case "\n":
        this.newline();
        break;
      case '"':
        this.string();
        break;
      default:
        if (this.isDigit(c)) {
          this.number();
        } else if (this.isAlpha(c)) {
          this.identifier();
        } else {
          this.error(`Unexpected character '${c}'.`);
        }
        break;
    }
  }

  private isDigit(c: string): boolean {
    return c >= "0" && c <= "9";
  }

  private isAlpha(c: string): boolean {
    return alphabetic.test(c);
  }

  private isAlphaNumeric(c: string): boolean {
    return this.isAlpha(c) || this.isDigit(c) || c === "_";
  }

  private number(): void {
    while (this.isDigit(this.peek())) {
      this.advance();
    }

    if (this.peek() === "." && this.isDigit(this.peekNext())) {
      this.advance();

      while (this.isDigit(this.peek())) {
        this.advance();
      }
    }

    const text = this.text();
    const value = Number.parseFloat(text);
    if (!Number.isFinite(value)) {
      this.error(`Invalid number literal '${text}'.`);
      return;
    }
    this.addToken("number", value);
  }

  private identifier(): void {
    while (this.isAlphaNumeric(this.peek())) {
      this.advance();
    }
    const text: string = this.text();
    if (isKeyword(text)) {
      this.addToken(text);
    } else {
      this.addToken("identifier", text);
    }
  }

  private string(): void {
    while (this.peek() !== '"' && !this.isAtEnd()) {
      if (this.advance() === "\n") {
        this.newline();
      }
    }

    if (this.isAtEnd()) {
      this.error("Unterminated string.");
      return;
    }

    this.advance();

    const value: string = this.source
      .slice(this.start + 1, this.current - 1)
      .join("");
    this.addToken("string", value);
  }

  private newline(): void {
    this.line++;
    this.lineStart = this.current;
  }

  private column(index: number): number {
    return index - this.lineStart + 1;
  }

  private advance(): string {
    return this.source[this.current++];
  }

  private match(expected: string): boolean {
    if (this.isAtEnd()) {
      return false;
    }
    if (this.source[this.current] !== expected) {
      return false;
    }
    this.current++;
    return true;
  }

  private peek(): string {
    if (this.isAtEnd()) {
      return "\0";
    }
    return this.source[this.current];
  }

  private peekNext(): string {
    if (this.current + 1 >= this.source.length) {
      return "\0";
    }
    return this.source[this.current + 1];
  }

  private text(): string {
    return this.source.slice(this.start, this.current).join("");
  }

  private addToken(
    type: TokenType,
    literal: string | number | undefined = undefined
  ): void {
    this.results.push({
      type: "token",
      token: {
        type: type,
        lexeme: this.text(),
        literal: literal,
        line: this.startLine,
      },
    });
  }

  // Reported at the start of the current lexeme.
  private error(message: string): void {
    this.results.push({
      type: "error",
      error: {
        line: this.startLine,
        column: this.startColumn,
        message: message,
      },
    });
  }
}
