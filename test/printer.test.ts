import { describe, expect, it, vi } from "vitest";
import { accept, binary, grouping, literal, unary } from "../src/ast";
import type { ExprVisitor } from "../src/ast";
import { scan } from "../src/lexer";
import { parse } from "../src/parser";
import { AstPrinter, printExpr } from "../src/printer";
import type {
  Binary,
  BinaryToken,
  Expr,
  Grouping,
  Literal,
  Token,
  Unary,
  UnaryToken,
} from "../src/types";

const minus: UnaryToken = {
  type: "minus",
  lexeme: "-",
  literal: undefined,
  line: 1,
};
const star: BinaryToken = {
  type: "star",
  lexeme: "*",
  literal: undefined,
  line: 1,
};

// Reverse Polish notation, to show a second consumer of the same tree.
class RpnPrinter implements ExprVisitor<string> {
  visitBinary(expr: Binary): string {
    return `${accept(expr.left, this)} ${accept(expr.right, this)} ${
      expr.operator.lexeme
    }`;
  }

  visitGrouping(expr: Grouping): string {
    return accept(expr.expression, this);
  }

  visitLiteral(expr: Literal): string {
    return String(expr.value);
  }

  visitUnary(expr: Unary): string {
    return `${accept(expr.right, this)} neg`;
  }
}

function parsed(source: string): Expr {
  const tokens: Token[] = [];
  for (const result of scan(source)) {
    if (result.type === "token") {
      tokens.push(result.token);
    }
  }
  const result = parse(tokens);
  if (result.type === "err") {
    throw new Error(result.error.message);
  }
  return result.value;
}

describe("AstPrinter", () => {
  it("prints a hand-built tree", () => {
    const expr = binary(
      unary(minus, literal(123)),
      star,
      grouping(literal(45.67))
    );
    expect(printExpr(expr)).toBe("(* (- 123) (group 45.67))");
  });

  it("prints numbers in their shortest decimal form", () => {
    expect(printExpr(literal(123))).toBe("123");
    expect(printExpr(literal(0.5))).toBe("0.5");
    expect(printExpr(literal(-0))).toBe("-0");
  });

  it("never prints numbers in exponent notation", () => {
    expect(printExpr(literal(1e21))).toBe("1000000000000000000000");
    expect(printExpr(literal(1.5e-7))).toBe("0.00000015");
    expect(printExpr(literal(-2.5e22))).toBe("-25000000000000000000000");
    expect(printExpr(literal(1.25e21))).toBe("1250000000000000000000");
    expect(printExpr(parsed("0.0000001 + 100000000000000000000000"))).toBe(
      "(+ 0.0000001 100000000000000000000000)"
    );
    expect(printExpr(parsed("2.50"))).toBe("2.5");
  });

  it("prints strings without quotes", () => {
    expect(printExpr(literal("hi there"))).toBe("hi there");
    expect(printExpr(parsed('"a" == "b"'))).toBe("(== a b)");
  });

  it("ignores source spacing", () => {
    expect(printExpr(parsed("1+2*3"))).toBe(
      printExpr(parsed("  1 +\n 2\t*   3 "))
    );
  });

  it("prints the same tree the same way twice", () => {
    const expr = parsed("(1 + 2) * -3 >= 4 / 5");
    const printer = new AstPrinter();
    expect(printer.print(expr)).toBe("(>= (* (group (+ 1 2)) (- 3)) (/ 4 5))");
    expect(printer.print(expr)).toBe(printer.print(expr));
  });
});

describe("accept", () => {
  it("dispatches to the one matching visitor method", () => {
    const visitor = {
      visitBinary: vi.fn(() => "binary"),
      visitGrouping: vi.fn(() => "grouping"),
      visitLiteral: vi.fn(() => "literal"),
      visitUnary: vi.fn(() => "unary"),
    };
    const node = grouping(literal(1));

    expect(accept(node, visitor)).toBe("grouping");
    expect(visitor.visitGrouping).toHaveBeenCalledTimes(1);
    expect(visitor.visitGrouping).toHaveBeenCalledWith(node);
    expect(visitor.visitBinary).not.toHaveBeenCalled();
    expect(visitor.visitLiteral).not.toHaveBeenCalled();
    expect(visitor.visitUnary).not.toHaveBeenCalled();
  });

  it("lets new visitors walk the tree without touching the nodes", () => {
    const expr = parsed("(1 + 2) * -3");
    expect(accept(expr, new RpnPrinter())).toBe("1 2 + 3 neg *");
  });
});
