import { accept } from "./ast";
import type { ExprVisitor } from "./ast";
import type { Binary, Expr, Grouping, Literal, Unary } from "./types";

/**
 * Renders a tree in fully parenthesized prefix form, e.g.
 * `(* (group (+ 1 2)) 3)`. Source spacing does not show through, so two
 * trees print the same exactly when they have the same shape.
 */
export class AstPrinter implements ExprVisitor<string> {
  print(expr: Expr): string {
    return accept(expr, this);
  }

  visitBinary(expr: Binary): string {
    return this.parenthesize(expr.operator.lexeme, expr.left, expr.right);
  }

  visitGrouping(expr: Grouping): string {
    return this.parenthesize("group", expr.expression);
  }

  visitLiteral(expr: Literal): string {
    return stringifyLiteral(expr.value);
  }

  visitUnary(expr: Unary): string {
    return this.parenthesize(expr.operator.lexeme, expr.right);
  }

  private parenthesize(name: string, ...exprs: Expr[]): string {
    const parts = exprs.map((expr) => accept(expr, this));
    return `(${[name, ...parts].join(" ")})`;
  }
}

export function printExpr(expr: Expr): string {
  return new AstPrinter().print(expr);
}

// Strings print without quotes.
export function stringifyLiteral(value: number | string): string {
  if (typeof value === "string") {
    return value;
  }
  if (Object.is(value, -0)) {
    return "-0";
  }
  return decimal(value.toString());
}

const exponential = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/;

// Rewrites `1.5e-7` as `0.00000015` and `1e+21` as `1000000000000000000000`,
// keeping the shortest round-trip digits.
function decimal(text: string): string {
  const match = exponential.exec(text);
  if (match === null) {
    return text;
  }
  const [, sign, lead, fraction = "", exponent] = match;
  const digits = lead + fraction;
  // Digits before the decimal point.
  const point = 1 + Number(exponent);
  if (point <= 0) {
    return `${sign}0.${"0".repeat(-point)}${digits}`;
  }
  if (point >= digits.length) {
    return sign + digits + "0".repeat(point - digits.length);
  }
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}
