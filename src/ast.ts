import type {
  Binary,
  BinaryToken,
  Expr,
  Grouping,
  Literal,
  Unary,
  UnaryToken,
} from "./types";

/**
 * One method per expression kind. New passes over the tree (printing,
 * evaluation, resolution) implement this instead of touching the node types.
 */
export interface ExprVisitor<R> {
  visitBinary(expr: Binary): R;
  visitGrouping(expr: Grouping): R;
  visitLiteral(expr: Literal): R;
  visitUnary(expr: Unary): R;
}

export function accept<R>(expr: Expr, visitor: ExprVisitor<R>): R {
  switch (expr.type) {
    case "binary":
      return visitor.visitBinary(expr);
    case "grouping":
      return visitor.visitGrouping(expr);
    case "literal":
      return visitor.visitLiteral(expr);
    case "unary":
      return visitor.visitUnary(expr);
  }
}

export function binary(left: Expr, operator: BinaryToken, right: Expr): Binary {
  return {
    type: "binary",
    left: left,
    operator: operator,
    right: right,
  };
}

export function grouping(expression: Expr): Grouping {
  return { type: "grouping", expression: expression };
}

export function literal(value: number | string): Literal {
  return { type: "literal", value: value };
}

export function unary(operator: UnaryToken, right: Expr): Unary {
  return { type: "unary", operator: operator, right: right };
}
