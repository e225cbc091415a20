/**
 * Evaluation of closed expressions with C semantics: integer division
 * truncates, remainder keeps the sign of the dividend and every result is
 * normalised to the node's type.
 */

import { ExpressionError } from "../errors";
import { HostValue, coerceValue, isIntegral, toBool, toNumber } from "../types";
import { BinaryExpr, Expr, UnaryExpr } from "./expr";

export function evalExpr(expr: Expr): HostValue {
  switch (expr.tag) {
    case "lit":
      return expr.value;

    case "var":
      throw new ExpressionError(`cannot evaluate free variable ${expr.name}`);

    case "binary":
      return evalBinary(expr);

    case "unary":
      return evalUnary(expr);

    case "cond":
      return toBool(evalExpr(expr.cond)) ? evalExpr(expr.then) : evalExpr(expr.else);

    case "cast":
      return coerceValue(expr.type, evalExpr(expr.operand));
  }
}

function evalBinary(expr: BinaryExpr): HostValue {
  // Short-circuit before touching the right operand
  if (expr.op === "&&") {
    return toBool(evalExpr(expr.left)) && toBool(evalExpr(expr.right));
  }
  if (expr.op === "||") {
    return toBool(evalExpr(expr.left)) || toBool(evalExpr(expr.right));
  }

  const left = toNumber(evalExpr(expr.left));
  const right = toNumber(evalExpr(expr.right));
  const integral = isIntegral(expr.left.type);

  switch (expr.op) {
    case "==":
      return left === right;
    case "!=":
      return left !== right;
    case "<":
      return left < right;
    case "<=":
      return left <= right;
    case ">":
      return left > right;
    case ">=":
      return left >= right;

    case "+":
      return coerceValue(expr.type, left + right);
    case "-":
      return coerceValue(expr.type, left - right);
    case "*":
      return coerceValue(expr.type, integral ? Number(BigInt(left) * BigInt(right)) : left * right);
    case "/":
      if (integral) {
        if (right === 0) throw new ExpressionError("integer division by zero");
        return coerceValue(expr.type, Math.trunc(left / right));
      }
      return coerceValue(expr.type, left / right);
    case "%":
      if (integral && right === 0) throw new ExpressionError("integer remainder by zero");
      return coerceValue(expr.type, left % right);

    case "&":
    case "|":
    case "^":
    case "<<":
    case ">>":
      if (!integral) throw new ExpressionError(`operator ${expr.op} needs integral operands`);
      return coerceValue(expr.type, Number(bitwise(expr.op, BigInt(left), BigInt(right))));
  }
}

function bitwise(op: "&" | "|" | "^" | "<<" | ">>", left: bigint, right: bigint): bigint {
  switch (op) {
    case "&":
      return left & right;
    case "|":
      return left | right;
    case "^":
      return left ^ right;
    case "<<":
      return left << right;
    case ">>":
      return left >> right;
  }
}

function evalUnary(expr: UnaryExpr): HostValue {
  const value = evalExpr(expr.operand);
  switch (expr.op) {
    case "!":
      return !toBool(value);
    case "-":
      return coerceValue(expr.type, -toNumber(value));
    case "~":
      if (!isIntegral(expr.operand.type)) throw new ExpressionError("operator ~ needs an integral operand");
      return coerceValue(expr.type, Number(~BigInt(toNumber(value))));
  }
}
