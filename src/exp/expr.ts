/**
 * Expression AST for the bundled expression language.
 *
 * Every node carries the scalar type of its result, so the interpreters can
 * pick storage types and normalise values without inference.
 */

import { HostValue, ScalarType, coerceValue } from "../types";

// ============================================================================
// Operators
// ============================================================================

export type ArithOp = "+" | "-" | "*" | "/" | "%";
export type CompareOp = "==" | "!=" | "<" | "<=" | ">" | ">=";
export type LogicOp = "&&" | "||";
export type BitOp = "&" | "|" | "^" | "<<" | ">>";
export type BinaryOp = ArithOp | CompareOp | LogicOp | BitOp;
export type UnaryOp = "-" | "!" | "~";

// ============================================================================
// Expression Types
// ============================================================================

export type Expr = LitExpr | VarExpr | BinaryExpr | UnaryExpr | CondExpr | CastExpr;

export interface LitExpr {
  tag: "lit";
  type: ScalarType;
  value: HostValue;
}

export interface VarExpr {
  tag: "var";
  type: ScalarType;
  name: string;
}

export interface BinaryExpr {
  tag: "binary";
  type: ScalarType;
  op: BinaryOp;
  left: Expr;
  right: Expr;
}

export interface UnaryExpr {
  tag: "unary";
  type: ScalarType;
  op: UnaryOp;
  operand: Expr;
}

export interface CondExpr {
  tag: "cond";
  type: ScalarType;
  cond: Expr;
  then: Expr;
  else: Expr;
}

export interface CastExpr {
  tag: "cast";
  type: ScalarType;
  operand: Expr;
}

// ============================================================================
// Constructors
// ============================================================================

export function lit(type: ScalarType, value: HostValue): LitExpr {
  return { tag: "lit", type, value: coerceValue(type, value) };
}

export function varRef(type: ScalarType, name: string): VarExpr {
  return { tag: "var", type, name };
}

export const bool = (value: boolean): LitExpr => lit("bool", value);
export const int = (value: number): LitExpr => lit("int", value);
export const int32 = (value: number): LitExpr => lit("int32", value);
export const int64 = (value: number): LitExpr => lit("int64", value);
export const word32 = (value: number): LitExpr => lit("word32", value);
export const float = (value: number): LitExpr => lit("float", value);
export const double = (value: number): LitExpr => lit("double", value);

function arith(op: ArithOp | BitOp) {
  return (left: Expr, right: Expr): BinaryExpr => ({ tag: "binary", type: left.type, op, left, right });
}

function compare(op: CompareOp | LogicOp) {
  return (left: Expr, right: Expr): BinaryExpr => ({ tag: "binary", type: "bool", op, left, right });
}

export const add = arith("+");
export const sub = arith("-");
export const mul = arith("*");
export const div = arith("/");
export const mod = arith("%");
export const bitAnd = arith("&");
export const bitOr = arith("|");
export const bitXor = arith("^");
export const shl = arith("<<");
export const shr = arith(">>");

export const eq = compare("==");
export const neq = compare("!=");
export const lt = compare("<");
export const lte = compare("<=");
export const gt = compare(">");
export const gte = compare(">=");
export const and = compare("&&");
export const or = compare("||");

export function neg(operand: Expr): UnaryExpr {
  return { tag: "unary", type: operand.type, op: "-", operand };
}

export function not(operand: Expr): UnaryExpr {
  return { tag: "unary", type: "bool", op: "!", operand };
}

/** Bitwise complement; the operand must be integral when evaluated */
export function complement(operand: Expr): UnaryExpr {
  return { tag: "unary", type: operand.type, op: "~", operand };
}

export function cond(condition: Expr, then: Expr, otherwise: Expr): CondExpr {
  return { tag: "cond", type: then.type, cond: condition, then, else: otherwise };
}

export function cast(type: ScalarType, operand: Expr): CastExpr {
  return { tag: "cast", type, operand };
}

// ============================================================================
// Printing
// ============================================================================

/**
 * Debug rendering; not C.
 */
export function exprToString(expr: Expr): string {
  switch (expr.tag) {
    case "lit":
      return `${expr.value}:${expr.type}`;
    case "var":
      return expr.name;
    case "binary":
      return `(${exprToString(expr.left)} ${expr.op} ${exprToString(expr.right)})`;
    case "unary":
      return `${expr.op}${exprToString(expr.operand)}`;
    case "cond":
      return `(${exprToString(expr.cond)} ? ${exprToString(expr.then)} : ${exprToString(expr.else)})`;
    case "cast":
      return `(${expr.type})${exprToString(expr.operand)}`;
  }
}
