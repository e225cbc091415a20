/**
 * C operator precedence constants.
 *
 * Higher numbers = higher precedence (binds tighter).
 * Used to determine when parentheses are needed in generated code.
 */

import { BinaryOp, UnaryOp } from "../exp/expr";

// Precedence levels (higher = tighter binding)
export const PREC = {
  COMMA: 1,
  ASSIGNMENT: 2,
  CONDITIONAL: 3,  // ?:
  LOGICAL_OR: 4,   // ||
  LOGICAL_AND: 5,  // &&
  BITWISE_OR: 6,   // |
  BITWISE_XOR: 7,  // ^
  BITWISE_AND: 8,  // &
  EQUALITY: 9,     // == !=
  RELATIONAL: 10,  // < > <= >=
  SHIFT: 11,       // << >>
  ADDITIVE: 12,    // + -
  MULTIPLICATIVE: 13,  // * / %
  UNARY: 14,       // ! - ~ casts
  POSTFIX: 15,     // [] () ++ --
  PRIMARY: 16,     // literals, identifiers, grouping
} as const;

/**
 * Get the precedence of a binary operator.
 */
export function binaryPrecedence(op: BinaryOp): number {
  switch (op) {
    case "||":
      return PREC.LOGICAL_OR;
    case "&&":
      return PREC.LOGICAL_AND;
    case "|":
      return PREC.BITWISE_OR;
    case "^":
      return PREC.BITWISE_XOR;
    case "&":
      return PREC.BITWISE_AND;
    case "==":
    case "!=":
      return PREC.EQUALITY;
    case "<":
    case ">":
    case "<=":
    case ">=":
      return PREC.RELATIONAL;
    case "<<":
    case ">>":
      return PREC.SHIFT;
    case "+":
    case "-":
      return PREC.ADDITIVE;
    case "*":
    case "/":
    case "%":
      return PREC.MULTIPLICATIVE;
  }
}

/**
 * Get the precedence of a unary operator.
 */
export function unaryPrecedence(_op: UnaryOp): number {
  // All prefix operators share one level in C
  return PREC.UNARY;
}
