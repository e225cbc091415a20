/**
 * Expression code generation.
 *
 * Transforms Expr nodes to C expression strings, inserting only the
 * parentheses C precedence requires.
 */

import { PREC, binaryPrecedence, unaryPrecedence } from "../codegen/precedence";
import { HostValue, ScalarType, scalarInfo, toNumber } from "../types";
import { Expr } from "./expr";

export interface Compiled {
  code: string;
  precedence: number;
}

/**
 * Generate C code for an expression.
 */
export function compileExpr(expr: Expr): string {
  return gen(expr).code;
}

function gen(expr: Expr): Compiled {
  switch (expr.tag) {
    case "lit":
      return genLiteral(expr.type, expr.value);

    case "var":
      return { code: expr.name, precedence: PREC.PRIMARY };

    case "binary": {
      if (expr.op === "%" && scalarInfo(expr.type).kind === "floating") {
        const fn = scalarInfo(expr.type).bits === 32 ? "fmodf" : "fmod";
        return { code: `${fn}(${gen(expr.left).code}, ${gen(expr.right).code})`, precedence: PREC.PRIMARY };
      }
      const prec = binaryPrecedence(expr.op);
      // Left-associative: an equal-precedence right operand needs parens
      const left = wrap(gen(expr.left), prec);
      const right = wrap(gen(expr.right), prec + 1);
      return { code: `${left} ${expr.op} ${right}`, precedence: prec };
    }

    case "unary": {
      const prec = unaryPrecedence(expr.op);
      const operand = wrap(gen(expr.operand), PREC.POSTFIX);
      return { code: `${expr.op}${operand}`, precedence: prec };
    }

    case "cond": {
      const condition = wrap(gen(expr.cond), PREC.CONDITIONAL + 1);
      const then = wrap(gen(expr.then), PREC.CONDITIONAL);
      const otherwise = wrap(gen(expr.else), PREC.CONDITIONAL);
      return { code: `${condition} ? ${then} : ${otherwise}`, precedence: PREC.CONDITIONAL };
    }

    case "cast": {
      const operand = wrap(gen(expr.operand), PREC.UNARY);
      return { code: `(${scalarInfo(expr.type).cType}) ${operand}`, precedence: PREC.UNARY };
    }
  }
}

/**
 * Headers the compiled expression needs: `<math.h>` for floating remainders.
 */
export function exprHeaders(expr: Expr): string[] {
  const headers = new Set<string>();
  const visit = (e: Expr): void => {
    switch (e.tag) {
      case "lit":
      case "var":
        return;
      case "binary":
        if (e.op === "%" && scalarInfo(e.type).kind === "floating") headers.add("<math.h>");
        visit(e.left);
        visit(e.right);
        return;
      case "unary":
      case "cast":
        visit(e.operand);
        return;
      case "cond":
        visit(e.cond);
        visit(e.then);
        visit(e.else);
        return;
    }
  };
  visit(expr);
  return [...headers];
}

function wrap(compiled: Compiled, minimum: number): string {
  return compiled.precedence < minimum ? `(${compiled.code})` : compiled.code;
}

/**
 * Generate a C literal of the given type.
 */
export function genLiteral(type: ScalarType, value: HostValue): Compiled {
  const info = scalarInfo(type);
  const n = toNumber(value);

  if (info.kind === "floating") {
    if (Number.isNaN(n)) return { code: "(0.0 / 0.0)", precedence: PREC.PRIMARY };
    if (!Number.isFinite(n)) return { code: n > 0 ? "(1.0 / 0.0)" : "(-1.0 / 0.0)", precedence: PREC.PRIMARY };
    const digits = Number.isInteger(n) && Math.abs(n) < 1e21 ? n.toFixed(1) : String(n);
    const code = info.bits === 32 ? `${digits}f` : digits;
    return { code, precedence: n < 0 ? PREC.UNARY : PREC.PRIMARY };
  }

  let suffix = "";
  if (info.kind === "unsigned") suffix = info.bits === 64 ? "ULL" : "u";
  else if (info.bits === 64) suffix = "LL";
  return { code: `${n}${suffix}`, precedence: n < 0 ? PREC.UNARY : PREC.PRIMARY };
}
