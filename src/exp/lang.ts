/**
 * The expression collaborator.
 *
 * Instruction families are generic over an expression type E. An
 * interpreter only needs these operations on it.
 */

import { HostValue, ScalarType } from "../types";
import { compileExpr, exprHeaders } from "./compile";
import { evalExpr } from "./evaluate";
import { Expr, lit, varRef } from "./expr";

export interface ExpLang<E> {
  /** Embed a host value */
  litExp(type: ScalarType, value: HostValue): E;
  /** Variable expression, used for symbolic results */
  varExp(type: ScalarType, name: string): E;
  /** Evaluate a closed expression */
  evalExp(exp: E): HostValue;
  /** Compile to a C expression */
  compileExp(exp: E): string;
  /** Headers the compiled expression relies on */
  expHeaders(exp: E): string[];
  /** Whether values of the type can be represented */
  represents(type: ScalarType): boolean;
}

/**
 * Expression language over Expr.
 */
export const exprLang: ExpLang<Expr> = {
  litExp: lit,
  varExp: varRef,
  evalExp: evalExpr,
  compileExp: compileExpr,
  expHeaders: exprHeaders,
  represents: () => true,
};

/**
 * exprLang limited to a set of types.
 */
export function restrictExprLang(types: readonly ScalarType[]): ExpLang<Expr> {
  const allowed = new Set(types);
  return { ...exprLang, represents: (type) => allowed.has(type) };
}
