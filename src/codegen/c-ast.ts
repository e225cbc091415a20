/**
 * C AST Types
 *
 * The generator builds this tree and the printer turns it into text.
 * Expressions arrive already compiled by the expression language, so they are
 * plain strings here.
 */

import { CodegenError } from "../errors";

// ============================================================================
// Types
// ============================================================================

/** Base type plus pointer depth: `FILE *` is { base: "FILE", pointers: 1 } */
export interface CType {
  base: string;
  pointers: number;
}

export function cType(base: string, pointers: number = 0): CType {
  return { base, pointers };
}

export function pointerTo(type: CType): CType {
  return { base: type.base, pointers: type.pointers + 1 };
}

export function pointee(type: CType): CType {
  if (type.pointers === 0) {
    throw new CodegenError(`cannot dereference non-pointer type ${printCType(type)}`);
  }
  return { base: type.base, pointers: type.pointers - 1 };
}

export function printCType(type: CType): string {
  return type.pointers === 0 ? type.base : `${type.base} ${"*".repeat(type.pointers)}`;
}

// ============================================================================
// Declarations
// ============================================================================

export interface CDecl {
  type: CType;
  name: string;
  /** Array declarator: a size expression, or null for `[]` */
  array?: { size: string | null };
  /** Initializer text, e.g. `{1, 2, 3}` */
  init?: string;
}

// ============================================================================
// Statements
// ============================================================================

export type CStmt = CAssign | CExprStmt | CIf | CWhile | CFor | CBreak;

/** target = value; */
export interface CAssign {
  tag: "cAssign";
  target: string;
  value: string;
}

/** Expression statement, usually a call */
export interface CExprStmt {
  tag: "cExpr";
  expr: string;
}

export interface CIf {
  tag: "cIf";
  cond: string;
  then: CBlock;
  else: CBlock | null;
}

export interface CWhile {
  tag: "cWhile";
  cond: string;
  body: CBlock;
}

/** for (T index = init; cond; update) { body } */
export interface CFor {
  tag: "cFor";
  index: CDecl;
  start: string;
  cond: string;
  update: string;
  body: CBlock;
}

export interface CBreak {
  tag: "cBreak";
}

/**
 * Declarations come first in a block, statements after.
 */
export interface CBlock {
  decls: CDecl[];
  stmts: CStmt[];
}

export function emptyBlock(): CBlock {
  return { decls: [], stmts: [] };
}

export function isEmptyBlock(block: CBlock): boolean {
  return block.decls.length === 0 && block.stmts.length === 0;
}

// ============================================================================
// Top Level
// ============================================================================

export interface CFunction {
  returnType: CType;
  name: string;
  /** Parameter list text; "void" for none */
  params: string;
  body: CBlock;
  /** Returned expression, if any */
  result: string | null;
}

export interface CModule {
  /** Header names including the brackets or quotes, e.g. `<stdio.h>` */
  includes: string[];
  /** Top-level declarations and definitions, verbatim */
  globals: string[];
  functions: CFunction[];
}
