/**
 * Codegen module - compiles programs to C.
 *
 * Public exports for the code generation phase.
 */

export { generateC, CGenerator } from "./codegen";
export type { CodegenOptions, CodegenResult } from "./codegen";
export { CGenContext } from "./context";
export { compileArg, argParam, argList, paramList } from "./args";
export { printModule, printFunction, printDecl, printDeclarator, cString } from "./c-printer";
export type { PrintOptions } from "./c-printer";
export { cType, pointerTo, pointee, printCType, emptyBlock, isEmptyBlock } from "./c-ast";
export type {
  CType,
  CDecl,
  CStmt,
  CAssign,
  CExprStmt,
  CIf,
  CWhile,
  CFor,
  CBreak,
  CBlock,
  CFunction,
  CModule,
} from "./c-ast";
export { CodeBuilder } from "./code-builder";
export { PREC, binaryPrecedence, unaryPrecedence } from "./precedence";
