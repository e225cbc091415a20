/**
 * Foreign-call arguments: their C expressions and parameter types.
 */

import type { FunArg } from "../instructions/call";
import { expectSymbolicArr, expectSymbolicHandle, expectSymbolicRef } from "../interp/representation";
import { CType, cType, pointee, pointerTo, printCType } from "./c-ast";
import { cString } from "./c-printer";
import { CGenContext } from "./context";

/**
 * The C expression passed for an argument.
 */
export function compileArg<E>(arg: FunArg<E>, compile: (exp: E) => string): string {
  switch (arg.tag) {
    case "value":
      return compile(arg.exp);
    case "ref":
      return `&${expectSymbolicRef(arg.ref, "codegen").name}`;
    case "arr":
      return expectSymbolicArr(arg.arr, "codegen").name;
    case "object":
      return arg.object.id;
    case "handle":
      return expectSymbolicHandle(arg.handle, "codegen").name;
    case "string":
      return cString(arg.value);
    case "addr":
      return `&${compileArg(arg.arg, compile)}`;
    case "deref":
      return `*${compileArg(arg.arg, compile)}`;
  }
}

/**
 * The parameter type an argument calls for in a prototype.
 */
export function argParam<E>(arg: FunArg<E>, ctx: CGenContext): CType {
  switch (arg.tag) {
    case "value":
      return ctx.useType(arg.type);
    case "ref":
      return pointerTo(ctx.useType(arg.ref.type));
    case "arr":
      return pointerTo(ctx.useType(arg.arr.type));
    case "object":
      return cType(arg.object.typeName, arg.object.pointed ? 1 : 0);
    case "handle":
      ctx.addInclude("<stdio.h>");
      return cType("FILE", 1);
    case "string":
      return cType("const char", 1);
    case "addr":
      return pointerTo(argParam(arg.arg, ctx));
    case "deref":
      return pointee(argParam(arg.arg, ctx));
  }
}

/** Comma-separated parameter types, or "void" */
export function paramList<E>(args: FunArg<E>[], ctx: CGenContext): string {
  if (args.length === 0) return "void";
  return args.map((arg) => printCType(argParam(arg, ctx))).join(", ");
}

export function argList<E>(args: FunArg<E>[], compile: (exp: E) => string): string {
  return args.map((arg) => compileArg(arg, compile)).join(", ");
}
