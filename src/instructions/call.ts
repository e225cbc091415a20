/**
 * Foreign declarations and calls. Only meaningful to the code generator; the
 * declaration commands are no-ops elsewhere.
 */

import { Program, pure, skip, step } from "../program/program";
import { ScalarType } from "../types";
import type { Arr } from "./arr";
import type { Handle } from "./file";
import type { ObjectHandle } from "./object";
import type { Ref } from "./ref";

// ============================================================================
// Arguments
// ============================================================================

export type FunArg<E> =
  | ValueArg<E>
  | RefArg
  | ArrArg
  | ObjectArg
  | HandleArg
  | StringArg
  | AddrArg<E>
  | DerefArg<E>;

/** Pass an expression by value */
export interface ValueArg<E> {
  tag: "value";
  type: ScalarType;
  exp: E;
}

/** Pass the address of a reference */
export interface RefArg {
  tag: "ref";
  ref: Ref;
}

export interface ArrArg {
  tag: "arr";
  arr: Arr;
}

export interface ObjectArg {
  tag: "object";
  object: ObjectHandle;
}

export interface HandleArg {
  tag: "handle";
  handle: Handle;
}

/** String literal */
export interface StringArg {
  tag: "string";
  value: string;
}

/** Address of another argument */
export interface AddrArg<E> {
  tag: "addr";
  arg: FunArg<E>;
}

/** Dereference of another argument */
export interface DerefArg<E> {
  tag: "deref";
  arg: FunArg<E>;
}

export function valArg<E>(type: ScalarType, exp: E): FunArg<E> {
  return { tag: "value", type, exp };
}

export function refArg<E>(ref: Ref): FunArg<E> {
  return { tag: "ref", ref };
}

export function arrArg<E>(arr: Arr): FunArg<E> {
  return { tag: "arr", arr };
}

export function objArg<E>(object: ObjectHandle): FunArg<E> {
  return { tag: "object", object };
}

export function handleArg<E>(handle: Handle): FunArg<E> {
  return { tag: "handle", handle };
}

export function strArg<E>(value: string): FunArg<E> {
  return { tag: "string", value };
}

export function addr<E>(arg: FunArg<E>): FunArg<E> {
  return { tag: "addr", arg };
}

export function deref<E>(arg: FunArg<E>): FunArg<E> {
  return { tag: "deref", arg };
}

// ============================================================================
// Commands
// ============================================================================

export type CallCmd<E, K> =
  | AddInclude<K>
  | AddDefinition<K>
  | AddExternFun<E, K>
  | AddExternProc<E, K>
  | CallFun<E, K>
  | CallProc<E, K>;

export interface AddInclude<K> {
  family: "call";
  tag: "AddInclude";
  header: string;
  next: () => K;
}

/** Raw top-level C definition */
export interface AddDefinition<K> {
  family: "call";
  tag: "AddDefinition";
  definition: string;
  next: () => K;
}

export interface AddExternFun<E, K> {
  family: "call";
  tag: "AddExternFun";
  name: string;
  resultType: ScalarType;
  args: FunArg<E>[];
  next: () => K;
}

export interface AddExternProc<E, K> {
  family: "call";
  tag: "AddExternProc";
  name: string;
  args: FunArg<E>[];
  next: () => K;
}

export interface CallFun<E, K> {
  family: "call";
  tag: "CallFun";
  type: ScalarType;
  name: string;
  args: FunArg<E>[];
  next: (result: E) => K;
}

export interface CallProc<E, K> {
  family: "call";
  tag: "CallProc";
  name: string;
  args: FunArg<E>[];
  next: () => K;
}

// ============================================================================
// Smart Constructors
// ============================================================================

/** Add an #include, e.g. "<math.h>" */
export function addInclude<E>(header: string): Program<E, void> {
  return step<E, void>({ family: "call", tag: "AddInclude", header, next: skip });
}

export function addDefinition<E>(definition: string): Program<E, void> {
  return step<E, void>({ family: "call", tag: "AddDefinition", definition, next: skip });
}

/** Declare an external function */
export function addExternFun<E>(name: string, resultType: ScalarType, args: FunArg<E>[]): Program<E, void> {
  return step<E, void>({ family: "call", tag: "AddExternFun", name, resultType, args, next: skip });
}

/** Declare an external procedure */
export function addExternProc<E>(name: string, args: FunArg<E>[]): Program<E, void> {
  return step<E, void>({ family: "call", tag: "AddExternProc", name, args, next: skip });
}

/** Call a function */
export function callFun<E>(type: ScalarType, name: string, args: FunArg<E>[]): Program<E, E> {
  return step<E, E>({ family: "call", tag: "CallFun", type, name, args, next: pure });
}

/** Call a procedure */
export function callProc<E>(name: string, args: FunArg<E>[]): Program<E, void> {
  return step<E, void>({ family: "call", tag: "CallProc", name, args, next: skip });
}
