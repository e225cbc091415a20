/**
 * Opaque foreign objects. Code generation only.
 */

import { Program, pure, step } from "../program/program";
import type { FunArg } from "./call";

export interface ObjectHandle {
  pointed: boolean;
  typeName: string;
  id: string;
}

export function objectEquals(a: ObjectHandle, b: ObjectHandle): boolean {
  return a.pointed === b.pointed && a.typeName === b.typeName && a.id === b.id;
}

/**
 * Order by (pointed, typeName, id); unpointed objects come first.
 */
export function compareObjects(a: ObjectHandle, b: ObjectHandle): number {
  if (a.pointed !== b.pointed) return a.pointed ? 1 : -1;
  if (a.typeName !== b.typeName) return a.typeName < b.typeName ? -1 : 1;
  if (a.id !== b.id) return a.id < b.id ? -1 : 1;
  return 0;
}

// ============================================================================
// Commands
// ============================================================================

export type ObjectCmd<E, K> = NewObject<K> | InitObject<E, K>;

export interface NewObject<K> {
  family: "object";
  tag: "NewObject";
  typeName: string;
  next: (object: ObjectHandle) => K;
}

/**
 * Object produced by calling a constructor function.
 */
export interface InitObject<E, K> {
  family: "object";
  tag: "InitObject";
  functionName: string;
  pointed: boolean;
  typeName: string;
  args: FunArg<E>[];
  next: (object: ObjectHandle) => K;
}

// ============================================================================
// Smart Constructors
// ============================================================================

export function newObject<E>(typeName: string): Program<E, ObjectHandle> {
  return step<E, ObjectHandle>({ family: "object", tag: "NewObject", typeName, next: pure });
}

export function initObject<E>(
  functionName: string,
  pointed: boolean,
  typeName: string,
  args: FunArg<E>[]
): Program<E, ObjectHandle> {
  return step<E, ObjectHandle>({ family: "object", tag: "InitObject", functionName, pointed, typeName, args, next: pure });
}
