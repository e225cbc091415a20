/**
 * Mutable references.
 */

import { Program, bind, pure, skip, step } from "../program/program";
import { ScalarType } from "../types";

// ============================================================================
// Representation
// ============================================================================

/**
 * A reference is either a name (dry run, code generation) or an opaque id
 * into the direct interpreter's cell table. It never changes kind.
 */
export type Ref = SymbolicRef | LiveRef;

export interface SymbolicRef {
  kind: "symbolic";
  type: ScalarType;
  name: string;
}

export interface LiveRef {
  kind: "live";
  type: ScalarType;
  id: number;
}

export function symbolicRef(type: ScalarType, name: string): SymbolicRef {
  return { kind: "symbolic", type, name };
}

// ============================================================================
// Commands
// ============================================================================

export type RefCmd<E, K> = NewRef<K> | InitRef<E, K> | GetRef<E, K> | SetRef<E, K> | UnsafeFreezeRef<E, K>;

/** Uninitialised reference */
export interface NewRef<K> {
  family: "ref";
  tag: "NewRef";
  type: ScalarType;
  next: (ref: Ref) => K;
}

export interface InitRef<E, K> {
  family: "ref";
  tag: "InitRef";
  type: ScalarType;
  value: E;
  next: (ref: Ref) => K;
}

export interface GetRef<E, K> {
  family: "ref";
  tag: "GetRef";
  ref: Ref;
  next: (value: E) => K;
}

export interface SetRef<E, K> {
  family: "ref";
  tag: "SetRef";
  ref: Ref;
  value: E;
  next: () => K;
}

/**
 * Read without copying into a fresh variable. Only sound when the reference
 * is not written afterwards.
 */
export interface UnsafeFreezeRef<E, K> {
  family: "ref";
  tag: "UnsafeFreezeRef";
  ref: Ref;
  next: (value: E) => K;
}

// ============================================================================
// Smart Constructors
// ============================================================================

/** Create an uninitialised reference */
export function newRef<E>(type: ScalarType): Program<E, Ref> {
  return step<E, Ref>({ family: "ref", tag: "NewRef", type, next: pure });
}

/** Create a reference holding `value` */
export function initRef<E>(type: ScalarType, value: E): Program<E, Ref> {
  return step<E, Ref>({ family: "ref", tag: "InitRef", type, value, next: pure });
}

/** Get the contents of a reference */
export function getRef<E>(ref: Ref): Program<E, E> {
  return step<E, E>({ family: "ref", tag: "GetRef", ref, next: pure });
}

/** Set the contents of a reference */
export function setRef<E>(ref: Ref, value: E): Program<E, void> {
  return step<E, void>({ family: "ref", tag: "SetRef", ref, value, next: skip });
}

/** Apply a function to the contents of a reference */
export function modifyRef<E>(ref: Ref, f: (value: E) => E): Program<E, void> {
  return bind(getRef<E>(ref), (value) => setRef(ref, f(value)));
}

/** Freeze the contents of a reference */
export function unsafeFreezeRef<E>(ref: Ref): Program<E, E> {
  return step<E, E>({ family: "ref", tag: "UnsafeFreezeRef", ref, next: pure });
}
