/**
 * Mutable arrays.
 *
 * The index type is kept on the array even though any integral type would
 * do for indexing: it fixes the type of index expressions and of the size.
 */

import { Program, pure, skip, step } from "../program/program";
import { HostValue, IntegralType, ScalarType } from "../types";

// ============================================================================
// Representation
// ============================================================================

export type Arr = SymbolicArr | LiveArr;

export interface SymbolicArr {
  kind: "symbolic";
  type: ScalarType;
  indexType: IntegralType;
  name: string;
}

export interface LiveArr {
  kind: "live";
  type: ScalarType;
  indexType: IntegralType;
  id: number;
}

export function symbolicArr(type: ScalarType, indexType: IntegralType, name: string): SymbolicArr {
  return { kind: "symbolic", type, indexType, name };
}

// ============================================================================
// Commands
// ============================================================================

export type ArrCmd<E, K> =
  | NewArr<E, K>
  | NewArrUnsized<K>
  | InitArr<K>
  | GetArr<E, K>
  | SetArr<E, K>
  | CopyArr<E, K>;

export interface NewArr<E, K> {
  family: "arr";
  tag: "NewArr";
  type: ScalarType;
  indexType: IntegralType;
  size: E;
  next: (arr: Arr) => K;
}

/** Array whose size is fixed later by generated code */
export interface NewArrUnsized<K> {
  family: "arr";
  tag: "NewArr_";
  type: ScalarType;
  indexType: IntegralType;
  next: (arr: Arr) => K;
}

export interface InitArr<K> {
  family: "arr";
  tag: "InitArr";
  type: ScalarType;
  indexType: IntegralType;
  values: HostValue[];
  next: (arr: Arr) => K;
}

export interface GetArr<E, K> {
  family: "arr";
  tag: "GetArr";
  index: E;
  arr: Arr;
  next: (value: E) => K;
}

export interface SetArr<E, K> {
  family: "arr";
  tag: "SetArr";
  index: E;
  value: E;
  arr: Arr;
  next: () => K;
}

/** dst[i] := src[i] for i in [0, count) */
export interface CopyArr<E, K> {
  family: "arr";
  tag: "CopyArr";
  dst: Arr;
  src: Arr;
  count: E;
  next: () => K;
}

// ============================================================================
// Smart Constructors
// ============================================================================

/** Create an array of the given size; contents are unspecified */
export function newArr<E>(type: ScalarType, size: E, indexType: IntegralType = "int32"): Program<E, Arr> {
  return step<E, Arr>({ family: "arr", tag: "NewArr", type, indexType, size, next: pure });
}

/** Create an array without a size (code generation only) */
export function newArr_<E>(type: ScalarType, indexType: IntegralType = "int32"): Program<E, Arr> {
  return step<E, Arr>({ family: "arr", tag: "NewArr_", type, indexType, next: pure });
}

/** Create an array holding `values` */
export function initArr<E>(type: ScalarType, values: HostValue[], indexType: IntegralType = "int32"): Program<E, Arr> {
  return step<E, Arr>({ family: "arr", tag: "InitArr", type, indexType, values, next: pure });
}

/** Get an element of an array */
export function getArr<E>(index: E, arr: Arr): Program<E, E> {
  return step<E, E>({ family: "arr", tag: "GetArr", index, arr, next: pure });
}

/** Set an element of an array */
export function setArr<E>(index: E, value: E, arr: Arr): Program<E, void> {
  return step<E, void>({ family: "arr", tag: "SetArr", index, value, arr, next: skip });
}

/** Copy the first `count` elements of `src` into `dst` */
export function copyArr<E>(dst: Arr, src: Arr, count: E): Program<E, void> {
  return step<E, void>({ family: "arr", tag: "CopyArr", dst, src, count, next: skip });
}
