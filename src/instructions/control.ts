/**
 * Structured control flow.
 */

import { Program, skip, step } from "../program/program";
import { IntegralType } from "../types";

// ============================================================================
// Index Ranges
// ============================================================================

export type Border<I> = { tag: "incl"; value: I } | { tag: "excl"; value: I };

export function incl<I>(value: I): Border<I> {
  return { tag: "incl", value };
}

export function excl<I>(value: I): Border<I> {
  return { tag: "excl", value };
}

export function borderVal<I>(border: Border<I>): I {
  return border.value;
}

export function borderIncl<I>(border: Border<I>): boolean {
  return border.tag === "incl";
}

/**
 * (start, step, bound): start index, step length, and a stop index that may
 * be inclusive or exclusive.
 */
export interface IxRange<I> {
  start: I;
  step: number;
  bound: Border<I>;
}

export function ixRange<I>(start: I, stepLength: number, bound: Border<I>): IxRange<I> {
  return { start, step: stepLength, bound };
}

export type LoopComparison = "<=" | ">=" | "<" | ">";

/**
 * The test that keeps a for loop going, from the sign of the step and the
 * inclusivity of the bound. Shared by the direct interpreter and the code
 * generator so both visit the same indices.
 */
export function loopComparison(stepLength: number, inclusive: boolean): LoopComparison {
  if (inclusive) return stepLength >= 0 ? "<=" : ">=";
  return stepLength >= 0 ? "<" : ">";
}

export function loopContinues(comparison: LoopComparison, index: number, bound: number): boolean {
  switch (comparison) {
    case "<=":
      return index <= bound;
    case ">=":
      return index >= bound;
    case "<":
      return index < bound;
    case ">":
      return index > bound;
  }
}

// ============================================================================
// Commands
// ============================================================================

export type ControlCmd<E, K> = If<E, K> | While<E, K> | For<E, K> | Break<K> | Assert<E, K>;

export interface If<E, K> {
  family: "control";
  tag: "If";
  cond: E;
  then: Program<E, void>;
  else: Program<E, void>;
  next: () => K;
}

/**
 * `cond` runs before every iteration, the first included.
 */
export interface While<E, K> {
  family: "control";
  tag: "While";
  cond: Program<E, E>;
  body: Program<E, void>;
  next: () => K;
}

export interface For<E, K> {
  family: "control";
  tag: "For";
  type: IntegralType;
  range: IxRange<E>;
  body: (index: E) => Program<E, void>;
  next: () => K;
}

export interface Break<K> {
  family: "control";
  tag: "Break";
  next: () => K;
}

export interface Assert<E, K> {
  family: "control";
  tag: "Assert";
  cond: E;
  message: string;
  next: () => K;
}

// ============================================================================
// Smart Constructors
// ============================================================================

/** Conditional statement */
export function iff<E>(cond: E, then: Program<E, void>, otherwise: Program<E, void>): Program<E, void> {
  return step<E, void>({ family: "control", tag: "If", cond, then, else: otherwise, next: skip });
}

/** Conditional statement without an else branch */
export function when<E>(cond: E, then: Program<E, void>): Program<E, void> {
  return iff(cond, then, skip<E>());
}

export function whileLoop<E>(cond: Program<E, E>, body: Program<E, void>): Program<E, void> {
  return step<E, void>({ family: "control", tag: "While", cond, body, next: skip });
}

export function forLoop<E>(
  type: IntegralType,
  range: IxRange<E>,
  body: (index: E) => Program<E, void>
): Program<E, void> {
  return step<E, void>({ family: "control", tag: "For", type, range, body, next: skip });
}

/** Leave the innermost loop (code generation only) */
export function breakLoop<E>(): Program<E, void> {
  return step<E, void>({ family: "control", tag: "Break", next: skip });
}

export function assert<E>(cond: E, message: string): Program<E, void> {
  return step<E, void>({ family: "control", tag: "Assert", cond, message, next: skip });
}
