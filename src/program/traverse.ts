/**
 * Structural map over the sub-programs an instruction owns.
 *
 * Passes that need to look inside control-flow bodies go through here
 * instead of matching on every family themselves.
 */

import type { ControlCmd } from "../instructions/control";
import { Instr, Program } from "./program";

/**
 * Rewrites a sub-program without changing its result type.
 */
export type SubProgramTransformer<E> = <X>(program: Program<E, X>) => Program<E, X>;

/**
 * Rewrite every embedded sub-program of an instruction. Instructions of
 * families without sub-programs come back unchanged. A for-loop body is a
 * function of the index, so its transformation happens when the body is
 * applied.
 */
export function mapSubPrograms<E, K>(instr: Instr<E, K>, f: SubProgramTransformer<E>): Instr<E, K> {
  return instr.family === "control" ? mapControlSubPrograms(instr, f) : instr;
}

/**
 * mapSubPrograms for an instruction already known to be a control command.
 */
export function mapControlSubPrograms<E, K>(instr: ControlCmd<E, K>, f: SubProgramTransformer<E>): ControlCmd<E, K> {
  switch (instr.tag) {
    case "If":
      return { ...instr, then: f(instr.then), else: f(instr.else) };
    case "While":
      return { ...instr, cond: f(instr.cond), body: f(instr.body) };
    case "For": {
      const body = instr.body;
      return { ...instr, body: (index: E) => f(body(index)) };
    }
    case "Break":
    case "Assert":
      return instr;
  }
}

/**
 * Number of sub-programs an instruction owns.
 */
export function subProgramCount<E, K>(instr: Instr<E, K>): number {
  if (instr.family !== "control") return 0;

  switch (instr.tag) {
    case "If":
    case "While":
      return 2;
    case "For":
      return 1;
    case "Break":
    case "Assert":
      return 0;
  }
}
