/**
 * Programs over the instruction families.
 *
 * A program is a tree: a Step holds one instruction whose `next` continuation
 * receives the instruction's result, and a Bind chains two programs. Control
 * instructions own their sub-programs. Interpreters walk the tree; nothing
 * runs when a program is built.
 */

import type { ArrCmd } from "../instructions/arr";
import type { CallCmd } from "../instructions/call";
import type { ControlCmd } from "../instructions/control";
import type { FileCmd } from "../instructions/file";
import type { ObjectCmd } from "../instructions/object";
import type { RefCmd } from "../instructions/ref";

// ============================================================================
// Instruction Families
// ============================================================================

/**
 * Every family, keyed by the `family` tag its instructions carry.
 * E is the expression type, K the continuation type.
 */
export interface InstrFamilies<E, K> {
  ref: RefCmd<E, K>;
  arr: ArrCmd<E, K>;
  control: ControlCmd<E, K>;
  file: FileCmd<E, K>;
  object: ObjectCmd<E, K>;
  call: CallCmd<E, K>;
}

export type FamilyName = keyof InstrFamilies<unknown, unknown>;

export type Instr<E, K> = InstrFamilies<E, K>[FamilyName];

export type FamilyInstr<F extends FamilyName, E, K> = InstrFamilies<E, K>[F];

/**
 * One handler per family. Each interpreter implements this once; a handler
 * performs the instruction and hands its result to `next`.
 */
export interface FamilyHandlers<E> {
  ref<K>(instr: RefCmd<E, K>): K;
  arr<K>(instr: ArrCmd<E, K>): K;
  control<K>(instr: ControlCmd<E, K>): K;
  file<K>(instr: FileCmd<E, K>): K;
  object<K>(instr: ObjectCmd<E, K>): K;
  call<K>(instr: CallCmd<E, K>): K;
}

/**
 * Route an instruction to the handler of its family.
 */
export function dispatch<E, K>(instr: Instr<E, K>, handlers: FamilyHandlers<E>): K {
  switch (instr.family) {
    case "ref":
      return handlers.ref(instr);
    case "arr":
      return handlers.arr(instr);
    case "control":
      return handlers.control(instr);
    case "file":
      return handlers.file(instr);
    case "object":
      return handlers.object(instr);
    case "call":
      return handlers.call(instr);
  }
}

/**
 * Check whether an instruction belongs to a family.
 */
export function isFamily<F extends FamilyName, E, K>(
  instr: Instr<E, K>,
  family: F
): instr is FamilyInstr<F, E, K> {
  return instr.family === family;
}

/**
 * The instruction as a member of the family, or undefined.
 */
export function project<F extends FamilyName, E, K>(
  instr: Instr<E, K>,
  family: F
): FamilyInstr<F, E, K> | undefined {
  return isFamily(instr, family) ? instr : undefined;
}

// ============================================================================
// Programs
// ============================================================================

export type Program<E, A> = Pure<A> | Step<E, A> | Bind<E, A>;

export interface Pure<A> {
  tag: "pure";
  value: A;
}

export interface Step<E, A> {
  tag: "step";
  instr: Instr<E, Program<E, A>>;
}

/**
 * `source` followed by `next`. The intermediate result type is hidden; an
 * interpreter recovers it by calling `unbind`.
 */
export interface Bind<E, A> {
  tag: "bind";
  unbind<R>(use: <X>(source: Program<E, X>, next: (x: X) => Program<E, A>) => R): R;
}

export function pure<A>(value: A): Pure<A> {
  return { tag: "pure", value };
}

/** The program that does nothing */
export function skip<E>(): Program<E, void> {
  return pure(undefined);
}

/**
 * Lift one instruction into a program.
 */
export function step<E, A>(instr: Instr<E, Program<E, A>>): Program<E, A> {
  return { tag: "step", instr };
}

export function bind<E, A, B>(source: Program<E, A>, next: (a: A) => Program<E, B>): Program<E, B> {
  return {
    tag: "bind",
    unbind<R>(use: <X>(source: Program<E, X>, next: (x: X) => Program<E, B>) => R): R {
      return use(source, next);
    },
  };
}

export function map<E, A, B>(source: Program<E, A>, f: (a: A) => B): Program<E, B> {
  return bind(source, (a) => pure(f(a)));
}

/**
 * Run `first`, discard its result, then run `second`.
 */
export function seq<E, B>(first: Program<E, unknown>, second: Program<E, B>): Program<E, B> {
  return bind(first, () => second);
}

/**
 * Run programs in order.
 */
export function sequence<E>(programs: Program<E, unknown>[]): Program<E, void> {
  return programs.reduceRight<Program<E, void>>((rest, program) => seq(program, rest), skip<E>());
}

/**
 * Run `body` for every element, in order.
 */
export function forEach<E, T>(items: readonly T[], body: (item: T, index: number) => Program<E, unknown>): Program<E, void> {
  return sequence(items.map(body));
}
