/**
 * Shared program walker. Subclasses supply one handler per family.
 */

import type winston from "winston";
import type { ArrCmd } from "../instructions/arr";
import type { CallCmd } from "../instructions/call";
import type { ControlCmd } from "../instructions/control";
import type { FileCmd } from "../instructions/file";
import type { ObjectCmd } from "../instructions/object";
import type { RefCmd } from "../instructions/ref";
import { FamilyHandlers, Program, dispatch } from "../program/program";

export abstract class Interpreter<E> implements FamilyHandlers<E> {
  constructor(protected readonly log: winston.Logger) {}

  /**
   * Run a program to its result. Steps are handled in a loop; only binds and
   * sub-programs recurse.
   */
  run<A>(program: Program<E, A>): A {
    let current: Program<E, A> = program;
    for (;;) {
      switch (current.tag) {
        case "pure":
          return current.value;

        case "step":
          if (this.log.isLevelEnabled("silly")) {
            this.log.silly(`${current.instr.family}.${current.instr.tag}`);
          }
          current = dispatch(current.instr, this);
          break;

        case "bind":
          current = current.unbind<Program<E, A>>((source, next) => next(this.run(source)));
          break;
      }
    }
  }

  abstract ref<K>(instr: RefCmd<E, K>): K;
  abstract arr<K>(instr: ArrCmd<E, K>): K;
  abstract control<K>(instr: ControlCmd<E, K>): K;
  abstract file<K>(instr: FileCmd<E, K>): K;
  abstract object<K>(instr: ObjectCmd<E, K>): K;
  abstract call<K>(instr: CallCmd<E, K>): K;
}
