/**
 * Dry interpreter.
 *
 * Walks a program without performing any effect. Every instruction that
 * introduces a named entity gets the next name from the run's NameSupply and
 * returns a symbolic result. The code generator issues names in exactly this
 * order, which is what lets it run after a dry pass on the same supply.
 */

import type winston from "winston";
import { UnsupportedTypeError } from "../errors";
import { ExpLang } from "../exp/lang";
import type { ArrCmd } from "../instructions/arr";
import { symbolicArr } from "../instructions/arr";
import type { CallCmd } from "../instructions/call";
import type { ControlCmd } from "../instructions/control";
import type { FileCmd } from "../instructions/file";
import { symbolicHandle } from "../instructions/file";
import type { ObjectCmd } from "../instructions/object";
import type { RefCmd } from "../instructions/ref";
import { symbolicRef } from "../instructions/ref";
import { getLogger } from "../logger";
import { NameSupply } from "../names";
import { Program, pure } from "../program/program";
import { SubProgramTransformer, mapControlSubPrograms } from "../program/traverse";
import { ScalarType } from "../types";
import { Interpreter } from "./interpreter";
import { expectSymbolicArr, expectSymbolicHandle, expectSymbolicRef } from "./representation";

export interface DryRunOptions {
  /** Supply to allocate from (default: a fresh one) */
  names?: NameSupply;
}

export interface DryRunResult<A> {
  value: A;
  /** Names issued by this run, in order */
  names: string[];
}

/**
 * Dry-run a program.
 */
export function runDry<E, A>(program: Program<E, A>, lang: ExpLang<E>, options: DryRunOptions = {}): DryRunResult<A> {
  const names = options.names ?? new NameSupply();
  const mark = names.mark();
  const log = getLogger("dry");

  log.debug("dry run started");
  const value = new DryInterpreter(lang, names, log).run(program);
  const issued = names.since(mark);
  log.debug("dry run finished", { names: issued.length });

  return { value, names: issued };
}

export class DryInterpreter<E> extends Interpreter<E> {
  constructor(
    private readonly lang: ExpLang<E>,
    private readonly names: NameSupply,
    log: winston.Logger
  ) {
    super(log);
  }

  /** Runs a sub-program on the spot and keeps only its result */
  private readonly walk: SubProgramTransformer<E> = (program) => pure(this.run(program));

  private fresh(prefix: string): string {
    return this.names.fresh(prefix);
  }

  private variable(type: ScalarType): E {
    return this.lang.varExp(type, this.fresh("v"));
  }

  private declared(type: ScalarType): ScalarType {
    if (!this.lang.represents(type)) throw new UnsupportedTypeError(type);
    return type;
  }

  // ==========================================================================
  // Families
  // ==========================================================================

  ref<K>(instr: RefCmd<E, K>): K {
    switch (instr.tag) {
      case "NewRef":
      case "InitRef":
        return instr.next(symbolicRef(this.declared(instr.type), this.fresh("v")));

      case "GetRef":
        expectSymbolicRef(instr.ref, "dry");
        return instr.next(this.variable(instr.ref.type));

      case "SetRef":
        expectSymbolicRef(instr.ref, "dry");
        return instr.next();

      case "UnsafeFreezeRef": {
        // No fresh name: the frozen value is the reference's own variable
        const ref = expectSymbolicRef(instr.ref, "dry");
        return instr.next(this.lang.varExp(ref.type, ref.name));
      }
    }
  }

  arr<K>(instr: ArrCmd<E, K>): K {
    switch (instr.tag) {
      case "NewArr":
      case "NewArr_":
      case "InitArr":
        return instr.next(symbolicArr(this.declared(instr.type), instr.indexType, this.fresh("a")));

      case "GetArr": {
        const arr = expectSymbolicArr(instr.arr, "dry");
        return instr.next(this.variable(arr.type));
      }

      case "SetArr":
        expectSymbolicArr(instr.arr, "dry");
        return instr.next();

      case "CopyArr":
        expectSymbolicArr(instr.dst, "dry");
        expectSymbolicArr(instr.src, "dry");
        return instr.next();
    }
  }

  control<K>(instr: ControlCmd<E, K>): K {
    const walked = mapControlSubPrograms(instr, this.walk);
    if (walked.tag === "For") {
      // The index name comes before anything the body allocates
      walked.body(this.variable(walked.type));
    }
    return walked.next();
  }

  file<K>(instr: FileCmd<E, K>): K {
    switch (instr.tag) {
      case "FOpen":
        return instr.next(symbolicHandle(this.fresh("h")));

      case "FClose":
      case "FPrintf":
        expectSymbolicHandle(instr.handle, "dry");
        return instr.next();

      case "FEof":
        expectSymbolicHandle(instr.handle, "dry");
        return instr.next(this.variable("bool"));

      case "FGet":
        expectSymbolicHandle(instr.handle, "dry");
        return instr.next(this.variable(instr.type));
    }
  }

  object<K>(instr: ObjectCmd<E, K>): K {
    switch (instr.tag) {
      case "NewObject":
        return instr.next({ pointed: true, typeName: instr.typeName, id: this.fresh("obj") });

      case "InitObject":
        return instr.next({ pointed: instr.pointed, typeName: instr.typeName, id: this.fresh("obj") });
    }
  }

  call<K>(instr: CallCmd<E, K>): K {
    switch (instr.tag) {
      case "CallFun":
        return instr.next(this.variable(instr.type));

      case "AddInclude":
      case "AddDefinition":
      case "AddExternFun":
      case "AddExternProc":
      case "CallProc":
        return instr.next();
    }
  }
}
