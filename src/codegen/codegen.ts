/**
 * Codegen - compiles a program to a C translation unit.
 *
 * Generation runs twice over one NameSupply: a dry pass, a rewind, then the
 * generator proper. Both passes must issue the same names.
 */

import type winston from "winston";
import { NamingMismatchError, UnsupportedTypeError } from "../errors";
import { ExpLang } from "../exp/lang";
import { ArrCmd, symbolicArr } from "../instructions/arr";
import type { CallCmd, FunArg } from "../instructions/call";
import { ControlCmd, borderIncl, borderVal, loopComparison } from "../instructions/control";
import { C_MODES, FileCmd, Handle, isStandardHandle } from "../instructions/file";
import type { ObjectCmd } from "../instructions/object";
import { RefCmd, symbolicRef } from "../instructions/ref";
import { runDry } from "../interp/dry";
import { Interpreter } from "../interp/interpreter";
import { expectSymbolicArr, expectSymbolicHandle, expectSymbolicRef } from "../interp/representation";
import { getLogger } from "../logger";
import { NameSupply } from "../names";
import type { Program } from "../program/program";
import { IntegralType, ScalarType, scalarInfo, scanSpecifier } from "../types";
import { argList, paramList } from "./args";
import { CBlock, CModule, CStmt, cType, isEmptyBlock, pointerTo, printCType } from "./c-ast";
import { PrintOptions, cString, printModule } from "./c-printer";
import { CGenContext } from "./context";

/**
 * Options for code generation.
 */
export type CodegenOptions = {
  /** Indentation string (default: "  ") */
  indent?: string;
  /** Name of the generated function (default: "main") */
  functionName?: string;
  /** Supply to allocate names from (default: a fresh one) */
  names?: NameSupply;
};

export interface CodegenResult<A> {
  /** C source text */
  code: string;
  module: CModule;
  /** Names issued, in order */
  names: string[];
  /** The program's result, in symbolic form */
  value: A;
}

/**
 * Compile a program to C.
 */
export function generateC<E, A>(program: Program<E, A>, lang: ExpLang<E>, options: CodegenOptions = {}): CodegenResult<A> {
  const names = options.names ?? new NameSupply();
  const log = getLogger("codegen");
  const mark = names.mark();

  const dry = runDry(program, lang, { names });
  names.rewind(mark);

  log.debug("code generation started", { names: dry.names.length });
  const ctx = new CGenContext(names);
  const value = new CGenerator(lang, ctx, log).run(program);
  const generated = names.since(mark);

  if (!sameNames(dry.names, generated)) {
    throw new NamingMismatchError(dry.names, generated);
  }

  const module = ctx.finalize(options.functionName);
  const printOptions: PrintOptions = options.indent === undefined ? {} : { indent: options.indent };
  const code = printModule(module, printOptions);
  log.debug("code generation finished", { includes: module.includes.length, globals: module.globals.length });

  return { code, module, names: generated, value };
}

function sameNames(a: readonly string[], b: readonly string[]): boolean {
  return a.length === b.length && a.every((name, i) => name === b[i]);
}

/**
 * Leave identifiers and literals alone, parenthesize anything else.
 */
function guard(code: string): string {
  return /^-?[\w.]+$/.test(code) ? code : `(${code})`;
}

function loopUpdate(index: string, step: number): string {
  if (step === 1) return `${index}++`;
  if (step === -1) return `${index}--`;
  return step < 0 ? `${index} -= ${-step}` : `${index} += ${step}`;
}

/** Unsigned and sub-int indices would wrap in their own type */
function needsWideCounter(type: IntegralType): boolean {
  const info = scalarInfo(type);
  return info.kind === "unsigned" || info.bits < 32;
}

const STDIO = "<stdio.h>";

export class CGenerator<E> extends Interpreter<E> {
  constructor(
    private readonly lang: ExpLang<E>,
    private readonly ctx: CGenContext,
    log: winston.Logger
  ) {
    super(log);
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  /** Compile an expression, registering the headers it needs */
  private compile(exp: E): string {
    for (const header of this.lang.expHeaders(exp)) {
      this.ctx.addInclude(header);
    }
    return this.lang.compileExp(exp);
  }

  private args(args: FunArg<E>[]): string {
    return argList(args, (exp) => this.compile(exp));
  }

  private declared(type: ScalarType): ScalarType {
    if (!this.lang.represents(type)) throw new UnsupportedTypeError(type);
    return type;
  }

  /** Declare a fresh local of the type and return its name */
  private local(type: ScalarType, prefix: string = "v"): string {
    const name = this.ctx.freshName(prefix);
    this.ctx.addLocal({ type: this.ctx.useType(type), name });
    return name;
  }

  /** Fresh local assigned `value`, as an expression */
  private assigned(type: ScalarType, value: string): E {
    const name = this.local(type);
    this.assign(name, value);
    return this.lang.varExp(type, name);
  }

  private assign(target: string, value: string): void {
    this.ctx.addStm({ tag: "cAssign", target, value });
  }

  private statement(expr: string): void {
    this.ctx.addStm({ tag: "cExpr", expr });
  }

  private block(program: Program<E, void>): CBlock {
    return this.ctx.inBlock(() => this.run(program)).block;
  }

  private handle(handle: Handle): string {
    this.ctx.addInclude(STDIO);
    return expectSymbolicHandle(handle, "codegen").name;
  }

  // ==========================================================================
  // Families
  // ==========================================================================

  ref<K>(instr: RefCmd<E, K>): K {
    switch (instr.tag) {
      case "NewRef": {
        const type = this.declared(instr.type);
        return instr.next(symbolicRef(type, this.local(type)));
      }

      case "InitRef": {
        const type = this.declared(instr.type);
        const name = this.local(type);
        this.assign(name, this.compile(instr.value));
        return instr.next(symbolicRef(type, name));
      }

      case "GetRef": {
        const ref = expectSymbolicRef(instr.ref, "codegen");
        return instr.next(this.assigned(ref.type, ref.name));
      }

      case "SetRef":
        this.assign(expectSymbolicRef(instr.ref, "codegen").name, this.compile(instr.value));
        return instr.next();

      case "UnsafeFreezeRef": {
        const ref = expectSymbolicRef(instr.ref, "codegen");
        return instr.next(this.lang.varExp(ref.type, ref.name));
      }
    }
  }

  arr<K>(instr: ArrCmd<E, K>): K {
    switch (instr.tag) {
      case "NewArr": {
        const type = this.declared(instr.type);
        const name = this.ctx.freshName("a");
        this.ctx.addLocal({ type: this.ctx.useType(type), name, array: { size: this.compile(instr.size) } });
        return instr.next(symbolicArr(type, instr.indexType, name));
      }

      case "NewArr_": {
        const type = this.declared(instr.type);
        const name = this.ctx.freshName("a");
        this.ctx.addLocal({ type: pointerTo(this.ctx.useType(type)), name });
        return instr.next(symbolicArr(type, instr.indexType, name));
      }

      case "InitArr": {
        const type = this.declared(instr.type);
        const name = this.ctx.freshName("a");
        const values = instr.values.map((v) => this.compile(this.lang.litExp(type, v)));
        if (values.length === 0) {
          // C has no zero-length arrays
          this.ctx.addLocal({ type: pointerTo(this.ctx.useType(type)), name, init: "0" });
        } else {
          this.ctx.addLocal({ type: this.ctx.useType(type), name, array: { size: null }, init: `{${values.join(", ")}}` });
        }
        return instr.next(symbolicArr(type, instr.indexType, name));
      }

      case "GetArr": {
        const arr = expectSymbolicArr(instr.arr, "codegen");
        return instr.next(this.assigned(arr.type, `${arr.name}[${this.compile(instr.index)}]`));
      }

      case "SetArr": {
        const arr = expectSymbolicArr(instr.arr, "codegen");
        this.assign(`${arr.name}[${this.compile(instr.index)}]`, this.compile(instr.value));
        return instr.next();
      }

      case "CopyArr": {
        const dst = expectSymbolicArr(instr.dst, "codegen").name;
        const src = expectSymbolicArr(instr.src, "codegen").name;
        this.ctx.addInclude("<string.h>");
        this.statement(`memcpy(${dst}, ${src}, ${guard(this.compile(instr.count))} * sizeof(*${src}))`);
        return instr.next();
      }
    }
  }

  control<K>(instr: ControlCmd<E, K>): K {
    switch (instr.tag) {
      case "If": {
        const cond = this.compile(instr.cond);
        const then = this.block(instr.then);
        const otherwise = this.block(instr.else);
        this.ctx.addStm({ tag: "cIf", cond, then, else: isEmptyBlock(otherwise) ? null : otherwise });
        return instr.next();
      }

      case "While": {
        const { block: condBlock, value } = this.ctx.inBlock(() => this.run(instr.cond));
        const cond = this.compile(value);
        const body = this.block(instr.body);

        if (isEmptyBlock(condBlock)) {
          this.ctx.addStm({ tag: "cWhile", cond, body });
        } else {
          // The condition needs statements: test it at the top of an endless loop
          const exit: CStmt = { tag: "cIf", cond: `!(${cond})`, then: { decls: [], stmts: [{ tag: "cBreak" }] }, else: null };
          this.ctx.addStm({
            tag: "cWhile",
            cond: "1",
            body: {
              decls: [...condBlock.decls, ...body.decls],
              stmts: [...condBlock.stmts, exit, ...body.stmts],
            },
          });
        }
        return instr.next();
      }

      case "For": {
        const { type, range } = instr;
        const index = this.ctx.freshName("v");
        const start = this.compile(range.start);
        const bound = this.compile(borderVal(range.bound));
        const comparison = loopComparison(range.step, borderIncl(range.bound));
        const body = this.block(instr.body(this.lang.varExp(type, index)));

        if (!needsWideCounter(type)) {
          this.ctx.addStm({
            tag: "cFor",
            index: { type: this.ctx.useType(type), name: index },
            start,
            cond: `${index} ${comparison} ${guard(bound)}`,
            update: loopUpdate(index, range.step),
            body,
          });
          return instr.next();
        }

        // Count in int64_t so the counter cannot wrap before the test fails,
        // and give the body the index in its own type
        const counter = `${index}_ix`;
        const indexType = this.ctx.useType(type);
        const wide = this.ctx.useType("int64");
        this.ctx.addStm({
          tag: "cFor",
          index: { type: wide, name: counter },
          start,
          cond: `${counter} ${comparison} (${wide.base}) ${guard(bound)}`,
          update: loopUpdate(counter, range.step),
          body: {
            decls: [{ type: indexType, name: index, init: `(${indexType.base}) ${counter}` }, ...body.decls],
            stmts: body.stmts,
          },
        });
        return instr.next();
      }

      case "Break":
        this.ctx.addStm({ tag: "cBreak" });
        return instr.next();

      case "Assert":
        this.ctx.addInclude("<assert.h>");
        this.statement(`assert(${guard(this.compile(instr.cond))} && ${cString(instr.message)})`);
        return instr.next();
    }
  }

  file<K>(instr: FileCmd<E, K>): K {
    switch (instr.tag) {
      case "FOpen": {
        this.ctx.addInclude(STDIO);
        const name = this.ctx.freshName("h");
        this.ctx.addLocal({ type: cType("FILE", 1), name });
        this.assign(name, `fopen(${cString(instr.path)}, ${cString(C_MODES[instr.mode])})`);
        return instr.next({ kind: "symbolic", name });
      }

      case "FClose": {
        const handle = this.handle(instr.handle);
        if (!isStandardHandle(instr.handle)) {
          this.statement(`fclose(${handle})`);
        }
        return instr.next();
      }

      case "FEof": {
        const handle = this.handle(instr.handle);
        return instr.next(this.assigned("bool", `feof(${handle})`));
      }

      case "FPrintf": {
        const handle = this.handle(instr.handle);
        const args = instr.args.map((arg) => this.compile(arg.exp));
        this.statement(`fprintf(${[handle, cString(instr.format), ...args].join(", ")})`);
        return instr.next();
      }

      case "FGet": {
        const handle = this.handle(instr.handle);
        const name = this.local(instr.type);
        this.statement(`fscanf(${handle}, ${cString(scanSpecifier(instr.type))}, &${name})`);
        return instr.next(this.lang.varExp(instr.type, name));
      }
    }
  }

  object<K>(instr: ObjectCmd<E, K>): K {
    switch (instr.tag) {
      case "NewObject": {
        const name = this.ctx.freshName("obj");
        this.ctx.addLocal({ type: cType(instr.typeName, 1), name });
        return instr.next({ pointed: true, typeName: instr.typeName, id: name });
      }

      case "InitObject": {
        const name = this.ctx.freshName("obj");
        this.ctx.addLocal({ type: cType(instr.typeName, instr.pointed ? 1 : 0), name });
        this.assign(name, `${instr.functionName}(${this.args(instr.args)})`);
        return instr.next({ pointed: instr.pointed, typeName: instr.typeName, id: name });
      }
    }
  }

  call<K>(instr: CallCmd<E, K>): K {
    switch (instr.tag) {
      case "AddInclude":
        this.ctx.addInclude(instr.header);
        return instr.next();

      case "AddDefinition":
        this.ctx.addGlobal(instr.definition);
        return instr.next();

      case "AddExternFun": {
        const result = printCType(this.ctx.useType(instr.resultType));
        this.ctx.addGlobal(`${result} ${instr.name}(${paramList(instr.args, this.ctx)});`);
        return instr.next();
      }

      case "AddExternProc":
        this.ctx.addGlobal(`void ${instr.name}(${paramList(instr.args, this.ctx)});`);
        return instr.next();

      case "CallFun":
        return instr.next(this.assigned(instr.type, `${instr.name}(${this.args(instr.args)})`));

      case "CallProc":
        this.statement(`${instr.name}(${this.args(instr.args)})`);
        return instr.next();
    }
  }
}
