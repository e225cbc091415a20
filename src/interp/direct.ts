/**
 * Direct interpreter.
 *
 * Executes a program on the host. References, arrays and file handles are
 * opaque ids into tables private to one run; they never leave it in a
 * usable form. File I/O blocks.
 */

import * as fs from "fs";
import type winston from "winston";
import {
  AssertionFailureError,
  ExpressionError,
  ImperativeError,
  IndexError,
  UninitializedReadError,
  UnsupportedOperationError,
  UnsupportedTypeError,
} from "../errors";
import { ExpLang } from "../exp/lang";
import type { Arr, ArrCmd } from "../instructions/arr";
import type { CallCmd } from "../instructions/call";
import { ControlCmd, borderIncl, borderVal, loopComparison, loopContinues } from "../instructions/control";
import { FileCmd, Handle, LiveHandle, isStandardHandle, stdin, stdout } from "../instructions/file";
import type { ObjectCmd } from "../instructions/object";
import type { Ref, RefCmd } from "../instructions/ref";
import { getLogger } from "../logger";
import type { Program } from "../program/program";
import { HostValue, ScalarType, coerceValue, parseScalar, toBool, toNumber, zeroValue } from "../types";
import { ByteSource, FdSink, FdSource, OutputSink, StringSource, openFlags, readWord } from "./io";
import { Interpreter } from "./interpreter";
import { formatPrintf } from "./printf";
import { expectLiveArr, expectLiveHandle, expectLiveRef } from "./representation";

export interface DirectOptions {
  /** Standard input: literal text or a byte source (default: fd 0) */
  stdin?: string | ByteSource;
  /** Standard output (default: fd 1) */
  stdout?: OutputSink;
}

interface Cell {
  type: ScalarType;
  value: HostValue | undefined;
}

interface ArrayStore {
  type: ScalarType;
  values: HostValue[];
}

interface OpenFile {
  path: string;
  fd: number;
  source: FdSource;
  sink: FdSink;
}

/**
 * Run a program directly.
 */
export function runDirect<E, A>(program: Program<E, A>, lang: ExpLang<E>, options: DirectOptions = {}): A {
  const log = getLogger("direct");
  const interpreter = new DirectInterpreter(lang, options, log);

  log.debug("direct run started");
  try {
    return interpreter.run(program);
  } finally {
    interpreter.release();
    log.debug("direct run finished");
  }
}

export class DirectInterpreter<E> extends Interpreter<E> {
  private readonly cells = new Map<number, Cell>();
  private readonly arrays = new Map<number, ArrayStore>();
  private readonly files = new Map<number, OpenFile>();
  private nextId = 0;

  private readonly input: ByteSource;
  private readonly output: OutputSink;

  constructor(
    private readonly lang: ExpLang<E>,
    options: DirectOptions,
    log: winston.Logger
  ) {
    super(log);
    const input = options.stdin ?? new FdSource(0);
    this.input = typeof input === "string" ? new StringSource(input) : input;
    this.output = options.stdout ?? new FdSink(1);
  }

  /**
   * Close every file the program left open.
   */
  release(): void {
    for (const [id, file] of this.files) {
      this.log.debug(`closing ${file.path} left open by the program`);
      this.files.delete(id);
      fs.closeSync(file.fd);
    }
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private allocate(): number {
    return this.nextId++;
  }

  private declared(type: ScalarType): ScalarType {
    if (!this.lang.represents(type)) throw new UnsupportedTypeError(type);
    return type;
  }

  private value(type: ScalarType, exp: E): HostValue {
    return coerceValue(type, this.lang.evalExp(exp));
  }

  private integer(exp: E): number {
    const n = toNumber(this.lang.evalExp(exp));
    if (!Number.isInteger(n)) throw new ExpressionError(`expected an integer, got ${n}`);
    return n;
  }

  private cell(ref: Ref): Cell {
    const { id } = expectLiveRef(ref, "direct");
    const cell = this.cells.get(id);
    if (!cell) throw new ImperativeError(`Unknown reference #${id}`);
    return cell;
  }

  private read(ref: Ref): E {
    const cell = this.cell(ref);
    if (cell.value === undefined) {
      throw new UninitializedReadError(ref.kind === "live" ? `#${ref.id}` : ref.name);
    }
    return this.lang.litExp(cell.type, cell.value);
  }

  private array(arr: Arr): ArrayStore {
    const { id } = expectLiveArr(arr, "direct");
    const store = this.arrays.get(id);
    if (!store) throw new ImperativeError(`Unknown array #${id}`);
    return store;
  }

  private index(store: ArrayStore, exp: E): number {
    const i = this.integer(exp);
    if (i < 0 || i >= store.values.length) throw new IndexError(i, store.values.length);
    return i;
  }

  private source(handle: Handle): ByteSource {
    if (handle.kind === "symbolic") {
      if (handle.name === stdin.name) return this.input;
      throw new ImperativeError(`Cannot read from ${handle.name}`);
    }
    return this.openFile(handle).source;
  }

  private sink(handle: Handle): OutputSink {
    if (handle.kind === "symbolic") {
      if (handle.name === stdout.name) return this.output;
      throw new ImperativeError(`Cannot write to ${handle.name}`);
    }
    return this.openFile(handle).sink;
  }

  private openFile(handle: LiveHandle): OpenFile {
    const file = this.files.get(handle.id);
    if (!file) throw new ImperativeError(`Handle #${handle.id} is not open`);
    return file;
  }

  // ==========================================================================
  // Families
  // ==========================================================================

  ref<K>(instr: RefCmd<E, K>): K {
    switch (instr.tag) {
      case "NewRef": {
        const id = this.allocate();
        this.cells.set(id, { type: this.declared(instr.type), value: undefined });
        return instr.next({ kind: "live", type: instr.type, id });
      }

      case "InitRef": {
        const id = this.allocate();
        this.cells.set(id, { type: this.declared(instr.type), value: this.value(instr.type, instr.value) });
        return instr.next({ kind: "live", type: instr.type, id });
      }

      case "GetRef":
      case "UnsafeFreezeRef":
        return instr.next(this.read(instr.ref));

      case "SetRef": {
        const cell = this.cell(instr.ref);
        cell.value = this.value(cell.type, instr.value);
        return instr.next();
      }
    }
  }

  arr<K>(instr: ArrCmd<E, K>): K {
    switch (instr.tag) {
      case "NewArr": {
        const size = this.integer(instr.size);
        if (size < 0) throw new ExpressionError(`negative array size ${size}`);
        const id = this.allocate();
        this.arrays.set(id, { type: this.declared(instr.type), values: new Array<HostValue>(size).fill(zeroValue(instr.type)) });
        return instr.next({ kind: "live", type: instr.type, indexType: instr.indexType, id });
      }

      case "NewArr_":
        throw new UnsupportedOperationError("NewArr_", "direct");

      case "InitArr": {
        const id = this.allocate();
        const type = this.declared(instr.type);
        this.arrays.set(id, { type, values: instr.values.map((v) => coerceValue(type, v)) });
        return instr.next({ kind: "live", type, indexType: instr.indexType, id });
      }

      case "GetArr": {
        const store = this.array(instr.arr);
        return instr.next(this.lang.litExp(store.type, store.values[this.index(store, instr.index)]));
      }

      case "SetArr": {
        const store = this.array(instr.arr);
        store.values[this.index(store, instr.index)] = this.value(store.type, instr.value);
        return instr.next();
      }

      case "CopyArr": {
        const dst = this.array(instr.dst);
        const src = this.array(instr.src);
        const count = this.integer(instr.count);
        if (count > src.values.length) throw new IndexError(count - 1, src.values.length);
        if (count > dst.values.length) throw new IndexError(count - 1, dst.values.length);
        for (let i = 0; i < count; i++) {
          dst.values[i] = coerceValue(dst.type, src.values[i]);
        }
        return instr.next();
      }
    }
  }

  control<K>(instr: ControlCmd<E, K>): K {
    switch (instr.tag) {
      case "If":
        this.run(toBool(this.lang.evalExp(instr.cond)) ? instr.then : instr.else);
        return instr.next();

      case "While":
        while (toBool(this.lang.evalExp(this.run(instr.cond)))) {
          this.run(instr.body);
        }
        return instr.next();

      case "For": {
        const { type, range } = instr;
        const start = this.integer(range.start);
        const bound = this.integer(borderVal(range.bound));
        const comparison = loopComparison(range.step, borderIncl(range.bound));
        for (let i = start; loopContinues(comparison, i, bound); i += range.step) {
          this.run(instr.body(this.lang.litExp(type, i)));
        }
        return instr.next();
      }

      case "Break":
        throw new UnsupportedOperationError("Break", "direct");

      case "Assert":
        if (!toBool(this.lang.evalExp(instr.cond))) throw new AssertionFailureError(instr.message);
        return instr.next();
    }
  }

  file<K>(instr: FileCmd<E, K>): K {
    switch (instr.tag) {
      case "FOpen": {
        const fd = fs.openSync(instr.path, openFlags(instr.mode));
        const id = this.allocate();
        this.files.set(id, { path: instr.path, fd, source: new FdSource(fd), sink: new FdSink(fd) });
        this.log.debug(`opened ${instr.path} (${instr.mode})`);
        return instr.next({ kind: "live", id });
      }

      case "FClose": {
        const { handle } = instr;
        if (isStandardHandle(handle)) return instr.next();
        const live = expectLiveHandle(handle, "direct");
        const file = this.openFile(live);
        this.files.delete(live.id);
        fs.closeSync(file.fd);
        return instr.next();
      }

      case "FEof":
        return instr.next(this.lang.litExp("bool", this.source(instr.handle).peek() === undefined));

      case "FPrintf": {
        const args = instr.args.map(({ type, exp }) => ({ type, value: this.value(type, exp) }));
        this.sink(instr.handle).write(formatPrintf(instr.format, args));
        return instr.next();
      }

      case "FGet": {
        const word = readWord(this.source(instr.handle));
        return instr.next(this.lang.litExp(instr.type, parseScalar(instr.type, word)));
      }
    }
  }

  object<K>(instr: ObjectCmd<E, K>): K {
    throw new UnsupportedOperationError(instr.tag, "direct");
  }

  call<K>(instr: CallCmd<E, K>): K {
    switch (instr.tag) {
      case "AddInclude":
      case "AddDefinition":
      case "AddExternFun":
      case "AddExternProc":
        return instr.next();

      case "CallFun":
      case "CallProc":
        throw new UnsupportedOperationError(instr.tag, "direct");
    }
  }
}
