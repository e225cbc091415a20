/**
 * Code-generation context.
 *
 * Accumulates the includes, globals and the current block while the generator
 * walks a program. Nested blocks are collected with inBlock().
 */

import { NameSupply } from "../names";
import { ScalarType, scalarInfo } from "../types";
import { CBlock, CDecl, CFunction, CModule, CStmt, CType, cType, emptyBlock } from "./c-ast";

export class CGenContext {
  private readonly includes = new Set<string>();
  private readonly globals: string[] = [];
  private block: CBlock = emptyBlock();

  constructor(private readonly names: NameSupply) {}

  freshName(prefix: string): string {
    return this.names.fresh(prefix);
  }

  /** Register a header; repeats are ignored */
  addInclude(header: string): void {
    this.includes.add(header);
  }

  addGlobal(text: string): void {
    this.globals.push(text);
  }

  addLocal(decl: CDecl): void {
    this.block.decls.push(decl);
  }

  addStm(stmt: CStmt): void {
    this.block.stmts.push(stmt);
  }

  /**
   * Run `f` with a fresh current block and return what it collected. The
   * enclosing block is restored afterwards, also when `f` throws.
   */
  inBlock<T>(f: () => T): { block: CBlock; value: T } {
    const saved = this.block;
    this.block = emptyBlock();
    try {
      const value = f();
      return { block: this.block, value };
    } finally {
      this.block = saved;
    }
  }

  /**
   * C storage type of a scalar, registering its header.
   */
  useType(type: ScalarType): CType {
    const info = scalarInfo(type);
    if (info.header !== null) {
      this.addInclude(info.header);
    }
    return cType(info.cType);
  }

  /**
   * Wrap everything emitted at top level into a module with one function,
   * `int name(void)` returning 0.
   */
  finalize(name: string = "main"): CModule {
    const fn: CFunction = {
      returnType: cType("int"),
      name,
      params: "void",
      body: this.block,
      result: "0",
    };
    return {
      includes: [...this.includes],
      globals: [...this.globals],
      functions: [fn],
    };
  }
}
