/**
 * C Pretty-Printer
 *
 * Converts the C AST to source text. Purely mechanical formatting; every
 * semantic decision was made by the generator.
 */

import { CBlock, CDecl, CFunction, CModule, CStmt, printCType } from "./c-ast";
import { CodeBuilder } from "./code-builder";

// ============================================================================
// Options
// ============================================================================

export interface PrintOptions {
  /** Indentation string (default: "  ") */
  indent?: string;
}

const defaultOptions: Required<PrintOptions> = {
  indent: "  ",
};

// ============================================================================
// Main Entry Points
// ============================================================================

/**
 * Print a module: includes, then globals, then functions, separated by blank
 * lines.
 */
export function printModule(mod: CModule, options: PrintOptions = {}): string {
  const opts = { ...defaultOptions, ...options };
  const sections: string[] = [];

  if (mod.includes.length > 0) {
    sections.push(mod.includes.map((header) => `#include ${header}\n`).join(""));
  }
  if (mod.globals.length > 0) {
    sections.push(mod.globals.map((global) => `${global}\n`).join(""));
  }
  for (const fn of mod.functions) {
    sections.push(printFunction(fn, opts));
  }

  return sections.join("\n");
}

export function printFunction(fn: CFunction, options: PrintOptions = {}): string {
  const opts = { ...defaultOptions, ...options };
  const out = new CodeBuilder(opts.indent);

  out.block(`${printCType(fn.returnType)} ${fn.name}(${fn.params})`, () => {
    writeBlock(out, fn.body);
    if (fn.result !== null) {
      out.writeLine(`return ${fn.result};`);
    }
  });
  return out.build();
}

// ============================================================================
// Declarations
// ============================================================================

/** `FILE *h0`, `int32_t v0` */
export function printDeclarator(decl: Pick<CDecl, "type" | "name">): string {
  const { type, name } = decl;
  return type.pointers === 0 ? `${type.base} ${name}` : `${type.base} ${"*".repeat(type.pointers)}${name}`;
}

export function printDecl(decl: CDecl): string {
  let text = printDeclarator(decl);
  if (decl.array) {
    text += `[${decl.array.size ?? ""}]`;
  }
  if (decl.init !== undefined) {
    text += ` = ${decl.init}`;
  }
  return `${text};`;
}

// ============================================================================
// Statements
// ============================================================================

function writeBlock(out: CodeBuilder, block: CBlock): void {
  for (const decl of block.decls) {
    out.writeLine(printDecl(decl));
  }
  for (const stmt of block.stmts) {
    writeStmt(out, stmt);
  }
}

function writeStmt(out: CodeBuilder, stmt: CStmt): void {
  switch (stmt.tag) {
    case "cAssign":
      out.writeLine(`${stmt.target} = ${stmt.value};`);
      return;

    case "cExpr":
      out.writeLine(`${stmt.expr};`);
      return;

    case "cIf": {
      const otherwise = stmt.else;
      if (otherwise === null) {
        out.block(`if (${stmt.cond})`, () => writeBlock(out, stmt.then));
        return;
      }
      out.writeLine(`if (${stmt.cond}) {`).indent();
      writeBlock(out, stmt.then);
      out.dedent().writeLine("} else {").indent();
      writeBlock(out, otherwise);
      out.dedent().writeLine("}");
      return;
    }

    case "cWhile":
      out.block(`while (${stmt.cond})`, () => writeBlock(out, stmt.body));
      return;

    case "cFor":
      out.block(`for (${printDeclarator(stmt.index)} = ${stmt.start}; ${stmt.cond}; ${stmt.update})`, () =>
        writeBlock(out, stmt.body)
      );
      return;

    case "cBreak":
      out.writeLine("break;");
      return;
  }
}

// ============================================================================
// Literals
// ============================================================================

/**
 * C string literal. Control characters become octal escapes.
 */
export function cString(value: string): string {
  let out = '"';
  for (const ch of value) {
    switch (ch) {
      case "\\":
        out += "\\\\";
        break;
      case '"':
        out += '\\"';
        break;
      case "\n":
        out += "\\n";
        break;
      case "\t":
        out += "\\t";
        break;
      case "\r":
        out += "\\r";
        break;
      default: {
        const code = ch.charCodeAt(0);
        out += code < 0x20 || code === 0x7f ? `\\${code.toString(8).padStart(3, "0")}` : ch;
      }
    }
  }
  return `${out}"`;
}
