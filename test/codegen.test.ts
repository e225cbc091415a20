/**
 * Tests for C code generation.
 */
import { describe, it, expect } from "vitest";

import {
  CGenContext,
  CodegenError,
  Expr,
  IxRange,
  NameSupply,
  NamingMismatchError,
  Program,
  add,
  addDefinition,
  addExternFun,
  addExternProc,
  addInclude,
  addr,
  arrArg,
  assert,
  bind,
  bool,
  breakLoop,
  callFun,
  callProc,
  copyArr,
  cString,
  compareObjects,
  deref,
  double,
  excl,
  exprLang,
  fclose,
  feof,
  fget,
  fopen,
  forLoop,
  fput,
  generateC,
  getArr,
  getRef,
  gt,
  handleArg,
  iff,
  incl,
  initArr,
  initObject,
  initRef,
  int32,
  ixRange,
  lit,
  lt,
  mod,
  modifyRef,
  newArr,
  newArr_,
  newObject,
  newRef,
  objArg,
  objectEquals,
  printf,
  printfArg,
  pure,
  refArg,
  runDry,
  seq,
  sequence,
  setArr,
  skip,
  stdout,
  strArg,
  unsafeFreezeRef,
  valArg,
  when,
  whileLoop,
  word32,
} from "../src";

function lines(program: Program<Expr, unknown>): string[] {
  return generateC(program, exprLang).code.split("\n");
}

describe("generateC", () => {
  describe("references", () => {
    it("declares, assigns and copies", () => {
      const program = bind(initRef<Expr>("int32", int32(5)), (r) => bind(getRef<Expr>(r), (x) => modifyRef<Expr>(r, () => add(x, int32(1)))));
      expect(generateC(program, exprLang).code).toBe(
        [
          "#include <stdint.h>",
          "",
          "int main(void) {",
          "  int32_t v0;",
          "  int32_t v1;",
          "  int32_t v2;",
          "  v0 = 5;",
          "  v1 = v0;",
          "  v2 = v0;",
          "  v0 = v1 + 1;",
          "  return 0;",
          "}",
          "",
        ].join("\n")
      );
    });

    it("declares uninitialised references without assigning them", () => {
      expect(lines(newRef<Expr>("double"))).toEqual(["int main(void) {", "  double v0;", "  return 0;", "}", ""]);
    });

    it("freezes a reference without copying it", () => {
      const program = bind(initRef<Expr>("int32", int32(4)), (r) =>
        bind(unsafeFreezeRef<Expr>(r), (x) => printf<Expr>("%d", [printfArg("int32", x)]))
      );
      const result = generateC(program, exprLang);
      expect(result.names).toEqual(["v0"]);
      expect(result.code.split("\n")).toContain('  fprintf(stdout, "%d", v0);');
    });
  });

  describe("arrays", () => {
    const program = bind(newArr<Expr>("double", int32(4)), (a) =>
      bind(initArr<Expr>("int32", [1, 2, 3]), (b) =>
        sequence<Expr>([setArr<Expr>(int32(0), double(1.5), a), copyArr<Expr>(b, b, add(int32(1), int32(1))), getArr<Expr>(int32(1), b), newArr_<Expr>("int32")])
      )
    );

    it("declares arrays before any statement", () => {
      expect(lines(program).slice(0, 10)).toEqual([
        "#include <stdint.h>",
        "#include <string.h>",
        "",
        "int main(void) {",
        "  double a0[4];",
        "  int32_t a1[] = {1, 2, 3};",
        "  int32_t v2;",
        "  int32_t *a3;",
        "  a0[0] = 1.5;",
        "  memcpy(a1, a1, (1 + 1) * sizeof(*a1));",
      ]);
    });

    it("declares an empty array as a null pointer", () => {
      expect(lines(initArr<Expr>("int32", []))).toEqual([
        "#include <stdint.h>",
        "",
        "int main(void) {",
        "  int32_t *a0 = 0;",
        "  return 0;",
        "}",
        "",
      ]);
    });

    it("reads elements into fresh variables", () => {
      expect(lines(program)).toContain("  v2 = a1[1];");
    });
  });

  describe("control flow", () => {
    function loopHeader(range: IxRange<Expr>): string | undefined {
      const program = forLoop<Expr>("int32", range, (i) => printf<Expr>("%d\n", [printfArg("int32", i)]));
      return lines(program).find((line) => line.trimStart().startsWith("for"));
    }

    it("compiles a for loop", () => {
      const program = forLoop<Expr>("int32", ixRange(int32(0), 1, excl(int32(5))), (i) => printf<Expr>("%d\n", [printfArg("int32", i)]));
      expect(generateC(program, exprLang).code).toBe(
        [
          "#include <stdio.h>",
          "#include <stdint.h>",
          "",
          "int main(void) {",
          "  for (int32_t v0 = 0; v0 < 5; v0++) {",
          '    fprintf(stdout, "%d\\n", v0);',
          "  }",
          "  return 0;",
          "}",
          "",
        ].join("\n")
      );
    });

    it("picks the loop test from the step and the bound", () => {
      expect(loopHeader(ixRange(int32(5), -1, incl(int32(0))))).toBe("  for (int32_t v0 = 5; v0 >= 0; v0--) {");
      expect(loopHeader(ixRange(int32(0), 2, incl(int32(4))))).toBe("  for (int32_t v0 = 0; v0 <= 4; v0 += 2) {");
      expect(loopHeader(ixRange(int32(10), -3, excl(int32(0))))).toBe("  for (int32_t v0 = 10; v0 > 0; v0 -= 3) {");
    });

    it("counts unsigned indices in a wide signed counter", () => {
      const program = forLoop<Expr>("word32", ixRange(word32(3), -1, incl(word32(0))), (i) =>
        printf<Expr>("%u ", [printfArg("word32", i)])
      );
      const result = generateC(program, exprLang);
      expect(result.names).toEqual(["v0"]);
      expect(result.code).toBe(
        [
          "#include <stdio.h>",
          "#include <stdint.h>",
          "",
          "int main(void) {",
          "  for (int64_t v0_ix = 3u; v0_ix >= (int64_t) 0u; v0_ix--) {",
          "    uint32_t v0 = (uint32_t) v0_ix;",
          '    fprintf(stdout, "%u ", v0);',
          "  }",
          "  return 0;",
          "}",
          "",
        ].join("\n")
      );
    });

    it("counts narrow indices in a wide signed counter", () => {
      const program = forLoop<Expr>("int8", ixRange(lit("int8", 120), 5, incl(lit("int8", 127))), (i) =>
        printf<Expr>("%d ", [printfArg("int8", i)])
      );
      const code = lines(program);
      expect(code).toContain("  for (int64_t v0_ix = 120; v0_ix <= (int64_t) 127; v0_ix += 5) {");
      expect(code).toContain("    int8_t v0 = (int8_t) v0_ix;");
    });

    it("parenthesizes compound bounds", () => {
      expect(loopHeader(ixRange<Expr>(int32(0), 1, excl(add(int32(2), int32(3)))))).toBe("  for (int32_t v0 = 0; v0 < (2 + 3); v0++) {");
    });

    it("omits an empty else branch", () => {
      const program = bind(initRef<Expr>("int32", int32(1)), (r) =>
        bind(getRef<Expr>(r), (x) => when<Expr>(gt(x, int32(0)), printf<Expr>("pos\n")))
      );
      expect(lines(program)).toEqual([
        "#include <stdint.h>",
        "#include <stdio.h>",
        "",
        "int main(void) {",
        "  int32_t v0;",
        "  int32_t v1;",
        "  v0 = 1;",
        "  v1 = v0;",
        "  if (v1 > 0) {",
        '    fprintf(stdout, "pos\\n");',
        "  }",
        "  return 0;",
        "}",
        "",
      ]);
    });

    it("prints both branches when else has code", () => {
      const program = iff<Expr>(lt(int32(1), int32(2)), printf<Expr>("yes"), printf<Expr>("no"));
      expect(lines(program).slice(2, 8)).toEqual([
        "int main(void) {",
        "  if (1 < 2) {",
        '    fprintf(stdout, "yes");',
        "  } else {",
        '    fprintf(stdout, "no");',
        "  }",
      ]);
    });

    it("keeps a plain while when the condition needs no statements", () => {
      const program = whileLoop<Expr>(pure(bool(false)), printf<Expr>("x"));
      expect(lines(program).slice(2, 6)).toEqual(["int main(void) {", "  while (0) {", '    fprintf(stdout, "x");', "  }"]);
    });

    it("tests a computed condition at the top of an endless loop", () => {
      const program = bind(initRef<Expr>("int32", int32(0)), (r) =>
        whileLoop<Expr>(
          bind<Expr, Expr, Expr>(getRef(r), (x) => pure(lt(x, int32(3)))),
          modifyRef<Expr>(r, (x) => add(x, int32(1)))
        )
      );
      expect(generateC(program, exprLang).code).toBe(
        [
          "#include <stdint.h>",
          "",
          "int main(void) {",
          "  int32_t v0;",
          "  v0 = 0;",
          "  while (1) {",
          "    int32_t v1;",
          "    int32_t v2;",
          "    v1 = v0;",
          "    if (!(v1 < 3)) {",
          "      break;",
          "    }",
          "    v2 = v0;",
          "    v0 = v2 + 1;",
          "  }",
          "  return 0;",
          "}",
          "",
        ].join("\n")
      );
    });

    it("emits break", () => {
      expect(lines(whileLoop<Expr>(pure(bool(true)), breakLoop<Expr>())).slice(1, 4)).toEqual(["  while (1) {", "    break;", "  }"]);
    });

    it("emits assertions", () => {
      const result = generateC(assert<Expr>(lt(int32(1), int32(2)), "ordered"), exprLang);
      expect(result.module.includes).toEqual(["<assert.h>"]);
      expect(result.code.split("\n")).toContain('  assert((1 < 2) && "ordered");');

      const flag = bind(initRef<Expr>("bool", bool(true)), (r) => bind(getRef<Expr>(r), (b) => assert<Expr>(b, "flag")));
      expect(lines(flag)).toContain('  assert(v1 && "flag");');
    });
  });

  describe("expressions", () => {
    it("includes <math.h> for floating remainders", () => {
      const result = generateC(printf<Expr>("%f\n", [printfArg("double", mod(double(5.5), double(2)))]), exprLang);
      expect(result.module.includes).toEqual(["<stdio.h>", "<math.h>"]);
      expect(result.code.split("\n")).toContain('  fprintf(stdout, "%f\\n", fmod(5.5, 2.0));');
    });

    it("includes headers needed by call arguments", () => {
      const result = generateC(callProc<Expr>("show", [valArg("double", mod(double(5.5), double(2)))]), exprLang);
      expect(result.module.includes).toEqual(["<math.h>"]);
      expect(result.code.split("\n")).toContain("  show(fmod(5.5, 2.0));");
    });
  });

  describe("files", () => {
    it("opens, reads, checks and closes", () => {
      const program = bind(fopen<Expr>("data.txt", "read"), (h) =>
        bind(fget<Expr>("int32", h), (x) => bind(feof<Expr>(h), () => seq(fput<Expr>(stdout, "got ", "int32", x, "\n"), fclose<Expr>(h))))
      );
      expect(lines(program)).toEqual([
        "#include <stdio.h>",
        "#include <stdint.h>",
        "",
        "int main(void) {",
        "  FILE *h0;",
        "  int32_t v1;",
        "  int v2;",
        '  h0 = fopen("data.txt", "r");',
        '  fscanf(h0, "%d", &v1);',
        "  v2 = feof(h0);",
        '  fprintf(stdout, "got %d\\n", v1);',
        "  fclose(h0);",
        "  return 0;",
        "}",
        "",
      ]);
    });

    it("uses C mode strings", () => {
      expect(lines(fopen<Expr>("out.txt", "readWrite"))).toContain('  h0 = fopen("out.txt", "r+");');
      expect(lines(fopen<Expr>("out.txt", "append"))).toContain('  h0 = fopen("out.txt", "a");');
    });

    it("never closes the standard streams", () => {
      expect(lines(fclose<Expr>(stdout))).toEqual(["#include <stdio.h>", "", "int main(void) {", "  return 0;", "}", ""]);
    });
  });

  describe("foreign calls", () => {
    it("declares externs and calls them", () => {
      const program = bind(initRef<Expr>("int32", int32(3)), (r) =>
        sequence<Expr>([
          addExternProc<Expr>("fill", [refArg(r), strArg("label"), handleArg(stdout)]),
          addExternFun<Expr>("scale", "double", [valArg("double", double(2))]),
          callFun<Expr>("double", "scale", [valArg("double", double(2))]),
          callProc<Expr>("fill", [refArg(r), strArg('label "x"'), handleArg(stdout)]),
          addDefinition<Expr>("static int counter = 0;"),
        ])
      );
      expect(generateC(program, exprLang).code).toBe(
        [
          "#include <stdint.h>",
          "#include <stdio.h>",
          "",
          "void fill(int32_t *, const char *, FILE *);",
          "double scale(double);",
          "static int counter = 0;",
          "",
          "int main(void) {",
          "  int32_t v0;",
          "  double v1;",
          "  v0 = 3;",
          "  v1 = scale(2.0);",
          '  fill(&v0, "label \\"x\\"", stdout);',
          "  return 0;",
          "}",
          "",
        ].join("\n")
      );
    });

    it("adds includes once, in registration order", () => {
      const program = sequence<Expr>([addInclude("<math.h>"), addInclude("<stdlib.h>"), addInclude("<math.h>")]);
      expect(generateC(program, exprLang).module.includes).toEqual(["<math.h>", "<stdlib.h>"]);
    });

    it("keeps every global, repeats included", () => {
      const program = sequence<Expr>([addDefinition("#define N 4"), addDefinition("#define N 4")]);
      expect(generateC(program, exprLang).module.globals).toEqual(["#define N 4", "#define N 4"]);
    });

    it("derives parameter types through addr and deref", () => {
      const program = bind(newRef<Expr>("int32"), (r) => addExternProc<Expr>("g", [addr(refArg(r)), deref(refArg(r))]));
      expect(generateC(program, exprLang).module.globals).toEqual(["void g(int32_t **, int32_t);"]);
    });

    it("rejects dereferencing a non-pointer parameter", () => {
      expect(() => generateC(addExternProc<Expr>("h", [deref(valArg("int32", int32(0)))]), exprLang)).toThrow(CodegenError);
    });

    it("passes arrays by name", () => {
      const program = bind(initArr<Expr>("word8", [1]), (a) =>
        seq(addExternProc<Expr>("fill", [arrArg(a)]), callProc<Expr>("fill", [arrArg(a)]))
      );
      const result = generateC(program, exprLang);
      expect(result.module.globals).toEqual(["void fill(uint8_t *);"]);
      expect(result.code.split("\n")).toContain("  fill(a0);");
    });

    it("declares procedures without arguments as void", () => {
      expect(generateC(addExternProc<Expr>("tick", []), exprLang).module.globals).toEqual(["void tick(void);"]);
    });
  });

  describe("objects", () => {
    it("declares pointed and plain objects", () => {
      const program = bind(newObject<Expr>("FILE"), (o) =>
        bind(initObject<Expr>("make_point", false, "point_t", [valArg("int32", int32(1)), objArg(o)]), (p) =>
          callProc<Expr>("draw", [objArg(p), addr(objArg(p))])
        )
      );
      expect(lines(program)).toEqual([
        "int main(void) {",
        "  FILE *obj0;",
        "  point_t obj1;",
        "  obj1 = make_point(1, obj0);",
        "  draw(obj1, &obj1);",
        "  return 0;",
        "}",
        "",
      ]);
    });
  });

  describe("naming", () => {
    const program = bind(newRef<Expr>("int32"), (r) =>
      forLoop<Expr>("int32", ixRange(int32(0), 1, excl(int32(3))), (i) =>
        bind(newArr<Expr>("int32", int32(2)), (a) => seq(setArr(int32(0), i, a), bind(getArr<Expr>(int32(0), a), (x) => modifyRef<Expr>(r, () => x))))
      )
    );

    it("issues the same names as a dry run", () => {
      expect(generateC(program, exprLang).names).toEqual(runDry(program, exprLang).names);
      expect(generateC(program, exprLang).names).toEqual(["v0", "v1", "a2", "v3", "v4"]);
    });

    it("fails when the passes disagree", () => {
      let calls = 0;
      const unstable = bind(skip<Expr>(), () =>
        calls++ === 0 ? seq(newRef<Expr>("int32"), skip<Expr>()) : seq(newArr<Expr>("int32", int32(1)), skip<Expr>())
      );
      expect(() => generateC(unstable, exprLang)).toThrow(NamingMismatchError);
    });

    it("continues a caller's name supply", () => {
      const names = new NameSupply();
      names.fresh("x");
      expect(generateC(newRef<Expr>("int32"), exprLang, { names }).names).toEqual(["v1"]);
      expect(names.issued).toEqual(["x0", "v1"]);
    });
  });

  describe("options", () => {
    it("names the function and indents as asked", () => {
      const code = generateC(newRef<Expr>("double"), exprLang, { functionName: "run", indent: "\t" }).code;
      expect(code).toBe("int run(void) {\n\tdouble v0;\n\treturn 0;\n}\n");
    });
  });
});

describe("object handles", () => {
  const file = { pointed: true, typeName: "FILE", id: "obj0" };
  const point = { pointed: false, typeName: "point_t", id: "obj1" };

  it("compare by pointedness, type name and id", () => {
    expect(objectEquals(file, { ...file })).toBe(true);
    expect(objectEquals(file, { ...file, id: "obj2" })).toBe(false);
    expect([file, point].sort(compareObjects)).toEqual([point, file]);
    expect(compareObjects(file, { ...file, id: "obj2" })).toBe(-1);
    expect(compareObjects(point, point)).toBe(0);
  });
});

describe("CGenContext", () => {
  it("restores the enclosing block after a nested one", () => {
    const ctx = new CGenContext(new NameSupply());
    ctx.addStm({ tag: "cBreak" });

    expect(() =>
      ctx.inBlock(() => {
        ctx.addStm({ tag: "cExpr", expr: "inner()" });
        throw new Error("stop");
      })
    ).toThrow("stop");

    const nested = ctx.inBlock(() => {
      ctx.addLocal({ type: ctx.useType("word64"), name: ctx.freshName("v") });
      return 42;
    });
    expect(nested.value).toBe(42);
    expect(nested.block.decls).toEqual([{ type: { base: "uint64_t", pointers: 0 }, name: "v0" }]);
    expect(ctx.finalize().functions[0].body.stmts).toEqual([{ tag: "cBreak" }]);
  });

  it("registers headers for storage types", () => {
    const ctx = new CGenContext(new NameSupply());
    ctx.useType("int8");
    ctx.useType("double");
    ctx.useType("word16");
    expect(ctx.finalize().includes).toEqual(["<stdint.h>"]);
  });

  it("finalizes into a main function returning 0", () => {
    const fn = new CGenContext(new NameSupply()).finalize().functions[0];
    expect(fn.name).toBe("main");
    expect(new CGenContext(new NameSupply()).finalize("run").functions[0].name).toBe("run");
    expect(fn.params).toBe("void");
    expect(fn.result).toBe("0");
  });
});

describe("cString", () => {
  it("escapes quotes, backslashes and control characters", () => {
    expect(cString('say "hi"\\')).toBe('"say \\"hi\\"\\\\"');
    expect(cString("a\tb\n")).toBe('"a\\tb\\n"');
    expect(cString("\x01")).toBe('"\\001"');
  });
});
