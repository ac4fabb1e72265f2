import { describe, it, expect } from "vitest";

import { parseParameter, parseSourceUnit } from "@/analyzer/c-parser.js";
import { StructuralAnalysisError } from "@/lib/errors.js";

import { CLAMP_SOURCE } from "../helpers/fixtures.js";

function parse(text: string) {
  return parseSourceUnit("src/unit.c", text);
}

function fn(text: string, name: string) {
  const found = parse(text).unit.functions.find((f) => f.name === name);
  if (!found) throw new Error(`${name} not parsed`);
  return found;
}

describe("parseSourceUnit", () => {
  describe("function definitions", () => {
    it("recovers name, parameters, branches and line", () => {
      const { unit, error } = parseSourceUnit("src/clamp.c", CLAMP_SOURCE);

      expect(error).toBeUndefined();
      expect(unit.structuralError).toBeUndefined();
      expect(unit.functions).toHaveLength(1);

      const clamp = unit.functions[0];
      expect(clamp?.name).toBe("clamp");
      expect(clamp?.returnType).toBe("int");
      expect(clamp?.parameters.map((p) => p.name)).toEqual(["value", "lo", "hi"]);
      expect(clamp?.parameters.map((p) => p.type)).toEqual(["int", "int", "int"]);
      expect(clamp?.isDefinition).toBe(true);
      expect(clamp?.branchCount).toBe(3);
      expect(clamp?.calls).toEqual([]);
      expect(clamp?.line).toBe(3);
      expect(clamp?.unitPath).toBe("src/clamp.c");
    });

    it("reads includes from directive lines", () => {
      const { unit } = parse('#include <stdint.h>\n#include "motor.h"\nint x;\n');
      expect(unit.includes).toEqual([
        { path: "stdint.h", system: true },
        { path: "motor.h", system: false },
      ]);
    });

    it("replaces a prototype with the later definition", () => {
      const { unit } = parse(
        [
          "int add(int a, int b);",
          "static int helper(void);",
          "int add(int a, int b) { return helper() + a + b; }",
          "static int helper(void) { return 1; }",
        ].join("\n")
      );

      expect(unit.functions.map((f) => f.name)).toEqual(["add", "helper"]);
      expect(unit.functions.every((f) => f.isDefinition)).toBe(true);
      expect(unit.functions[0]?.calls).toEqual(["helper"]);
      expect(unit.functions[1]?.isStatic).toBe(true);
      expect(unit.functions[1]?.parameters).toEqual([]);
    });

    it("ignores braces and calls inside comments and strings", () => {
      const { unit } = parse(
        ["/* int fake(void) { } */", "const char *greeting(void)", "{", '    return "}{ not_a_call(";', "}"].join("\n")
      );

      expect(unit.functions.map((f) => f.name)).toEqual(["greeting"]);
      expect(unit.functions[0]?.returnType).toBe("const char *");
      expect(unit.functions[0]?.calls).toEqual([]);
    });

    it("counts decision points across statement kinds", () => {
      const classify = fn(
        [
          "int classify(int x)",
          "{",
          "    switch (x) {",
          "    case 1: return 10;",
          "    case 2: return 20;",
          "    default: break;",
          "    }",
          "    for (int i = 0; i < x && i < 10; i++) { }",
          "    while (x > 100) { x--; }",
          "    return x > 0 ? 1 : 0;",
          "}",
        ].join("\n"),
        "classify"
      );

      // case x2, for, &&, while, ?
      expect(classify.branchCount).toBe(7);
    });

    it("excludes keywords and parameter names from calls", () => {
      const apply = fn(
        "int apply(int (*fn)(int), int v) { return fn(v) + transform(v) + (int)sizeof(v) + transform(1); }",
        "apply"
      );

      expect(apply.calls).toEqual(["transform"]);
      expect(apply.parameters[0]).toEqual({ name: "fn", type: "int (*)(int)", declaration: "int (*fn)(int)" });
    });

    it("records macro-style definitions as opaque", () => {
      const isr = fn("ISR(TIMER0_vect)\n{\n    tick();\n}\n", "ISR");

      expect(isr.opaque).toBe(true);
      expect(isr.returnType).toBe("");
      expect(isr.isDefinition).toBe(true);
    });
  });

  describe("prototypes", () => {
    it("parses variadic prototypes", () => {
      const log = fn("int log_msg(const char *fmt, ...);", "log_msg");

      expect(log.isDefinition).toBe(false);
      expect(log.variadic).toBe(true);
      expect(log.parameters).toEqual([{ name: "fmt", type: "const char *", declaration: "const char *fmt" }]);
    });

    it("keeps unnamed parameters", () => {
      const reset = fn("void reset(int, char *);", "reset");

      expect(reset.parameters).toEqual([
        { name: undefined, type: "int", declaration: "int" },
        { name: undefined, type: "char *", declaration: "char *" },
      ]);
    });

    it("sees through extern \"C\" blocks", () => {
      const { unit, error } = parse(
        ["#ifdef __cplusplus", 'extern "C" {', "#endif", "int api_open(const char *path);", "#ifdef __cplusplus", "}", "#endif"].join(
          "\n"
        )
      );

      expect(error).toBeUndefined();
      expect(unit.functions.map((f) => f.name)).toEqual(["api_open"]);
      expect(unit.functions[0]?.parameters[0]?.type).toBe("const char *");
    });
  });

  describe("globals", () => {
    const source = [
      "static int counter = 0;",
      "extern volatile unsigned int tick_count;",
      "int values[4], *cursor;",
      "struct config { int rate; } active_config;",
      "void (*on_event)(int);",
      "typedef struct { int x; } point_t;",
      "void bump(void) { counter++; cursor = 0; }",
    ].join("\n");

    it("collects file-scope variables in order", () => {
      const { unit } = parse(source);

      expect(unit.globals.map((g) => g.name)).toEqual([
        "counter",
        "tick_count",
        "values",
        "cursor",
        "active_config",
        "on_event",
      ]);
    });

    it("records storage class and type", () => {
      const { unit } = parse(source);
      const byName = new Map(unit.globals.map((g) => [g.name, g]));

      expect(byName.get("counter")).toEqual({ name: "counter", type: "int", isStatic: true, isExtern: false });
      expect(byName.get("tick_count")).toEqual({
        name: "tick_count",
        type: "volatile unsigned int",
        isStatic: false,
        isExtern: true,
      });
      expect(byName.get("values")?.type).toBe("int [4]");
      expect(byName.get("cursor")?.type).toBe("int *");
      expect(byName.get("active_config")?.type).toBe("struct config");
      expect(byName.get("on_event")?.type).toBe("void (*)(int)");
    });

    it("links functions to the globals they reference", () => {
      expect(fn(source, "bump").globalsReferenced).toEqual(["counter", "cursor"]);
    });
  });

  describe("structural errors", () => {
    it("reports an unterminated block with its line", () => {
      const { unit, error } = parse("int broken(void) {\n  return 1;\n");

      expect(error).toBeInstanceOf(StructuralAnalysisError);
      expect(error?.message).toBe("Unterminated '{' block at end of file (line 3)");
      expect(error?.filePath).toBe("src/unit.c");
      expect(unit.functions).toEqual([]);
      expect(unit.structuralError).toBe(error?.message);
    });

    it("reports an unbalanced closing brace", () => {
      const { error } = parse("int ok(void) { return 0; }\n}\n");
      expect(error?.message).toBe("Unbalanced '}' (line 2)");
    });

    it("freezes the unit", () => {
      const { unit } = parseSourceUnit("src/clamp.c", CLAMP_SOURCE);
      expect(Object.isFrozen(unit)).toBe(true);
      expect(Object.isFrozen(unit.functions)).toBe(true);
      expect(Object.isFrozen(unit.functions[0])).toBe(true);
    });
  });
});

describe("parseParameter", () => {
  it("splits pointer declarations", () => {
    expect(parseParameter("const uint8_t * data")).toEqual({
      name: "data",
      type: "const uint8_t *",
      declaration: "const uint8_t *data",
    });
  });

  it("keeps array dimensions in the type", () => {
    expect(parseParameter("int values[8]")).toEqual({ name: "values", type: "int [8]", declaration: "int values[8]" });
  });

  it("does not take a type after a qualifier for the name", () => {
    expect(parseParameter("const uint8_t")).toEqual({ name: undefined, type: "const uint8_t", declaration: "const uint8_t" });
    expect(parseParameter("volatile const reg_t")).toEqual({
      name: undefined,
      type: "volatile const reg_t",
      declaration: "volatile const reg_t",
    });
    expect(parseParameter("const uint8_t len")).toEqual({ name: "len", type: "const uint8_t", declaration: "const uint8_t len" });
  });

  it("treats a lone struct tag as a type", () => {
    expect(parseParameter("struct point")).toEqual({ name: undefined, type: "struct point", declaration: "struct point" });
  });
});
