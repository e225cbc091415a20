/**
 * Tests for the scalar type table and host value handling.
 */
import { describe, it, expect } from "vitest";

import {
  ALL_SCALAR_TYPES,
  ParseFailureError,
  coerceValue,
  formatSpecifier,
  isFormattable,
  isIntegral,
  isScalarType,
  parseScalar,
  scalarInfo,
  scanSpecifier,
  zeroValue,
} from "../src";

describe("Scalar table", () => {
  it("lists every type tag", () => {
    expect(ALL_SCALAR_TYPES).toHaveLength(13);
    expect(isScalarType("word16")).toBe(true);
    expect(isScalarType("char")).toBe(false);
  });

  it("maps tags to C storage types and headers", () => {
    expect(scalarInfo("int32").cType).toBe("int32_t");
    expect(scalarInfo("int32").header).toBe("<stdint.h>");
    expect(scalarInfo("word").cType).toBe("unsigned int");
    expect(scalarInfo("word").header).toBeNull();
    expect(scalarInfo("bool").cType).toBe("int");
  });

  it("gives format placeholders", () => {
    expect(formatSpecifier("int64")).toBe("%lld");
    expect(formatSpecifier("word64")).toBe("%llu");
    expect(formatSpecifier("double")).toBe("%f");
    expect(scanSpecifier("double")).toBe("%lf");
    expect(scanSpecifier("int8")).toBe("%hhd");
  });

  it("classifies types", () => {
    expect(isIntegral("word8")).toBe(true);
    expect(isIntegral("float")).toBe(false);
    expect(isIntegral("bool")).toBe(false);
    expect(isFormattable("bool")).toBe(false);
    expect(isFormattable("double")).toBe(true);
  });
});

describe("coerceValue", () => {
  it("wraps integers to their width", () => {
    expect(coerceValue("int8", 200)).toBe(-56);
    expect(coerceValue("word8", -1)).toBe(255);
    expect(coerceValue("int32", 2 ** 31)).toBe(-2147483648);
    expect(coerceValue("word32", 2 ** 32 + 5)).toBe(5);
  });

  it("truncates toward zero", () => {
    expect(coerceValue("int32", 3.9)).toBe(3);
    expect(coerceValue("int32", -3.9)).toBe(-3);
  });

  it("maps non-finite values to zero for integers", () => {
    expect(coerceValue("int32", NaN)).toBe(0);
    expect(coerceValue("int64", Infinity)).toBe(0);
  });

  it("rounds float to single precision", () => {
    expect(coerceValue("float", 0.1)).toBe(Math.fround(0.1));
    expect(coerceValue("double", 0.1)).toBe(0.1);
  });

  it("turns anything into a boolean for bool", () => {
    expect(coerceValue("bool", 2)).toBe(true);
    expect(coerceValue("bool", 0)).toBe(false);
  });

  it("has zero values", () => {
    expect(zeroValue("bool")).toBe(false);
    expect(zeroValue("double")).toBe(0);
  });
});

describe("parseScalar", () => {
  it("parses whole tokens", () => {
    expect(parseScalar("int32", "42")).toBe(42);
    expect(parseScalar("int32", "-7")).toBe(-7);
    expect(parseScalar("double", "2.5")).toBe(2.5);
    expect(parseScalar("double", "1e3")).toBe(1000);
  });

  it("wraps parsed integers", () => {
    expect(parseScalar("int8", "300")).toBe(44);
  });

  it("rejects partial tokens", () => {
    expect(() => parseScalar("int32", "4x")).toThrow(ParseFailureError);
    expect(() => parseScalar("int32", "")).toThrow(ParseFailureError);
    expect(() => parseScalar("int32", "1.5")).toThrow(ParseFailureError);
  });

  it("rejects signs on unsigned types", () => {
    expect(() => parseScalar("word32", "-1")).toThrow('fget: no parse (input "-1" as word32)');
  });
});
