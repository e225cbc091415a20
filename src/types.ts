/**
 * Scalar payload types.
 *
 * Every reference, array element, loop index and foreign-call result carries
 * one of these tags. The table below fixes, per tag, how values are normalised
 * on the host and which C storage type, header and format placeholders the
 * code generator uses.
 */

import { ParseFailureError } from "./errors";

// ============================================================================
// Type Tags
// ============================================================================

export type SignedIntType = "int" | "int8" | "int16" | "int32" | "int64";
export type UnsignedIntType = "word" | "word8" | "word16" | "word32" | "word64";
export type FloatType = "float" | "double";
export type IntegralType = SignedIntType | UnsignedIntType;
export type FormattableType = IntegralType | FloatType;
export type ScalarType = "bool" | FormattableType;

/** Values as the direct interpreter sees them */
export type HostValue = number | boolean;

export type ScalarKind = "bool" | "signed" | "unsigned" | "floating";

export interface ScalarInfo {
  kind: ScalarKind;
  bits: number;
  /** C storage type */
  cType: string;
  /** Header declaring the storage type, if any */
  header: string | null;
  /** printf placeholder */
  printf: string | null;
  /** scanf placeholder */
  scanf: string | null;
}

export const SCALAR_TYPES: Record<ScalarType, ScalarInfo> = {
  bool: { kind: "bool", bits: 1, cType: "int", header: null, printf: null, scanf: null },
  int: { kind: "signed", bits: 32, cType: "int", header: null, printf: "%d", scanf: "%d" },
  int8: { kind: "signed", bits: 8, cType: "int8_t", header: "<stdint.h>", printf: "%d", scanf: "%hhd" },
  int16: { kind: "signed", bits: 16, cType: "int16_t", header: "<stdint.h>", printf: "%d", scanf: "%hd" },
  int32: { kind: "signed", bits: 32, cType: "int32_t", header: "<stdint.h>", printf: "%d", scanf: "%d" },
  int64: { kind: "signed", bits: 64, cType: "int64_t", header: "<stdint.h>", printf: "%lld", scanf: "%lld" },
  word: { kind: "unsigned", bits: 32, cType: "unsigned int", header: null, printf: "%u", scanf: "%u" },
  word8: { kind: "unsigned", bits: 8, cType: "uint8_t", header: "<stdint.h>", printf: "%u", scanf: "%hhu" },
  word16: { kind: "unsigned", bits: 16, cType: "uint16_t", header: "<stdint.h>", printf: "%u", scanf: "%hu" },
  word32: { kind: "unsigned", bits: 32, cType: "uint32_t", header: "<stdint.h>", printf: "%u", scanf: "%u" },
  word64: { kind: "unsigned", bits: 64, cType: "uint64_t", header: "<stdint.h>", printf: "%llu", scanf: "%llu" },
  float: { kind: "floating", bits: 32, cType: "float", header: null, printf: "%f", scanf: "%f" },
  double: { kind: "floating", bits: 64, cType: "double", header: null, printf: "%f", scanf: "%lf" },
};

export const ALL_SCALAR_TYPES = Object.keys(SCALAR_TYPES).filter(isScalarType);

export function isScalarType(name: string): name is ScalarType {
  return Object.prototype.hasOwnProperty.call(SCALAR_TYPES, name);
}

export function scalarInfo(type: ScalarType): ScalarInfo {
  return SCALAR_TYPES[type];
}

export function isIntegral(type: ScalarType): type is IntegralType {
  const kind = SCALAR_TYPES[type].kind;
  return kind === "signed" || kind === "unsigned";
}

export function isFormattable(type: ScalarType): type is FormattableType {
  return SCALAR_TYPES[type].printf !== null;
}

/** printf placeholder of a formattable type */
export function formatSpecifier(type: FormattableType): string {
  return SCALAR_TYPES[type].printf ?? "%d";
}

/** scanf placeholder of a formattable type */
export function scanSpecifier(type: FormattableType): string {
  return SCALAR_TYPES[type].scanf ?? "%d";
}

// ============================================================================
// Host Values
// ============================================================================

export function toNumber(value: HostValue): number {
  return typeof value === "boolean" ? (value ? 1 : 0) : value;
}

export function toBool(value: HostValue): boolean {
  return typeof value === "boolean" ? value : value !== 0;
}

/**
 * Normalise a host value to a type: integers wrap to their width, float rounds
 * to single precision.
 */
export function coerceValue(type: ScalarType, value: HostValue): HostValue {
  const info = SCALAR_TYPES[type];
  switch (info.kind) {
    case "bool":
      return toBool(value);

    case "signed":
    case "unsigned": {
      const n = Math.trunc(toNumber(value));
      if (!Number.isFinite(n)) return 0;
      const big = BigInt(n);
      const wrapped = info.kind === "signed" ? BigInt.asIntN(info.bits, big) : BigInt.asUintN(info.bits, big);
      return Number(wrapped);
    }

    case "floating":
      return info.bits === 32 ? Math.fround(toNumber(value)) : toNumber(value);
  }
}

/** Zero value used to fill freshly allocated arrays */
export function zeroValue(type: ScalarType): HostValue {
  return type === "bool" ? false : 0;
}

// ============================================================================
// Parsing
// ============================================================================

const SIGNED_PATTERN = /^-?\d+$/;
const UNSIGNED_PATTERN = /^\d+$/;
const FLOAT_PATTERN = /^-?(?:\d+(?:\.\d+)?(?:[eE][-+]?\d+)?|Infinity|NaN)$/;

/**
 * Parse a whole token as a value of the given type.
 * Throws ParseFailureError unless the entire token is consumed.
 */
export function parseScalar(type: FormattableType, text: string): HostValue {
  const kind = SCALAR_TYPES[type].kind;
  const pattern = kind === "signed" ? SIGNED_PATTERN : kind === "unsigned" ? UNSIGNED_PATTERN : FLOAT_PATTERN;
  if (!pattern.test(text)) {
    throw new ParseFailureError(text, type);
  }
  return coerceValue(type, Number(text));
}
