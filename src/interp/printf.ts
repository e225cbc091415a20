/**
 * C printf formatting for the direct interpreter.
 *
 * Supports the flags `- + space # 0`, width and precision (literal or `*`),
 * length modifiers (accepted and ignored) and the conversions
 * `d i u o x X f F e E g G c s %`.
 */

import { FormatError } from "../errors";
import { HostValue, ScalarType, isIntegral, scalarInfo, toNumber } from "../types";

export interface FormatArg {
  type: ScalarType;
  value: HostValue;
}

interface Directive {
  flags: string;
  width: number | null;
  precision: number | null;
  conversion: string;
}

const DIRECTIVE_PATTERN = /%([-+ #0]*)(\d+|\*)?(?:\.(\d*|\*))?(?:hh|h|ll|l|L|z|j|t)?([diuoxXfFeEgGcs%])/g;

export function formatPrintf(format: string, args: FormatArg[]): string {
  let out = "";
  let last = 0;
  let argIndex = 0;

  const nextArg = (): FormatArg => {
    const arg = args[argIndex];
    if (arg === undefined) throw new FormatError("argument list ended prematurely", format);
    argIndex++;
    return arg;
  };

  const literal = (text: string): string => {
    if (text.includes("%")) throw new FormatError("bad formatting char", format);
    return text;
  };

  for (const match of format.matchAll(DIRECTIVE_PATTERN)) {
    const index = match.index ?? 0;
    out += literal(format.slice(last, index));
    last = index + match[0].length;

    const [, flags, widthText, precisionText, conversion] = match;
    if (conversion === "%") {
      out += "%";
      continue;
    }

    let width = widthText === undefined ? null : widthText === "*" ? toNumber(nextArg().value) : Number(widthText);
    let flagSet = flags;
    if (width !== null && width < 0) {
      // A negative * width means left-justify
      flagSet += "-";
      width = -width;
    }
    const precision =
      precisionText === undefined ? null : precisionText === "*" ? toNumber(nextArg().value) : Number(precisionText || "0");

    out += formatOne({ flags: flagSet, width, precision: precision !== null && precision < 0 ? null : precision, conversion }, nextArg());
  }

  out += literal(format.slice(last));
  if (argIndex < args.length) throw new FormatError("formatting string ended prematurely", format);
  return out;
}

function formatOne(directive: Directive, arg: FormatArg): string {
  const n = toNumber(arg.value);

  switch (directive.conversion) {
    case "d":
    case "i":
      return padNumber(directive, signOf(directive, n < 0), integerDigits(Math.abs(Math.trunc(n)), 10, directive.precision), true);

    case "u":
      return padNumber(directive, "", integerDigits(unsigned(arg), 10, directive.precision), true);

    case "o": {
      const digits = integerDigits(unsigned(arg), 8, directive.precision);
      return padNumber(directive, "", directive.flags.includes("#") && !digits.startsWith("0") ? `0${digits}` : digits, true);
    }

    case "x":
    case "X": {
      const value = unsigned(arg);
      let digits = integerDigits(value, 16, directive.precision);
      if (directive.conversion === "X") digits = digits.toUpperCase();
      const prefix = directive.flags.includes("#") && value !== 0n ? (directive.conversion === "X" ? "0X" : "0x") : "";
      return padNumber(directive, prefix, digits, true);
    }

    case "f":
    case "F":
    case "e":
    case "E":
    case "g":
    case "G":
      return padNumber(directive, signOf(directive, n < 0 || Object.is(n, -0)), floatDigits(directive, Math.abs(n)), Number.isFinite(n));

    case "c":
      return pad(directive, String.fromCharCode(n));

    case "s": {
      const text = String(arg.value);
      return pad(directive, directive.precision === null ? text : text.slice(0, directive.precision));
    }

    default:
      throw new FormatError(`bad formatting char ${directive.conversion}`, directive.conversion);
  }
}

function signOf(directive: Directive, negative: boolean): string {
  if (negative) return "-";
  if (directive.flags.includes("+")) return "+";
  if (directive.flags.includes(" ")) return " ";
  return "";
}

/** Two's complement reading of the value at its type's width */
function unsigned(arg: FormatArg): bigint {
  const value = BigInt(Math.trunc(toNumber(arg.value)));
  const bits = isIntegral(arg.type) ? Math.max(scalarInfo(arg.type).bits, 32) : 32;
  return BigInt.asUintN(bits, value);
}

function integerDigits(value: number | bigint, radix: number, precision: number | null): string {
  if (precision === 0 && (value === 0 || value === 0n)) return "";
  const digits = value.toString(radix);
  return precision === null ? digits : digits.padStart(precision, "0");
}

function floatDigits(directive: Directive, value: number): string {
  const upper = directive.conversion === "F" || directive.conversion === "E" || directive.conversion === "G";
  if (Number.isNaN(value)) return upper ? "NAN" : "nan";
  if (!Number.isFinite(value)) return upper ? "INF" : "inf";

  const precision = directive.precision ?? 6;
  const alternate = directive.flags.includes("#");
  let text: string;

  switch (directive.conversion) {
    case "f":
    case "F":
      text = value.toFixed(precision);
      if (alternate && precision === 0) text += ".";
      break;

    case "e":
    case "E":
      text = exponential(value, precision);
      break;

    default: {
      const significant = precision === 0 ? 1 : precision;
      const exponent = value === 0 ? 0 : Number(value.toExponential(significant - 1).split("e")[1]);
      if (exponent < -4 || exponent >= significant) {
        text = exponential(value, significant - 1);
        if (!alternate) text = text.replace(/\.?0+e/, "e");
      } else {
        text = value.toFixed(significant - 1 - exponent);
        if (!alternate && text.includes(".")) text = text.replace(/\.?0+$/, "");
      }
    }
  }
  return upper ? text.toUpperCase() : text;
}

/** toExponential with at least two exponent digits, as C prints them */
function exponential(value: number, precision: number): string {
  return value.toExponential(precision).replace(/e([+-])(\d)$/, "e$10$2");
}

function padNumber(directive: Directive, prefix: string, digits: string, zeroPadAllowed: boolean): string {
  const width = directive.width ?? 0;
  const body = prefix + digits;
  if (body.length >= width) return body;
  if (directive.flags.includes("-")) return body.padEnd(width, " ");

  const integerWithPrecision = "diuoxX".includes(directive.conversion) && directive.precision !== null;
  if (directive.flags.includes("0") && zeroPadAllowed && !integerWithPrecision) {
    return prefix + digits.padStart(width - prefix.length, "0");
  }
  return body.padStart(width, " ");
}

function pad(directive: Directive, text: string): string {
  const width = directive.width ?? 0;
  if (text.length >= width) return text;
  return directive.flags.includes("-") ? text.padEnd(width, " ") : text.padStart(width, " ");
}
