/**
 * File handling.
 */

import { Program, pure, skip, step } from "../program/program";
import { FormattableType, ScalarType, formatSpecifier } from "../types";

// ============================================================================
// Handles
// ============================================================================

export type Handle = SymbolicHandle | LiveHandle;

export interface SymbolicHandle {
  kind: "symbolic";
  name: string;
}

export interface LiveHandle {
  kind: "live";
  id: number;
}

export function symbolicHandle(name: string): SymbolicHandle {
  return { kind: "symbolic", name };
}

/** Handle to standard input */
export const stdin: SymbolicHandle = symbolicHandle("stdin");

/** Handle to standard output */
export const stdout: SymbolicHandle = symbolicHandle("stdout");

export function isStandardHandle(handle: Handle): boolean {
  return handle.kind === "symbolic" && (handle.name === stdin.name || handle.name === stdout.name);
}

export type IOMode = "read" | "write" | "append" | "readWrite";

/** fopen mode strings */
export const C_MODES: Record<IOMode, string> = {
  read: "r",
  write: "w",
  append: "a",
  readWrite: "r+",
};

/** One printf argument with its own type */
export interface PrintfArg<E> {
  type: ScalarType;
  exp: E;
}

export function printfArg<E>(type: ScalarType, exp: E): PrintfArg<E> {
  return { type, exp };
}

// ============================================================================
// Commands
// ============================================================================

export type FileCmd<E, K> = FOpen<K> | FClose<K> | FEof<E, K> | FPrintf<E, K> | FGet<E, K>;

export interface FOpen<K> {
  family: "file";
  tag: "FOpen";
  path: string;
  mode: IOMode;
  next: (handle: Handle) => K;
}

export interface FClose<K> {
  family: "file";
  tag: "FClose";
  handle: Handle;
  next: () => K;
}

export interface FEof<E, K> {
  family: "file";
  tag: "FEof";
  handle: Handle;
  next: (eof: E) => K;
}

export interface FPrintf<E, K> {
  family: "file";
  tag: "FPrintf";
  handle: Handle;
  format: string;
  args: PrintfArg<E>[];
  next: () => K;
}

/**
 * Read one whitespace-delimited word and parse it as `type`.
 */
export interface FGet<E, K> {
  family: "file";
  tag: "FGet";
  type: FormattableType;
  handle: Handle;
  next: (value: E) => K;
}

// ============================================================================
// Smart Constructors
// ============================================================================

export function fopen<E>(path: string, mode: IOMode): Program<E, Handle> {
  return step<E, Handle>({ family: "file", tag: "FOpen", path, mode, next: pure });
}

export function fclose<E>(handle: Handle): Program<E, void> {
  return step<E, void>({ family: "file", tag: "FClose", handle, next: skip });
}

/** Check for end of file */
export function feof<E>(handle: Handle): Program<E, E> {
  return step<E, E>({ family: "file", tag: "FEof", handle, next: pure });
}

export function fprintf<E>(handle: Handle, format: string, args: PrintfArg<E>[] = []): Program<E, void> {
  return step<E, void>({ family: "file", tag: "FPrintf", handle, format, args, next: skip });
}

/** Print to stdout */
export function printf<E>(format: string, args: PrintfArg<E>[] = []): Program<E, void> {
  return fprintf(stdout, format, args);
}

/**
 * Print a single value using its type's placeholder, between `prefix` and
 * `suffix`.
 */
export function fput<E>(handle: Handle, prefix: string, type: FormattableType, exp: E, suffix: string): Program<E, void> {
  return fprintf(handle, `${prefix}${formatSpecifier(type)}${suffix}`, [printfArg(type, exp)]);
}

/** Get a single value from a handle */
export function fget<E>(type: FormattableType, handle: Handle): Program<E, E> {
  return step<E, E>({ family: "file", tag: "FGet", type, handle, next: pure });
}
