/**
 * Byte-level I/O used by the direct interpreter. All calls block.
 */

import * as fs from "fs";
import { IOMode } from "../instructions/file";

// ============================================================================
// Sources
// ============================================================================

export interface ByteSource {
  /** Next byte without consuming it; undefined at end of input */
  peek(): number | undefined;
  /** Consume the next byte */
  next(): number | undefined;
}

/**
 * Buffered reader over a file descriptor.
 */
export class FdSource implements ByteSource {
  private readonly buffer = Buffer.alloc(4096);
  private start = 0;
  private end = 0;
  private exhausted = false;

  constructor(private readonly fd: number) {}

  peek(): number | undefined {
    if (this.start >= this.end && !this.fill()) return undefined;
    return this.buffer[this.start];
  }

  next(): number | undefined {
    const byte = this.peek();
    if (byte !== undefined) this.start++;
    return byte;
  }

  private fill(): boolean {
    if (this.exhausted) return false;
    const count = fs.readSync(this.fd, this.buffer, 0, this.buffer.length, null);
    this.start = 0;
    this.end = count;
    if (count === 0) {
      this.exhausted = true;
      return false;
    }
    return true;
  }
}

/**
 * In-memory input, e.g. a canned stdin.
 */
export class StringSource implements ByteSource {
  private readonly bytes: Buffer;
  private position = 0;

  constructor(text: string) {
    this.bytes = Buffer.from(text, "utf8");
  }

  peek(): number | undefined {
    return this.position < this.bytes.length ? this.bytes[this.position] : undefined;
  }

  next(): number | undefined {
    const byte = this.peek();
    if (byte !== undefined) this.position++;
    return byte;
  }
}

// ============================================================================
// Sinks
// ============================================================================

export interface OutputSink {
  write(text: string): void;
}

export class FdSink implements OutputSink {
  constructor(private readonly fd: number) {}

  write(text: string): void {
    fs.writeSync(this.fd, text);
  }
}

/**
 * Collects everything written to it.
 */
export class StringSink implements OutputSink {
  private readonly chunks: string[] = [];

  write(text: string): void {
    this.chunks.push(text);
  }

  get text(): string {
    return this.chunks.join("");
  }
}

// ============================================================================
// Helpers
// ============================================================================

const WHITESPACE = new Set([0x20, 0x09, 0x0a, 0x0b, 0x0c, 0x0d]);

/**
 * Read characters up to the next whitespace or end of input. The whitespace
 * character is consumed; leading whitespace yields an empty word.
 */
export function readWord(source: ByteSource): string {
  const bytes: number[] = [];
  for (;;) {
    const byte = source.next();
    if (byte === undefined || WHITESPACE.has(byte)) break;
    bytes.push(byte);
  }
  return Buffer.from(bytes).toString("utf8");
}

/**
 * fs.openSync flags for a mode. readWrite creates the file when missing and
 * never truncates it.
 */
export function openFlags(mode: IOMode): string | number {
  switch (mode) {
    case "read":
      return "r";
    case "write":
      return "w";
    case "append":
      return "a";
    case "readWrite":
      return fs.constants.O_RDWR | fs.constants.O_CREAT;
  }
}
