/**
 * Run errors.
 *
 * Every failure aborts the run that raised it. Nothing in the interpreters
 * catches these; callers wanting retries wrap the whole run.
 */

export type Backend = "dry" | "direct" | "codegen";

export class ImperativeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ImperativeError";
  }
}

// ============================================================================
// Instruction Errors
// ============================================================================

/**
 * An instruction only one backend can express was run by another.
 */
export class UnsupportedOperationError extends ImperativeError {
  constructor(
    public readonly instruction: string,
    public readonly backend: Backend
  ) {
    super(`Unsupported operation: ${instruction} cannot be run by the ${backend} interpreter`);
    this.name = "UnsupportedOperationError";
  }
}

/**
 * A reference created without a value was read before any write.
 */
export class UninitializedReadError extends ImperativeError {
  constructor(public readonly label: string) {
    super(`Reading uninitialized reference ${label}`);
    this.name = "UninitializedReadError";
  }
}

export class AssertionFailureError extends ImperativeError {
  constructor(public readonly assertion: string) {
    super(`Assertion failed: ${assertion}`);
    this.name = "AssertionFailureError";
  }
}

/**
 * fget could not read a whole value of the requested type.
 */
export class ParseFailureError extends ImperativeError {
  constructor(
    public readonly input: string,
    public readonly type: string
  ) {
    super(`fget: no parse (input ${JSON.stringify(input)} as ${type})`);
    this.name = "ParseFailureError";
  }
}

// ============================================================================
// Supporting Errors
// ============================================================================

/**
 * A symbolic entity reached the direct interpreter, or a live one reached a
 * symbolic backend.
 */
export class RepresentationError extends ImperativeError {
  constructor(entity: string, expected: "symbolic" | "live", backend: Backend) {
    super(`The ${backend} interpreter needs a ${expected} ${entity}`);
    this.name = "RepresentationError";
  }
}

export class UnsupportedTypeError extends ImperativeError {
  constructor(public readonly type: string) {
    super(`Type ${type} is not representable in the expression language`);
    this.name = "UnsupportedTypeError";
  }
}

export class ExpressionError extends ImperativeError {
  constructor(message: string) {
    super(`Expression error: ${message}`);
    this.name = "ExpressionError";
  }
}

export class FormatError extends ImperativeError {
  constructor(
    message: string,
    public readonly format: string
  ) {
    super(`printf: ${message} (format ${JSON.stringify(format)})`);
    this.name = "FormatError";
  }
}

export class IndexError extends ImperativeError {
  constructor(
    public readonly index: number,
    public readonly length: number
  ) {
    super(`Array index ${index} out of range [0, ${length})`);
    this.name = "IndexError";
  }
}

export class CodegenError extends ImperativeError {
  constructor(message: string) {
    super(`Codegen error: ${message}`);
    this.name = "CodegenError";
  }
}

/**
 * The dry pass and the code generator issued different names.
 */
export class NamingMismatchError extends ImperativeError {
  constructor(
    public readonly dryNames: readonly string[],
    public readonly generatedNames: readonly string[]
  ) {
    super(`Dry run issued [${dryNames.join(", ")}] but code generation issued [${generatedNames.join(", ")}]`);
    this.name = "NamingMismatchError";
  }
}
