// packages/lessof-runtime/errors.ts
import type { TypeCode } from "../lessof-type-spec/src/mod.ts";

export class LessOfError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "LessOfError";
  }
}

/** The argument handed to the builder or a sort routine is not a sequence. */
export class InvalidArgumentError extends LessOfError {
  readonly argument: unknown;

  constructor(message: string, argument: unknown) {
    super(message);
    this.name = "InvalidArgumentError";
    this.argument = argument;
  }
}

/**
 * A reachable part of the element type has no ordering: an open value, a
 * nested sequence, or a kind the storage cannot hold.
 */
export class UnsupportedTypeError extends LessOfError {
  readonly type: TypeCode;

  constructor(message: string, type: TypeCode) {
    super(message);
    this.name = "UnsupportedTypeError";
    this.type = type;
  }
}
