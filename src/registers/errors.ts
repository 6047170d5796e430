/**
 * Registers Module - Error Types
 *
 * Typed error unions for register decoding.
 * Errors are values, not exceptions.
 */
import type { DecodeMethod } from "./schema.js";

/**
 * Errors that can occur while decoding register words.
 */
export type DecodeError =
  | {
      readonly type: "LENGTH_MISMATCH";
      readonly message: string;
      readonly method: DecodeMethod;
      readonly expected: number;
      readonly actual: number;
    }
  | {
      readonly type: "WORD_OUT_OF_RANGE";
      readonly message: string;
      readonly index: number;
      readonly value: number;
    };

/**
 * Create a LENGTH_MISMATCH error.
 */
export function lengthMismatch(
  method: DecodeMethod,
  expected: number,
  actual: number,
): DecodeError {
  return {
    type: "LENGTH_MISMATCH",
    message: `${method} expects ${expected} word(s), got ${actual}`,
    method,
    expected,
    actual,
  };
}

/**
 * Create a WORD_OUT_OF_RANGE error.
 */
export function wordOutOfRange(index: number, value: number): DecodeError {
  return {
    type: "WORD_OUT_OF_RANGE",
    message: `Word ${index} is not a 16-bit value: ${value}`,
    index,
    value,
  };
}

/**
 * Format a DecodeError for logging.
 */
export function formatDecodeError(error: DecodeError): string {
  switch (error.type) {
    case "LENGTH_MISMATCH":
      return `Length mismatch: ${error.message}`;
    case "WORD_OUT_OF_RANGE":
      return `Invalid register word: ${error.message}`;
  }
}
