/**
 * Registers Module - Pure Transformations
 *
 * Turns raw 16-bit register words into typed physical values.
 * No side effects, no I/O - just data in, data out.
 */
import { type Result, err, ok } from "neverthrow";

import type { DecodeError } from "./errors.js";
import { lengthMismatch, wordOutOfRange } from "./errors.js";
import type {
  DecodeMethod,
  DecodedValue,
  RegisterSpec,
  Scale,
  WordPart,
} from "./schema.js";
import { WORD_REQUIREMENTS } from "./schema.js";

/** Rendered in place of bytes outside printable ASCII. */
export const PLACEHOLDER_CHAR = "?";

const NUL = 0x00;
const SPACE = 0x20;
const TILDE = 0x7e;

// =============================================================================
// Word Helpers
// =============================================================================

/**
 * Check that a word sequence has the expected length and that every word
 * fits in 16 bits.
 */
function checkWords(
  method: DecodeMethod,
  words: ReadonlyArray<number>,
  expected: number,
): Result<ReadonlyArray<number>, DecodeError> {
  if (words.length !== expected) {
    return err(lengthMismatch(method, expected, words.length));
  }

  for (const [index, word] of words.entries()) {
    if (!Number.isInteger(word) || word < 0 || word > 0xffff) {
      return err(wordOutOfRange(index, word));
    }
  }

  return ok(words);
}

/**
 * Split words into bytes, high byte first.
 */
export function wordsToBytes(words: ReadonlyArray<number>): number[] {
  return words.flatMap((word) => [(word >> 8) & 0xff, word & 0xff]);
}

function selectPart(word: number, part: WordPart): number {
  switch (part) {
    case "word":
      return word;
    case "high":
      return (word >> 8) & 0xff;
    case "low":
      return word & 0xff;
  }
}

/**
 * Whole words are two's complement. Single bytes use the controller's
 * sign-magnitude encoding: bit 7 is the sign, bits 0-6 the magnitude.
 */
function toSigned(raw: number, part: WordPart): number {
  if (part === "word") {
    return raw >= 0x8000 ? raw - 0x10000 : raw;
  }
  const magnitude = raw & 0x7f;
  return raw & 0x80 ? -magnitude : magnitude;
}

function applyScale(raw: number, scale: Scale): number {
  return (raw * scale.numerator) / scale.denominator;
}

// =============================================================================
// Decoders
// =============================================================================

/**
 * Decode big-endian ASCII text.
 *
 * Trailing NUL and space bytes are stripped. Bytes outside printable ASCII
 * render as {@link PLACEHOLDER_CHAR} so a damaged read still yields text.
 *
 * @example
 * decodeAscii([0x5253, 0x3430, 0x2000], 3) // ok("RS40")
 */
export function decodeAscii(
  words: ReadonlyArray<number>,
  wordCount: number,
): Result<string, DecodeError> {
  return checkWords("BigEndianASCII", words, wordCount).map((checked) => {
    const bytes = wordsToBytes(checked);

    let end = bytes.length;
    while (end > 0) {
      const last = bytes[end - 1];
      if (last !== NUL && last !== SPACE) break;
      end -= 1;
    }

    return bytes
      .slice(0, end)
      .map((byte) =>
        byte >= SPACE && byte <= TILDE
          ? String.fromCharCode(byte)
          : PLACEHOLDER_CHAR,
      )
      .join("");
  });
}

/**
 * Decode a single-word unsigned quantity and apply its scale.
 *
 * @example
 * decodeScaledUnsigned([250], "word", { numerator: 1, denominator: 10 }) // ok(25)
 */
export function decodeScaledUnsigned(
  words: ReadonlyArray<number>,
  part: WordPart,
  scale: Scale,
): Result<number, DecodeError> {
  return checkWords("ScaledUnsigned", words, 1).map((checked) =>
    applyScale(selectPart(checked[0] ?? 0, part), scale),
  );
}

/**
 * Decode a single-word signed quantity and apply its scale.
 */
export function decodeScaledSigned(
  words: ReadonlyArray<number>,
  part: WordPart,
  scale: Scale,
): Result<number, DecodeError> {
  return checkWords("ScaledSigned", words, 1).map((checked) =>
    applyScale(toSigned(selectPart(checked[0] ?? 0, part), part), scale),
  );
}

/**
 * Decode a firmware/hardware version from two words.
 * The first of the four bytes is unused.
 *
 * @example
 * decodeVersion([0x0102, 0x0304]) // ok("V2.3.4")
 */
export function decodeVersion(
  words: ReadonlyArray<number>,
): Result<string, DecodeError> {
  return checkWords("VersionTriplet", words, 2).map((checked) => {
    const [, major, minor, patch] = wordsToBytes(checked);
    return `V${major}.${minor}.${patch}`;
  });
}

/**
 * Decode a big-endian unsigned 32-bit integer from two words.
 */
export function decodeUnsignedLong(
  words: ReadonlyArray<number>,
): Result<number, DecodeError> {
  return checkWords("UnsignedLong", words, 2).map(
    ([high = 0, low = 0]) => high * 0x10000 + low,
  );
}

/**
 * Decode the words read for a register spec.
 *
 * The sequence must have exactly `spec.wordCount` words, and the spec's word
 * count must suit its decode method.
 */
export function decodeRegisters(
  spec: RegisterSpec,
  words: ReadonlyArray<number>,
): Result<DecodedValue, DecodeError> {
  const required = WORD_REQUIREMENTS[spec.decode];
  if (required !== null && spec.wordCount !== required) {
    return err(lengthMismatch(spec.decode, required, spec.wordCount));
  }
  if (words.length !== spec.wordCount) {
    return err(lengthMismatch(spec.decode, spec.wordCount, words.length));
  }

  switch (spec.decode) {
    case "BigEndianASCII":
      return decodeAscii(words, spec.wordCount);
    case "ScaledUnsigned":
      return decodeScaledUnsigned(words, spec.part, spec.scale);
    case "ScaledSigned":
      return decodeScaledSigned(words, spec.part, spec.scale);
    case "VersionTriplet":
      return decodeVersion(words);
    case "UnsignedLong":
      return decodeUnsignedLong(words);
  }
}

// =============================================================================
// Encoders
// =============================================================================

/**
 * Encode text into big-endian ASCII words, padded with spaces.
 * Characters outside printable ASCII are written as the placeholder.
 */
export function encodeAscii(
  text: string,
  wordCount: number,
): Result<number[], DecodeError> {
  const bytes = Array.from(text, (char) => {
    const code = char.codePointAt(0) ?? 0;
    return code >= SPACE && code <= TILDE
      ? code
      : PLACEHOLDER_CHAR.charCodeAt(0);
  });

  if (bytes.length > wordCount * 2) {
    return err(
      lengthMismatch("BigEndianASCII", wordCount, Math.ceil(bytes.length / 2)),
    );
  }

  while (bytes.length < wordCount * 2) {
    bytes.push(SPACE);
  }

  const words: number[] = [];
  for (let i = 0; i < bytes.length; i += 2) {
    words.push(((bytes[i] ?? SPACE) << 8) | (bytes[i + 1] ?? SPACE));
  }
  return ok(words);
}
