/**
 * Registers Module - Schemas and Types
 *
 * Describes how a named quantity is laid out in the controller's 16-bit
 * holding registers and how its words turn into a typed value.
 */

// =============================================================================
// Decode Methods
// =============================================================================

export type DecodeMethod =
  | "BigEndianASCII"
  | "ScaledUnsigned"
  | "ScaledSigned"
  | "VersionTriplet"
  | "UnsignedLong";

/**
 * Number of words each method consumes. `null` means the count comes from
 * the register spec (strings).
 */
export const WORD_REQUIREMENTS: Readonly<Record<DecodeMethod, number | null>> =
  {
    BigEndianASCII: null,
    ScaledUnsigned: 1,
    ScaledSigned: 1,
    VersionTriplet: 2,
    UnsignedLong: 2,
  };

/**
 * Which part of a word a scaled value lives in.
 * The controller packs two 8-bit quantities into some registers.
 */
export type WordPart = "word" | "high" | "low";

/**
 * Rational scale factor: physical = raw * numerator / denominator.
 */
export type Scale = Readonly<{
  numerator: number;
  denominator: number;
}>;

export const UNIT_SCALE: Scale = { numerator: 1, denominator: 1 };
export const TENTHS: Scale = { numerator: 1, denominator: 10 };
export const HUNDREDTHS: Scale = { numerator: 1, denominator: 100 };

// =============================================================================
// Register Spec
// =============================================================================

type RegisterSpecBase = Readonly<{
  name: string;
  /** First register address (0..0xFFFF) */
  address: number;
  /** Number of consecutive 16-bit registers */
  wordCount: number;
  unit: string;
}>;

export type ScaledRegisterSpec = RegisterSpecBase &
  Readonly<{
    decode: "ScaledUnsigned" | "ScaledSigned";
    part: WordPart;
    scale: Scale;
  }>;

export type PlainRegisterSpec = RegisterSpecBase &
  Readonly<{
    decode: "BigEndianASCII" | "VersionTriplet" | "UnsignedLong";
  }>;

export type RegisterSpec = ScaledRegisterSpec | PlainRegisterSpec;

/**
 * A decoded register value: strings for text and versions, numbers otherwise.
 */
export type DecodedValue = string | number;
