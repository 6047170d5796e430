/**
 * Registers Module - Public API
 *
 * Register map and pure decoders for the charge controller.
 */

// Types
export type {
  DecodeMethod,
  DecodedValue,
  PlainRegisterSpec,
  RegisterSpec,
  Scale,
  ScaledRegisterSpec,
  WordPart,
} from "./schema.js";
export type { DecodeError } from "./errors.js";
export type { RegisterName } from "./map.js";

export { HUNDREDTHS, TENTHS, UNIT_SCALE, WORD_REQUIREMENTS } from "./schema.js";

// Error utilities
export { formatDecodeError } from "./errors.js";

// Register map
export { CHARGE_CONTROLLER_REGISTERS, getRegisterSpec } from "./map.js";

// Pure transformations
export {
  PLACEHOLDER_CHAR,
  decodeAscii,
  decodeRegisters,
  decodeScaledSigned,
  decodeScaledUnsigned,
  decodeUnsignedLong,
  decodeVersion,
  encodeAscii,
  wordsToBytes,
} from "./transform.js";
