import { ParseError } from "../errors/UUIDError"
import type { HexCase } from "../types"
import { LayoutCodec, UUID_BYTE_LENGTH } from "./LayoutCodec"

/**
 * Character length of the canonical `8-4-4-4-12` form.
 */
export const HYPHENATED_LENGTH = 36

/**
 * Character length of the plain 32-hex-digit form.
 */
export const PLAIN_LENGTH = 32

/**
 * Indices of the four hyphens in the canonical form.
 */
const HYPHEN_POSITIONS: ReadonlySet<number> = new Set([8, 13, 18, 23])

/**
 * Byte indices after which the encoder emits a hyphen (groups of 4,2,2,2,6 bytes).
 */
const HYPHEN_AFTER_BYTE: ReadonlySet<number> = new Set([3, 5, 7, 9])

const MAX_ASCII = 127

const LEADING_OR_TRAILING_WHITESPACE = /^[\t\n\f\r ]+|[\t\n\f\r ]+$/g

const ALPHANUMERIC = /^[0-9A-Za-z]$/

const LOWER_DIGITS = "0123456789abcdef"
const UPPER_DIGITS = "0123456789ABCDEF"

// ─────────────────────────────────────────────────────────────────────────────
// HexEncoder
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Canonical text codec for UUID binaries.
 *
 * Encodes 16 bytes to `xxxxxxxx-xxxx-xxxx-xxxx-xxxxxxxxxxxx` (or 32 plain hex
 * digits) in either case. Decodes exactly those two forms, case-insensitively,
 * after trimming surrounding ASCII whitespace.
 *
 * Decode validation order:
 *   1. Length (36 or 32)           → INVALID_LENGTH
 *   2. Character set and hyphens   → INVALID_CHARACTER
 *   3. Hex digit per nibble        → INVALID_HEX_DIGIT
 */
export class HexEncoder {
  /**
   * ASCII char code → nibble value (0–15), -1 for anything else.
   */
  private static readonly DECODE_LOOKUP: Int8Array = (() => {
    const table = new Int8Array(MAX_ASCII + 1).fill(-1)

    for (let i = 0; i < LOWER_DIGITS.length; i++) {
      table[LOWER_DIGITS.charCodeAt(i)] = i
      table[UPPER_DIGITS.charCodeAt(i)] = i
    }

    return table
  })()

  /**
   * Renders a 16-byte binary in canonical hyphenated form.
   *
   * @throws {TypeError}  input is not a Uint8Array.
   * @throws {RangeError} input is not exactly 16 bytes.
   */
  static encode(input: Uint8Array, hexCase: HexCase = "lower"): string {
    return HexEncoder.render(input, hexCase, true)
  }

  /**
   * Renders a 16-byte binary as 32 hex digits with no separators.
   */
  static encodePlain(input: Uint8Array, hexCase: HexCase = "lower"): string {
    return HexEncoder.render(input, hexCase, false)
  }

  /**
   * Decodes a canonical (36-char) or plain (32-char) UUID string.
   *
   * @returns 16-byte Uint8Array.
   *
   * @throws {TypeError}  input is not a string.
   * @throws {ParseError} INVALID_LENGTH, INVALID_CHARACTER or INVALID_HEX_DIGIT.
   */
  static decode(input: string): Uint8Array {
    if (typeof input !== "string") {
      throw new TypeError(
        `HexEncoder.decode: input must be a string. Received: ${typeof input}`
      )
    }

    const trimmed = input.replace(LEADING_OR_TRAILING_WHITESPACE, "")
    const hyphenated = trimmed.length === HYPHENATED_LENGTH

    if (!hyphenated && trimmed.length !== PLAIN_LENGTH) {
      throw new ParseError(
        "INVALID_LENGTH",
        `HexEncoder.decode: UUID strings must be ${HYPHENATED_LENGTH} characters ` +
        `(hyphenated) or ${PLAIN_LENGTH} characters (plain hex) after trimming. ` +
        `Received ${trimmed.length} characters.`
      )
    }

    let digits = ""

    for (let i = 0; i < trimmed.length; i++) {
      const char = trimmed[i]

      if (hyphenated && HYPHEN_POSITIONS.has(i)) {
        if (char !== "-") {
          throw new ParseError(
            "INVALID_CHARACTER",
            `HexEncoder.decode: expected "-" at position ${i}, found "${char}".`,
            i
          )
        }
        continue
      }

      if (!ALPHANUMERIC.test(char)) {
        throw new ParseError(
          "INVALID_CHARACTER",
          `HexEncoder.decode: invalid character "${char}" at position ${i}. ` +
          `Only hex digits and hyphens at positions 8, 13, 18, 23 are allowed.`,
          i
        )
      }

      digits += char
    }

    const output = new Uint8Array(UUID_BYTE_LENGTH)

    for (let b = 0; b < UUID_BYTE_LENGTH; b++) {
      const high = HexEncoder.nibble(digits, b * 2, hyphenated)
      const low = HexEncoder.nibble(digits, b * 2 + 1, hyphenated)
      output[b] = (high << 4) | low
    }

    return output
  }

  private static nibble(digits: string, index: number, hyphenated: boolean): number {
    const value = HexEncoder.DECODE_LOOKUP[digits.charCodeAt(index)]

    if (value === -1) {
      const position = hyphenated ? HexEncoder.hyphenatedPosition(index) : index

      throw new ParseError(
        "INVALID_HEX_DIGIT",
        `HexEncoder.decode: "${digits[index]}" at position ${position} is not a hex digit.`,
        position
      )
    }

    return value
  }

  /**
   * Maps an index into the hyphen-free digit string back to the trimmed input.
   */
  private static hyphenatedPosition(digitIndex: number): number {
    let position = digitIndex

    for (const hyphen of HYPHEN_POSITIONS) {
      if (position >= hyphen) position++
    }

    return position
  }

  private static render(input: Uint8Array, hexCase: HexCase, hyphenated: boolean): string {
    LayoutCodec.assertBinary(input)

    const alphabet = hexCase === "upper" ? UPPER_DIGITS : LOWER_DIGITS
    let output = ""

    for (let i = 0; i < input.length; i++) {
      output += alphabet[input[i] >>> 4] + alphabet[input[i] & 0x0f]

      if (hyphenated && HYPHEN_AFTER_BYTE.has(i)) {
        output += "-"
      }
    }

    return output
  }
}
