import { DecodeError, ParseError } from "../errors/UUIDError"
import type { DecodeFailureReason, ParseFailureReason } from "../errors/UUIDError"
import { UUID_BYTE_LENGTH } from "../encoding/LayoutCodec"
import { Version } from "../types"
import type { Domain, UUIDMetadata } from "../types"
import { UUIDValue } from "./UUIDValue"

/**
 * Any representation the parser accepts.
 */
export type UUIDInput = string | Uint8Array | Buffer | ArrayBuffer | UUIDValue

/**
 * Why tryParse() rejected its input.
 */
export type ParseFailure =
  | ParseFailureReason
  | DecodeFailureReason
  | "NULL_INPUT"            // input is null or undefined
  | "UNSUPPORTED_TYPE"      // not string, Uint8Array, Buffer, ArrayBuffer or UUIDValue
  | "INVALID_BINARY_LENGTH" // binary is not exactly 16 bytes

/**
 * Result of UUIDParser.tryParse().
 */
export type ParseResult =
  | { ok: true; uuid: UUIDValue; metadata: UUIDMetadata }
  | { ok: false; reason: ParseFailure; message: string }

// ─────────────────────────────────────────────────────────────────────────────
// UUIDParser
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Decodes a UUID into its structured metadata.
 *
 * Parsing is strict about the layout tags: the version must be 1–5. The
 * variant is reported as found (NCS, RFC4122, Microsoft, Future), since
 * other variants are recognized but never produced here.
 *
 * Accepted input types:
 *   - string      → canonical 36-char or plain 32-char hex
 *   - Uint8Array  → raw 16-byte binary
 *   - Buffer      → Node.js Buffer (subclass of Uint8Array)
 *   - ArrayBuffer → raw ArrayBuffer
 *   - UUIDValue
 */
export class UUIDParser {
  /**
   * @returns Frozen UUIDMetadata.
   *
   * @throws {TypeError}   input is null, undefined, or an unsupported type.
   * @throws {RangeError}  binary is not exactly 16 bytes.
   * @throws {ParseError}  INVALID_LENGTH, INVALID_CHARACTER or INVALID_HEX_DIGIT.
   * @throws {DecodeError} UNRECOGNIZED_VERSION.
   *
   * @example
   * ```ts
   * const meta = UUIDParser.parse("ab720268-b83f-11ec-b909-0242ac120002")
   * meta.version // 1
   * meta.node    // "0242ac120002"
   * ```
   */
  static parse(input: UUIDInput): UUIDMetadata {
    return UUIDParser.describe(UUIDParser.toValue(input))
  }

  /**
   * Parses into a UUIDValue without decoding metadata. Any version or
   * variant is accepted.
   *
   * @throws {TypeError}  input is null, undefined, or an unsupported type.
   * @throws {RangeError} binary is not exactly 16 bytes.
   * @throws {ParseError} malformed string.
   */
  static toValue(input: UUIDInput): UUIDValue {
    if (input === null || input === undefined) {
      throw new TypeError(
        `UUIDParser: input is required. ` +
        `Received: ${input === null ? "null" : "undefined"}`
      )
    }

    if (input instanceof UUIDValue) {
      return input
    }

    if (typeof input === "string") {
      return UUIDValue.fromString(input)
    }

    // Buffer extends Uint8Array; the constructor copies the view's own range.
    if (input instanceof Uint8Array) {
      return UUIDValue.fromBinary(input)
    }

    if (input instanceof ArrayBuffer) {
      return UUIDValue.fromBinary(new Uint8Array(input))
    }

    throw new TypeError(
      `UUIDParser: unsupported input type "${typeof input}". ` +
      `Accepted: string, Uint8Array, Buffer, ArrayBuffer, UUIDValue.`
    )
  }

  /**
   * Same as parse() but never throws: every failure becomes a typed reason.
   *
   * @example
   * ```ts
   * const result = UUIDParser.tryParse(req.params.id)
   * if (!result.ok) {
   *   logger.logWarn("bad uuid", { reason: result.reason })
   *   return res.status(400).json({ error: "Invalid ID" })
   * }
   * ```
   */
  static tryParse(input: UUIDInput): ParseResult {
    if (input === null || input === undefined) {
      return { ok: false, reason: "NULL_INPUT", message: "UUIDParser: input is required." }
    }

    if (
      typeof input !== "string" &&
      !(input instanceof Uint8Array) &&
      !(input instanceof ArrayBuffer) &&
      !(input instanceof UUIDValue)
    ) {
      return {
        ok: false,
        reason: "UNSUPPORTED_TYPE",
        message: `UUIDParser: unsupported input type "${typeof input}".`,
      }
    }

    const byteLength =
      input instanceof Uint8Array || input instanceof ArrayBuffer ? input.byteLength : UUID_BYTE_LENGTH

    if (byteLength !== UUID_BYTE_LENGTH) {
      return {
        ok: false,
        reason: "INVALID_BINARY_LENGTH",
        message: `UUIDParser: binary must be exactly ${UUID_BYTE_LENGTH} bytes. Received ${byteLength} bytes.`,
      }
    }

    try {
      const uuid = UUIDParser.toValue(input)
      return { ok: true, uuid, metadata: UUIDParser.describe(uuid) }
    } catch (err) {
      if (err instanceof ParseError || err instanceof DecodeError) {
        return { ok: false, reason: err.reason, message: err.message }
      }
      throw err
    }
  }

  /**
   * Builds metadata for a value whose version is known to this library.
   * A version 2 value whose clock_seq_low is not a DCE domain (other
   * variants, foreign encoders) decodes with `domain` left undefined.
   *
   * @throws {DecodeError} UNRECOGNIZED_VERSION
   */
  static describe(uuid: UUIDValue): UUIDMetadata {
    const version = uuid.version()
    const metadata: UUIDMetadata = {
      uuid: uuid.toString(),
      version,
      variant: uuid.variant(),
      fields: uuid.fields(),
    }

    if (version === Version.TIME) {
      metadata.timestamp = uuid.timestamp()
      metadata.date = uuid.date()
      metadata.clockSequence = uuid.clockSequence()
      metadata.node = uuid.node()
    } else if (version === Version.DCE) {
      metadata.timestamp = uuid.timestamp()
      metadata.clockSequence = uuid.clockSequence()
      metadata.node = uuid.node()
      metadata.domain = UUIDParser.knownDomain(uuid)
      metadata.localId = uuid.localId()
    }

    return Object.freeze(metadata)
  }

  private static knownDomain(uuid: UUIDValue): Domain | undefined {
    try {
      return uuid.domain()
    } catch (err) {
      if (err instanceof DecodeError && err.reason === "UNRECOGNIZED_DOMAIN") {
        return undefined
      }
      throw err
    }
  }
}
