import { Binary } from "bson"
import { UUIDValue } from "../../core/UUIDValue"
import { ByteUtils } from "../../utils/ByteUtils"

/**
 * BSON Binary subtype 4: RFC 4122 UUID, big-endian byte order.
 * Subtype 3 is the legacy driver-specific layout and is rejected on read.
 */
const BSON_UUID_SUBTYPE = Binary.SUBTYPE_UUID

/**
 * Shape of a MongoDB document field storing a UUID.
 *
 * @example
 * ```ts
 * interface OrderDocument {
 *   _id: UUIDDocument
 *   email: string
 * }
 * ```
 */
export type UUIDDocument = Binary

// ─────────────────────────────────────────────────────────────────────────────
// UUIDMongoAdapter
// ─────────────────────────────────────────────────────────────────────────────

/**
 * MongoDB adapter: converts between UUIDValue and BSON Binary subtype 4.
 *
 * Storing the 16 bytes (rather than the 36-char string) keeps indexes small
 * and lets drivers and tools display the value as `UUID("…")`.
 *
 * Setup:
 *   ```ts
 *   await collection.insertOne({ _id: UUIDMongoAdapter.toDatabase(uuid.v4()) })
 *
 *   const doc = await collection.findOne({
 *     _id: UUIDMongoAdapter.fromString("6ba7b810-9dad-11d1-80b4-00c04fd430c8"),
 *   })
 *   ```
 */
export class UUIDMongoAdapter {

  // ─── toDatabase ───────────────────────────────────────────────────────────

  /**
   * @throws {TypeError}  input is not a UUIDValue or Uint8Array.
   * @throws {RangeError} Uint8Array is not exactly 16 bytes.
   */
  static toDatabase(input: UUIDValue | Uint8Array): Binary {
    const bytes = UUIDMongoAdapter.resolveToBytes(input, "toDatabase")
    return new Binary(ByteUtils.toBuffer(bytes), BSON_UUID_SUBTYPE)
  }

  // ─── fromDatabase ─────────────────────────────────────────────────────────

  /**
   * @throws {TypeError}  value is not a BSON Binary, or not subtype 4.
   * @throws {RangeError} the binary is not exactly 16 bytes.
   */
  static fromDatabase(value: Binary): UUIDValue {
    if (!(value instanceof Binary)) {
      throw new TypeError(
        `UUIDMongoAdapter.fromDatabase: expected a BSON Binary instance. ` +
        `Received: ${value === null ? "null" : value === undefined ? "undefined" : typeof value}. ` +
        `Ensure the field was stored using UUIDMongoAdapter.toDatabase().`
      )
    }

    if (value.sub_type !== BSON_UUID_SUBTYPE) {
      throw new TypeError(
        `UUIDMongoAdapter.fromDatabase: expected BSON Binary subtype ${BSON_UUID_SUBTYPE} (UUID). ` +
        `Received subtype ${value.sub_type}.`
      )
    }

    return UUIDValue.fromBinary(value.buffer.subarray(0, value.length()))
  }

  // ─── fromString ───────────────────────────────────────────────────────────

  /**
   * Parses a UUID string straight to a query filter value.
   *
   * @throws {ParseError} uuidString is malformed.
   */
  static fromString(uuidString: string): Binary {
    return UUIDMongoAdapter.toDatabase(UUIDValue.fromString(uuidString))
  }

  /**
   * Alias for fromDatabase().
   */
  static toUUIDValue(binary: Binary): UUIDValue {
    return UUIDMongoAdapter.fromDatabase(binary)
  }

  // ─── Private Helpers ──────────────────────────────────────────────────────

  private static resolveToBytes(input: UUIDValue | Uint8Array, callerName: string): Uint8Array {
    if (input instanceof UUIDValue) {
      return input.toBinary()
    }

    if (input instanceof Uint8Array) {
      return UUIDValue.fromBinary(input).toBinary()
    }

    throw new TypeError(
      `UUIDMongoAdapter.${callerName}: input must be a UUIDValue or Uint8Array. ` +
      `Received: ${input === null ? "null" : input === undefined ? "undefined" : typeof input}`
    )
  }
}
