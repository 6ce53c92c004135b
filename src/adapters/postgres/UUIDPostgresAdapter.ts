import { UUIDValue } from "../../core/UUIDValue"
import { ByteUtils } from "../../utils/ByteUtils"

// ─────────────────────────────────────────────────────────────────────────────
// UUIDPostgresAdapter
// ─────────────────────────────────────────────────────────────────────────────

/**
 * PostgreSQL adapter: converts between UUIDValue and what pg / postgres.js
 * exchange for `uuid` and `bytea` columns.
 *
 * `uuid` columns travel as text: drivers send and return the canonical
 * lowercase string, and the server stores 16 bytes. `bytea` columns travel
 * as Buffer.
 *
 * Schema:
 *   ```sql
 *   CREATE TABLE orders (
 *     id    uuid PRIMARY KEY,
 *     email text NOT NULL
 *   );
 *   ```
 *
 * Keyset pagination works on either column type, since PostgreSQL orders
 * `uuid` byte-wise:
 *   ```sql
 *   SELECT * FROM orders WHERE id > $1 ORDER BY id ASC LIMIT 100;
 *   ```
 */
export class UUIDPostgresAdapter {

  // ─── toDatabase ───────────────────────────────────────────────────────────

  /**
   * Canonical lowercase string for a `uuid` column parameter.
   *
   * @throws {TypeError}  input is not a UUIDValue or Uint8Array.
   * @throws {RangeError} Uint8Array is not exactly 16 bytes.
   *
   * @example
   * ```ts
   * await db.query(
   *   "INSERT INTO orders (id, email) VALUES ($1, $2)",
   *   [UUIDPostgresAdapter.toDatabase(uuid.v4()), "user@example.com"]
   * )
   * ```
   */
  static toDatabase(input: UUIDValue | Uint8Array): string {
    return UUIDPostgresAdapter.resolveToValue(input, "toDatabase").toString()
  }

  /**
   * Buffer for a `bytea` column parameter.
   */
  static toBytea(input: UUIDValue | Uint8Array): Buffer {
    return ByteUtils.toBuffer(UUIDPostgresAdapter.resolveToValue(input, "toBytea").toBinary())
  }

  // ─── fromDatabase ─────────────────────────────────────────────────────────

  /**
   * Converts a `uuid` (string) or `bytea` (Buffer) column value to a UUIDValue.
   *
   * @throws {TypeError}  value is neither a string nor a Buffer/Uint8Array.
   * @throws {RangeError} binary value is not exactly 16 bytes.
   * @throws {ParseError} string value is malformed.
   *
   * @example
   * ```ts
   * const { rows } = await db.query("SELECT id FROM orders WHERE email = $1", [email])
   * const id = UUIDPostgresAdapter.fromDatabase(rows[0].id)
   * ```
   */
  static fromDatabase(value: string | Buffer | Uint8Array): UUIDValue {
    if (typeof value === "string") {
      return UUIDValue.fromString(value)
    }

    if (!(value instanceof Uint8Array)) {
      throw new TypeError(
        `UUIDPostgresAdapter.fromDatabase: expected a string (uuid) or Buffer (bytea). ` +
        `Received: ${value === null ? "null" : value === undefined ? "undefined" : typeof value}.`
      )
    }

    return UUIDValue.fromBinary(value)
  }

  // ─── fromString ───────────────────────────────────────────────────────────

  /**
   * Normalizes request input (either case, hyphenated or plain) to the
   * canonical string for a query parameter.
   *
   * @throws {ParseError} uuidString is malformed.
   */
  static fromString(uuidString: string): string {
    return UUIDValue.fromString(uuidString).toString()
  }

  /**
   * Cursor parameter for keyset pagination from the last id a client saw.
   */
  static toCursor(lastSeenId: string): string {
    return UUIDPostgresAdapter.fromString(lastSeenId)
  }

  // ─── Private Helpers ──────────────────────────────────────────────────────

  private static resolveToValue(input: UUIDValue | Uint8Array, callerName: string): UUIDValue {
    if (input instanceof UUIDValue) {
      return input
    }

    if (input instanceof Uint8Array) {
      return UUIDValue.fromBinary(input)
    }

    throw new TypeError(
      `UUIDPostgresAdapter.${callerName}: input must be a UUIDValue or Uint8Array. ` +
      `Received: ${input === null ? "null" : input === undefined ? "undefined" : typeof input}`
    )
  }
}
