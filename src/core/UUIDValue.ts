import { HexEncoder } from "../encoding/HexEncoder"
import { LayoutCodec, UUID_BYTE_LENGTH } from "../encoding/LayoutCodec"
import { VersionTagger } from "../encoding/VersionTagger"
import { Version } from "../types"
import type { Domain, HexCase, UUIDFields, Variant } from "../types"
import { ByteUtils } from "../utils/ByteUtils"
import { TimeUtils } from "../utils/TimeUtils"
import { NodeResolver } from "./NodeResolver"

/** 12-bit timestamp slice kept below the version nibble. */
const TIME_HI_MASK = 0x0fff

/** 14-bit clock sequence below the variant bits. */
const CLOCK_SEQ_MASK = 0x3fff

/** 6 clock-sequence bits left in a version 2 UUID (clock_seq_low holds the domain). */
const DCE_CLOCK_SEQ_HI_MASK = 0x3f

/**
 * Immutable value object wrapping a 16-byte UUID binary.
 *
 * Holds a defensive copy; toBinary() returns another. Equality and ordering
 * are byte-wise. The canonical lowercase string is computed once.
 *
 * Constructing a UUIDValue does not check version or variant: any 16 bytes
 * form a valid (if meaningless) identifier. The accessors that interpret
 * those bits throw DecodeError when they don't match.
 */
export class UUIDValue {
  /**
   * The all-zero UUID.
   */
  static readonly NIL: UUIDValue = new UUIDValue(new Uint8Array(UUID_BYTE_LENGTH))

  private readonly binary: Uint8Array

  private readonly canonical: string

  /**
   * @throws {TypeError}  binary is not a Uint8Array (or Buffer).
   * @throws {RangeError} binary is not exactly 16 bytes.
   */
  constructor(binary: Uint8Array) {
    if (binary == null) {
      throw new TypeError(
        `UUIDValue: constructor requires a Uint8Array, received ${binary === null ? "null" : "undefined"}.`
      )
    }

    LayoutCodec.assertBinary(binary)

    this.binary = ByteUtils.copy(binary)
    this.canonical = HexEncoder.encode(this.binary, "lower")
    Object.freeze(this)
  }

  /**
   * Canonical `8-4-4-4-12` form, lowercase unless asked otherwise.
   *
   * @example
   * ```ts
   * UUIDValue.fromString("6BA7B810-9DAD-11D1-80B4-00C04FD430C8").toString()
   * // "6ba7b810-9dad-11d1-80b4-00c04fd430c8"
   * ```
   */
  toString(hexCase: HexCase = "lower"): string {
    return hexCase === "lower" ? this.canonical : this.canonical.toUpperCase()
  }

  /**
   * 32 hex digits, no hyphens.
   */
  toPlainString(hexCase: HexCase = "lower"): string {
    return HexEncoder.encodePlain(this.binary, hexCase)
  }

  toJSON(): string {
    return this.canonical
  }

  /**
   * @returns A new Uint8Array(16) with the UUID bytes.
   */
  toBinary(): Uint8Array {
    return ByteUtils.copy(this.binary)
  }

  fields(): UUIDFields {
    return LayoutCodec.unpack(this.binary)
  }

  /**
   * @throws {DecodeError} UNRECOGNIZED_VERSION
   */
  version(): Version {
    return VersionTagger.versionOf(this.binary)
  }

  variant(): Variant {
    return VersionTagger.variantOf(this.binary)
  }

  /**
   * DCE domain of a version 2 UUID.
   *
   * @throws {DecodeError} UNRECOGNIZED_VERSION, or UNRECOGNIZED_DOMAIN.
   * @throws {TypeError}   the UUID is not version 2.
   */
  domain(): Domain {
    this.assertVersion([Version.DCE], "domain")
    return VersionTagger.domainOf(this.binary)
  }

  /**
   * 60-bit timestamp of a version 1 UUID, or the 28 bits a version 2 UUID
   * keeps (its low 32 bits are the local id, read as zero here).
   *
   * @throws {TypeError} the UUID is not version 1 or 2.
   */
  timestamp(): bigint {
    const version = this.assertVersion([Version.TIME, Version.DCE], "timestamp")
    const { timeLow, timeMid, timeHiAndVersion } = this.fields()

    const high = (BigInt(timeHiAndVersion & TIME_HI_MASK) << 48n) | (BigInt(timeMid) << 32n)
    return version === Version.TIME ? high | BigInt(timeLow) : high
  }

  /**
   * Creation time of a version 1 UUID at millisecond precision.
   *
   * @throws {TypeError} the UUID is not version 1.
   */
  date(): Date {
    this.assertVersion([Version.TIME], "date")
    return TimeUtils.toDate(this.timestamp())
  }

  /**
   * Clock sequence of a version 1 UUID (14 bits) or version 2 UUID (6 bits).
   *
   * @throws {TypeError} the UUID is not version 1 or 2.
   */
  clockSequence(): number {
    const version = this.assertVersion([Version.TIME, Version.DCE], "clockSequence")
    const { clockSeq } = this.fields()

    return version === Version.TIME
      ? clockSeq & CLOCK_SEQ_MASK
      : (clockSeq >>> 8) & DCE_CLOCK_SEQ_HI_MASK
  }

  /**
   * uid, gid or org id embedded in a version 2 UUID.
   *
   * @throws {TypeError} the UUID is not version 2.
   */
  localId(): number {
    this.assertVersion([Version.DCE], "localId")
    return this.fields().timeLow
  }

  /**
   * Node as 12 lowercase hex digits.
   */
  node(): string {
    return NodeResolver.format(this.fields().node)
  }

  isNil(): boolean {
    return this.binary.every((byte) => byte === 0)
  }

  equals(other: UUIDValue): boolean {
    return other instanceof UUIDValue && ByteUtils.equal(this.binary, other.binary)
  }

  /**
   * Byte-wise ordering; usable directly as an Array.prototype.sort comparator
   * via `(a, b) => a.compare(b)`.
   */
  compare(other: UUIDValue): number {
    return ByteUtils.compare(this.binary, other.binary)
  }

  // ─── Static Factories ───────────────────────────────────────────────────

  /**
   * Parses a canonical (36-char) or plain (32-char) UUID string.
   *
   * @throws {TypeError}  input is not a string.
   * @throws {ParseError} INVALID_LENGTH, INVALID_CHARACTER or INVALID_HEX_DIGIT.
   */
  static fromString(input: string): UUIDValue {
    return new UUIDValue(HexEncoder.decode(input))
  }

  static fromBinary(binary: Uint8Array): UUIDValue {
    return new UUIDValue(binary)
  }

  /**
   * Packs named fields as-is; no version or variant is applied.
   */
  static fromFields(fields: UUIDFields): UUIDValue {
    return new UUIDValue(LayoutCodec.pack(fields))
  }

  static isUUIDValue(value: unknown): value is UUIDValue {
    return value instanceof UUIDValue
  }

  private assertVersion(allowed: readonly Version[], accessor: string): Version {
    const version = this.version()

    if (!allowed.includes(version)) {
      throw new TypeError(
        `UUIDValue.${accessor}: not available on a version ${version} UUID ` +
        `(requires version ${allowed.join(" or ")}).`
      )
    }

    return version
  }
}
