/**
 * Generation algorithm tag stored in the high nibble of `time_hi_and_version`.
 */
export const Version = {
  /** Time-based: timestamp + clock sequence + node. */
  TIME: 1,
  /** DCE security: POSIX uid/gid or org id in place of `time_low`. */
  DCE: 2,
  /** Name-based, version 3 (the RFC's MD5 slot). */
  MD5: 3,
  /** Random. */
  RAND: 4,
  /** Name-based, version 5 (the RFC's SHA-1 slot). */
  SHA1: 5,
} as const

export type Version = (typeof Version)[keyof typeof Version]

/**
 * Layout family encoded in the leading bits of `clock_seq_hi_and_reserved`.
 * Only RFC4122 is ever produced; the others are recognized on decode.
 */
export const Variant = {
  NCS: "NCS",
  RFC4122: "RFC4122",
  MICROSOFT: "MICROSOFT",
  FUTURE: "FUTURE",
} as const

export type Variant = (typeof Variant)[keyof typeof Variant]

/**
 * DCE security domain stored in `clock_seq_low` of a version 2 UUID.
 */
export const Domain = {
  PERSON: 0,
  GROUP: 1,
  ORG: 2,
} as const

export type Domain = (typeof Domain)[keyof typeof Domain]

/**
 * Rendering case for hex output.
 */
export type HexCase = "lower" | "upper"

/**
 * How name-based UUIDs build their digest input.
 *
 *   "canonical-string" — lowercase hyphenated namespace string + name,
 *                        v3 = SHA-1 truncated to 16 bytes, v5 = MD5.
 *   "rfc4122"          — raw namespace bytes + name,
 *                        v3 = MD5, v5 = SHA-1 truncated to 16 bytes.
 */
export type NameScheme = "canonical-string" | "rfc4122"

/**
 * The five RFC 4122 sub-fields of a UUID, as unsigned integers.
 */
export interface UUIDFields {
  /** Bytes 0–3, uint32. */
  timeLow: number

  /** Bytes 4–5, uint16. */
  timeMid: number

  /** Bytes 6–7, uint16. Top 4 bits are the version. */
  timeHiAndVersion: number

  /**
   * Bytes 8–9, uint16: `clock_seq_hi_and_reserved << 8 | clock_seq_low`.
   * The top bits of the high byte hold the variant.
   */
  clockSeq: number

  /** Bytes 10–15. IEEE 802 address, or hash/random bits. */
  node: Uint8Array
}

/**
 * Parsed metadata extracted from a UUID.
 */
export interface UUIDMetadata {
  /**
   * Lowercase canonical string.
   */
  uuid: string

  version: Version

  variant: Variant

  fields: UUIDFields

  /**
   * 60-bit count of 100-ns intervals since 1582-10-15.
   * Present for version 1 only; version 2 keeps just the high 28 bits.
   */
  timestamp?: bigint

  /**
   * Creation time derived from `timestamp` (version 1 only).
   */
  date?: Date

  /**
   * 14-bit clock sequence (version 1) or its 6 high bits (version 2).
   */
  clockSequence?: number

  /**
   * Node as 12 lowercase hex digits (versions 1 and 2).
   */
  node?: string

  /** Version 2 only, and only when clock_seq_low holds 0, 1 or 2. */
  domain?: Domain

  /** Version 2 only: the uid, gid or org id in `time_low`. */
  localId?: number
}
