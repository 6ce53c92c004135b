import crypto from "crypto"
import { NameHasher } from "../crypto/NameHasher"
import type { NameVersion } from "../crypto/NameHasher"
import { GenerationError } from "../errors/UUIDError"
import { LayoutCodec, UUID_BYTE_LENGTH } from "../encoding/LayoutCodec"
import { VersionTagger } from "../encoding/VersionTagger"
import type { PlatformIds } from "../platform/PlatformIds"
import { Domain, Version } from "../types"
import type { NameScheme } from "../types"
import { MAX_TIMESTAMP, TimeUtils } from "../utils/TimeUtils"
import type { TimeSource } from "../utils/TimeUtils"
import { ClockSequence } from "./ClockSequence"
import { NodeResolver } from "./NodeResolver"
import { UUIDValue } from "./UUIDValue"

const MAX_UINT32 = 0xffffffff

/** Six clock-sequence bits that fit below the variant in clock_seq_hi. */
const CLOCK_SEQ_HI_MASK = 0x3f

export interface UUIDGeneratorConfig {
  /** 6-byte node for versions 1 and 2. */
  node: Uint8Array
  clockSequence: ClockSequence
  platform: PlatformIds
  /** Defaults to the wall clock via TimeUtils.now(). */
  timeSource?: TimeSource
  /** Defaults to "canonical-string". */
  nameScheme?: NameScheme
}

export interface TimeBasedOptions {
  /**
   * 100-ns ticks since 1582-10-15. Read from the time source when omitted.
   */
  timestamp?: bigint
  /** Overrides the configured node for this call. */
  node?: Uint8Array | string
}

export interface DceOptions extends TimeBasedOptions {
  domain: Domain
  /**
   * uid (PERSON), gid (GROUP) or org id (ORG). Required for ORG; read from
   * the platform for PERSON and GROUP when omitted.
   */
  id?: number
}

/**
 * Builds RFC 4122 UUIDs of versions 1–5.
 *
 * Binary layout (16 bytes, big-endian fields):
 *
 *   ┌──────────┬──────────┬─────────────────────┬──────────────┬────────┐
 *   │ time_low │ time_mid │ time_hi_and_version │ clock_seq    │  node  │
 *   │ 4 bytes  │ 2 bytes  │ 2 bytes             │ 2 bytes      │ 6 bytes│
 *   └──────────┴──────────┴─────────────────────┴──────────────┴────────┘
 *
 * Versions 1 and 2 draw from the injected ClockSequence; everything else is
 * a pure function of its inputs plus the entropy source (version 4).
 */
export class UUIDGenerator {
  private readonly node: Uint8Array
  private readonly clockSequence: ClockSequence
  private readonly platform: PlatformIds
  private readonly timeSource: TimeSource
  private readonly nameScheme: NameScheme

  constructor(config: UUIDGeneratorConfig) {
    this.node = NodeResolver.parseNode(config.node)
    this.clockSequence = config.clockSequence
    this.platform = config.platform
    this.timeSource = config.timeSource ?? TimeUtils.now
    this.nameScheme = config.nameScheme ?? "canonical-string"
  }

  /**
   * Time-based UUID: timestamp split across time_low / time_mid / time_hi,
   * 14-bit clock sequence, node.
   *
   * @throws {RangeError} timestamp is negative or wider than 60 bits.
   * @throws {TypeError}  node override is malformed.
   */
  v1(options: TimeBasedOptions = {}): UUIDValue {
    const timestamp = this.resolveTimestamp(options.timestamp)
    const node = this.resolveNode(options.node)
    const sequence = this.clockSequence.next()

    const clockSeqHi = VersionTagger.setVariant((sequence >>> 8) & CLOCK_SEQ_HI_MASK)

    return new UUIDValue(
      LayoutCodec.pack({
        timeLow: Number(timestamp & 0xffffffffn),
        timeMid: Number((timestamp >> 32n) & 0xffffn),
        timeHiAndVersion: VersionTagger.setVersion(Number((timestamp >> 48n) & 0x0fffn), Version.TIME),
        clockSeq: (clockSeqHi << 8) | (sequence & 0xff),
        node,
      })
    )
  }

  /**
   * DCE security UUID: a version 1 layout whose time_low is replaced by a
   * uid, gid or org id and whose clock_seq_low holds the domain.
   *
   * @throws {GenerationError} UNSUPPORTED_PLATFORM when PERSON/GROUP has no
   *                           explicit id and the platform has none.
   * @throws {DecodeError} UNRECOGNIZED_DOMAIN for a domain other than 0–2.
   * @throws {TypeError}  ORG without an id.
   * @throws {RangeError} id is not a uint32; timestamp out of range.
   */
  v2(options: DceOptions): UUIDValue {
    const domain = VersionTagger.getDomain(options.domain)
    const id = this.resolveLocalId(domain, options.id)
    const timestamp = this.resolveTimestamp(options.timestamp)
    const node = this.resolveNode(options.node)
    const sequence = this.clockSequence.next()

    const clockSeqHi = VersionTagger.setVariant((sequence >>> 8) & CLOCK_SEQ_HI_MASK)

    return new UUIDValue(
      LayoutCodec.pack({
        timeLow: id,
        timeMid: Number((timestamp >> 32n) & 0xffffn),
        timeHiAndVersion: VersionTagger.setVersion(Number((timestamp >> 48n) & 0x0fffn), Version.DCE),
        clockSeq: (clockSeqHi << 8) | domain,
        node,
      })
    )
  }

  /**
   * Name-based UUID, version 3, under the configured scheme.
   */
  v3(namespace: UUIDValue, name: string): UUIDValue {
    return UUIDGenerator.nameBased(namespace, name, Version.MD5, this.nameScheme)
  }

  v4(): UUIDValue {
    return UUIDGenerator.random()
  }

  /**
   * Name-based UUID, version 5, under the configured scheme.
   */
  v5(namespace: UUIDValue, name: string): UUIDValue {
    return UUIDGenerator.nameBased(namespace, name, Version.SHA1, this.nameScheme)
  }

  // ─── Stateless strategies ────────────────────────────────────────────────

  /**
   * Hashes namespace + name, truncates to 16 bytes and tags version and
   * variant. Deterministic.
   *
   * @throws {TypeError} namespace is not a UUIDValue, or name is not a string.
   */
  static nameBased(
    namespace: UUIDValue,
    name: string,
    version: NameVersion,
    scheme: NameScheme = "canonical-string"
  ): UUIDValue {
    if (!UUIDValue.isUUIDValue(namespace)) {
      throw new TypeError(
        `UUIDGenerator: namespace must be a UUIDValue (e.g. Namespace.DNS). Received: ${typeof namespace}`
      )
    }

    const hash = NameHasher.digest(namespace.toBinary(), name, version, scheme)
    return new UUIDValue(VersionTagger.tagBytes(hash, version))
  }

  /**
   * 122 random bits from the system CSPRNG, tagged version 4.
   *
   * @throws {GenerationError} ENTROPY_SOURCE_UNAVAILABLE
   */
  static random(): UUIDValue {
    const bytes = new Uint8Array(UUID_BYTE_LENGTH)

    try {
      crypto.randomFillSync(bytes)
    } catch (err) {
      throw new GenerationError(
        "ENTROPY_SOURCE_UNAVAILABLE",
        `UUIDGenerator: could not read ${UUID_BYTE_LENGTH} random bytes. ` +
        `Cause: ${err instanceof Error ? err.message : String(err)}`,
        err
      )
    }

    return new UUIDValue(VersionTagger.tagBytes(bytes, Version.RAND))
  }

  // ─── Private Helpers ─────────────────────────────────────────────────────

  private resolveTimestamp(explicit?: bigint): bigint {
    const timestamp = explicit ?? this.timeSource()

    if (typeof timestamp !== "bigint" || timestamp < 0n || timestamp > MAX_TIMESTAMP) {
      throw new RangeError(
        `UUIDGenerator: timestamp must be a bigint between 0 and 2^60 - 1 ` +
        `(100-ns ticks since 1582-10-15). Received: ${String(timestamp)}`
      )
    }

    return timestamp
  }

  private resolveNode(override?: Uint8Array | string): Uint8Array {
    return override === undefined ? this.node : NodeResolver.parseNode(override, "node override")
  }

  private resolveLocalId(domain: Domain, explicit?: number): number {
    let id: number

    if (explicit !== undefined) {
      id = explicit
    } else if (domain === Domain.PERSON) {
      id = this.platform.currentUserId()
    } else if (domain === Domain.GROUP) {
      id = this.platform.currentGroupId()
    } else {
      throw new TypeError(
        `UUIDGenerator: Domain.ORG requires an explicit id. Pass { domain: Domain.ORG, id }.`
      )
    }

    if (!Number.isInteger(id) || id < 0 || id > MAX_UINT32) {
      throw new RangeError(
        `UUIDGenerator: DCE id must be an integer between 0 and ${MAX_UINT32}. Received: ${id}`
      )
    }

    return id
  }
}
