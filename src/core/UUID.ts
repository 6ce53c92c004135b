import { NodePlatformIds } from "../platform/PlatformIds"
import type { PlatformIds } from "../platform/PlatformIds"
import { Version } from "../types"
import type { NameScheme, UUIDMetadata } from "../types"
import { createLogger } from "../utils/logger"
import type { Logger } from "../utils/logger"
import type { TimeSource } from "../utils/TimeUtils"
import { ClockSequence } from "./ClockSequence"
import { NodeResolver } from "./NodeResolver"
import type { NodeResolution } from "./NodeResolver"
import { UUIDGenerator } from "./UUIDGenerator"
import type { DceOptions, TimeBasedOptions } from "./UUIDGenerator"
import { UUIDParser } from "./UUIDParser"
import type { ParseResult, UUIDInput } from "./UUIDParser"
import { UUIDValue } from "./UUIDValue"

const NAME_SCHEMES: readonly NameScheme[] = ["canonical-string", "rfc4122"]

/**
 * Input shape for UUID.initialize(). Every field is optional.
 *
 * node:
 *   6 bytes or a MAC string ("01:23:45:67:89:ab"). If omitted, resolved from
 *   UUID_NODE → first hardware interface → random (with warning).
 *
 * clockSequence:
 *   A ClockSequence to share, or a 16-bit seed for a fresh one. Random seed
 *   when omitted.
 *
 * platform:
 *   Source of uid/gid for version 2. Defaults to the running process.
 *
 * timeSource:
 *   100-ns ticks since 1582-10-15. Defaults to the wall clock.
 *
 * nameScheme:
 *   "canonical-string" (default) or "rfc4122"; see NameScheme.
 *
 * logger:
 *   Receives node-resolution diagnostics. Defaults to a console logger.
 */
export interface UUIDInitOptions {
  node?: Uint8Array | string
  clockSequence?: ClockSequence | number
  platform?: PlatformIds
  timeSource?: TimeSource
  nameScheme?: NameScheme
  logger?: Logger
}

/**
 * UUID: RFC 4122 identifier engine.
 *
 * Single entry point for generating and parsing UUIDs. Create one instance
 * per process (or per worker, sharing the clock sequence buffer) and reuse it.
 *
 * Responsibilities:
 *   - Resolves and locks in the node at initialization time
 *   - Owns the clock sequence injected into versions 1 and 2
 *   - Delegates to UUIDGenerator and UUIDParser
 *
 * Usage:
 * const uuid = UUID.initialize({ node: "02:42:ac:12:00:02" })
 *
 * const a = uuid.v1()
 * const b = uuid.v5(Namespace.DNS, "example.org")
 * const meta = uuid.parse(a.toString())
 */
export class UUID {
  private readonly generator: UUIDGenerator
  private readonly clockSequence: ClockSequence
  private readonly nodeResolution: NodeResolution
  private readonly nameScheme: NameScheme

  private constructor(options: UUIDInitOptions) {
    UUID.validateOptions(options)

    const logger = options.logger ?? createLogger()

    this.nodeResolution = NodeResolver.resolve(options.node)

    if (this.nodeResolution.warning) {
      logger.logWarn(this.nodeResolution.warning)
    }

    logger.logDebug("node resolved", {
      node: NodeResolver.format(this.nodeResolution.node),
      source: this.nodeResolution.source,
    })

    this.clockSequence =
      options.clockSequence instanceof ClockSequence
        ? options.clockSequence
        : new ClockSequence({ seed: options.clockSequence })

    this.nameScheme = options.nameScheme ?? "canonical-string"

    this.generator = new UUIDGenerator({
      node: this.nodeResolution.node,
      clockSequence: this.clockSequence,
      platform: options.platform ?? new NodePlatformIds(),
      timeSource: options.timeSource,
      nameScheme: this.nameScheme,
    })
  }

  /**
   * Creates a configured engine. Call once at startup and keep it.
   *
   * @throws {TypeError}  wrong-typed option, malformed node, unknown nameScheme.
   * @throws {RangeError} clock sequence seed outside 0–65535.
   * @throws {GenerationError} ENTROPY_SOURCE_UNAVAILABLE while seeding.
   *
   * @example
   * ```ts
   * const uuid = UUID.initialize({ clockSequence: 0x1234 })
   * ```
   */
  static initialize(options: UUIDInitOptions = {}): UUID {
    return new UUID(options)
  }

  /**
   * Time-based UUID from the configured clock and node.
   *
   * @example
   * ```ts
   * uuid.v1().toString() // "c232ab00-9414-11ec-b3c8-9e6bdeced846"
   * ```
   */
  v1(options?: TimeBasedOptions): UUIDValue {
    return this.generator.v1(options)
  }

  /**
   * DCE security UUID.
   *
   * @example
   * ```ts
   * uuid.v2({ domain: Domain.PERSON })           // current uid
   * uuid.v2({ domain: Domain.ORG, id: 1000 })    // caller-supplied id
   * ```
   */
  v2(options: DceOptions): UUIDValue {
    return this.generator.v2(options)
  }

  v3(namespace: UUIDValue, name: string): UUIDValue {
    return this.generator.v3(namespace, name)
  }

  v4(): UUIDValue {
    return this.generator.v4()
  }

  v5(namespace: UUIDValue, name: string): UUIDValue {
    return this.generator.v5(namespace, name)
  }

  /**
   * @throws {TypeError | RangeError | ParseError | DecodeError} see UUIDParser.parse().
   */
  parse(input: UUIDInput): UUIDMetadata {
    return UUIDParser.parse(input)
  }

  tryParse(input: UUIDInput): ParseResult {
    return UUIDParser.tryParse(input)
  }

  // ─── Stateless shortcuts ─────────────────────────────────────────────────

  static v3(namespace: UUIDValue, name: string, scheme: NameScheme = "canonical-string"): UUIDValue {
    return UUIDGenerator.nameBased(namespace, name, Version.MD5, scheme)
  }

  static v4(): UUIDValue {
    return UUIDGenerator.random()
  }

  static v5(namespace: UUIDValue, name: string, scheme: NameScheme = "canonical-string"): UUIDValue {
    return UUIDGenerator.nameBased(namespace, name, Version.SHA1, scheme)
  }

  // ─── Diagnostics ─────────────────────────────────────────────────────────

  /**
   * Node embedded in every time-based UUID, as 12 hex digits.
   */
  getNode(): string {
    return NodeResolver.format(this.nodeResolution.node)
  }

  getNodeSource(): NodeResolution["source"] {
    return this.nodeResolution.source
  }

  getNameScheme(): NameScheme {
    return this.nameScheme
  }

  getClockSequence(): ClockSequence {
    return this.clockSequence
  }

  // ─── Private Helpers ─────────────────────────────────────────────────────

  /**
   * Validates option types before any state is created. Node format is
   * checked by NodeResolver, seed range by ClockSequence.
   */
  private static validateOptions(options: UUIDInitOptions): void {
    if (options === null || typeof options !== "object" || Array.isArray(options)) {
      throw new TypeError(
        `UUID.initialize: options must be a plain object. Received: ${options === null ? "null" : typeof options}`
      )
    }

    if (
      options.clockSequence !== undefined &&
      !(options.clockSequence instanceof ClockSequence) &&
      typeof options.clockSequence !== "number"
    ) {
      throw new TypeError(
        `UUID.initialize: clockSequence must be a ClockSequence or a numeric seed. ` +
        `Received: ${typeof options.clockSequence}`
      )
    }

    if (options.nameScheme !== undefined && !NAME_SCHEMES.includes(options.nameScheme)) {
      throw new TypeError(
        `UUID.initialize: nameScheme must be one of ${NAME_SCHEMES.join(", ")}. ` +
        `Received: ${String(options.nameScheme)}`
      )
    }

    if (options.timeSource !== undefined && typeof options.timeSource !== "function") {
      throw new TypeError(
        `UUID.initialize: timeSource must be a function returning bigint ticks. ` +
        `Received: ${typeof options.timeSource}`
      )
    }
  }
}
