import crypto from "crypto"
import os from "os"
import { GenerationError } from "../errors/UUIDError"
import { NODE_BYTE_LENGTH } from "../encoding/LayoutCodec"

/**
 * Environment variable consulted when no node is configured.
 */
export const NODE_ENV_VAR = "UUID_NODE"

/**
 * Multicast bit of the first octet. Set on random nodes so they can never
 * collide with a real IEEE 802 address (RFC 4122 §4.5).
 */
const MULTICAST_BIT = 0x01

/** `aa:bb:cc:dd:ee:ff`, `aa-bb-cc-dd-ee-ff` or `aabbccddeeff`. */
const MAC_PATTERN = /^[0-9a-f]{2}([:-]?)[0-9a-f]{2}(?:\1[0-9a-f]{2}){4}$/i

export interface NodeResolution {
  /** Resolved 6-byte node written into every time-based UUID. */
  node: Uint8Array
  /** Where the value came from, for startup diagnostics. */
  source: "explicit" | "env" | "network_interface" | "random"
  /** Set when source is "random"; callers should log it. */
  warning?: string
}

/**
 * Resolves the 48-bit node for time-based UUIDs in priority order:
 *
 *   1. Explicit config      — bytes or a MAC string
 *   2. UUID_NODE env var    — MAC string
 *   3. Network interface    — first non-internal, non-zero MAC
 *   4. Random fallback      — multicast bit set; warns
 */
export class NodeResolver {
  /**
   * @throws {TypeError}  explicit or env value is not a 6-byte MAC.
   * @throws {GenerationError} ENTROPY_SOURCE_UNAVAILABLE if the random fallback fails.
   */
  static resolve(explicitNode?: Uint8Array | string): NodeResolution {
    if (explicitNode !== undefined) {
      return { node: NodeResolver.parseNode(explicitNode, "explicit node"), source: "explicit" }
    }

    const fromEnv = process.env[NODE_ENV_VAR]
    if (fromEnv && fromEnv.trim().length > 0) {
      return { node: NodeResolver.parseNode(fromEnv.trim(), NODE_ENV_VAR), source: "env" }
    }

    const fromInterface = NodeResolver.fromNetworkInterfaces()
    if (fromInterface) {
      return { node: fromInterface, source: "network_interface" }
    }

    const node = NodeResolver.randomNode()
    return {
      node,
      source: "random",
      warning:
        `node randomly assigned (${NodeResolver.format(node)}). ` +
        `No network interface exposed a hardware address. Time-based UUIDs stay unique ` +
        `within this process; set ${NODE_ENV_VAR} or pass { node } for a stable node.`,
    }
  }

  /**
   * Accepts 6 bytes or a MAC string in colon, hyphen or bare hex form.
   * Returns a fresh copy.
   *
   * @throws {TypeError} value is neither.
   */
  static parseNode(value: Uint8Array | string, label = "node"): Uint8Array {
    if (value instanceof Uint8Array) {
      if (value.length !== NODE_BYTE_LENGTH) {
        throw new TypeError(
          `NodeResolver: ${label} must be exactly ${NODE_BYTE_LENGTH} bytes. ` +
          `Received ${value.length} bytes.`
        )
      }
      return new Uint8Array(value)
    }

    if (typeof value !== "string" || !MAC_PATTERN.test(value)) {
      throw new TypeError(
        `NodeResolver: ${label} must be 6 bytes or a MAC address such as ` +
        `"01:23:45:67:89:ab". Received: ${JSON.stringify(value)}`
      )
    }

    const hex = value.replace(/[:-]/g, "")
    const node = new Uint8Array(NODE_BYTE_LENGTH)

    for (let i = 0; i < NODE_BYTE_LENGTH; i++) {
      node[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16)
    }

    return node
  }

  /**
   * Twelve lowercase hex digits.
   */
  static format(node: Uint8Array): string {
    return Array.from(node, (byte) => byte.toString(16).padStart(2, "0")).join("")
  }

  static randomNode(): Uint8Array {
    const node = new Uint8Array(NODE_BYTE_LENGTH)

    try {
      crypto.randomFillSync(node)
    } catch (err) {
      throw new GenerationError(
        "ENTROPY_SOURCE_UNAVAILABLE",
        `NodeResolver: could not read random bytes for the node. ` +
        `Cause: ${err instanceof Error ? err.message : String(err)}`,
        err
      )
    }

    node[0] |= MULTICAST_BIT
    return node
  }

  private static fromNetworkInterfaces(): Uint8Array | undefined {
    const interfaces = os.networkInterfaces()

    for (const name of Object.keys(interfaces).sort()) {
      for (const info of interfaces[name] ?? []) {
        if (info.internal || !MAC_PATTERN.test(info.mac)) {
          continue
        }

        const node = NodeResolver.parseNode(info.mac)
        if (node.some((byte) => byte !== 0)) {
          return node
        }
      }
    }

    return undefined
  }
}
