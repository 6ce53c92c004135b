import type { UUIDFields } from "../types"

/**
 * Byte length of every UUID binary.
 */
export const UUID_BYTE_LENGTH = 16

/**
 * Byte length of the IEEE 802 node field.
 */
export const NODE_BYTE_LENGTH = 6

/**
 * Byte offsets for each field in the RFC 4122 layout.
 *
 *   ┌──────────┬──────────┬─────────────────────┬───────────┬───────────┐
 *   │ time_low │ time_mid │ time_hi_and_version │ clock_seq │   node    │
 *   │ [0–3] 4B │ [4–5] 2B │      [6–7] 2B       │ [8–9] 2B  │ [10–15]6B │
 *   └──────────┴──────────┴─────────────────────┴───────────┴───────────┘
 *
 * Every multi-byte field is big-endian (network order).
 */
const OFFSET_TIME_LOW = 0
const OFFSET_TIME_MID = 4
const OFFSET_TIME_HI_AND_VERSION = 6
const OFFSET_CLOCK_SEQ = 8
const OFFSET_NODE = 10

const MAX_UINT32 = 0xffffffff
const MAX_UINT16 = 0xffff

// ─────────────────────────────────────────────────────────────────────────────
// LayoutCodec
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Packs the five RFC 4122 sub-fields into 16 bytes and unpacks them again.
 *
 * Packing is total over in-range field values and unpacking is total over
 * any 16 bytes: an unpacked layout may carry an unknown version or variant,
 * which is for the tagger to judge, not the codec.
 *
 * Outputs are fresh allocations, and unpack copies the node so the caller
 * can mutate the returned fields freely.
 */
export class LayoutCodec {
  /**
   * Packs named fields into a 16-byte UUID binary.
   *
   * @throws {TypeError}  node is not a Uint8Array.
   * @throws {RangeError} a numeric field is not an integer within its width,
   *                      or node is not exactly 6 bytes.
   */
  static pack(fields: UUIDFields): Uint8Array {
    LayoutCodec.assertUint("timeLow", fields.timeLow, MAX_UINT32)
    LayoutCodec.assertUint("timeMid", fields.timeMid, MAX_UINT16)
    LayoutCodec.assertUint("timeHiAndVersion", fields.timeHiAndVersion, MAX_UINT16)
    LayoutCodec.assertUint("clockSeq", fields.clockSeq, MAX_UINT16)
    LayoutCodec.assertNode(fields.node)

    const out = new Uint8Array(UUID_BYTE_LENGTH)
    const view = new DataView(out.buffer)

    view.setUint32(OFFSET_TIME_LOW, fields.timeLow)
    view.setUint16(OFFSET_TIME_MID, fields.timeMid)
    view.setUint16(OFFSET_TIME_HI_AND_VERSION, fields.timeHiAndVersion)
    view.setUint16(OFFSET_CLOCK_SEQ, fields.clockSeq)
    out.set(fields.node, OFFSET_NODE)

    return out
  }

  /**
   * Splits a 16-byte UUID binary into its five sub-fields.
   *
   * @throws {TypeError}  bytes is not a Uint8Array.
   * @throws {RangeError} bytes is not exactly 16 bytes long.
   */
  static unpack(bytes: Uint8Array): UUIDFields {
    LayoutCodec.assertBinary(bytes)

    // Anchor the view to the exact byte range; bytes may be a subarray.
    const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength)

    return {
      timeLow: view.getUint32(OFFSET_TIME_LOW),
      timeMid: view.getUint16(OFFSET_TIME_MID),
      timeHiAndVersion: view.getUint16(OFFSET_TIME_HI_AND_VERSION),
      clockSeq: view.getUint16(OFFSET_CLOCK_SEQ),
      node: bytes.slice(OFFSET_NODE, OFFSET_NODE + NODE_BYTE_LENGTH),
    }
  }

  /**
   * Throws unless the value is a 16-byte Uint8Array.
   */
  static assertBinary(bytes: Uint8Array): void {
    if (!(bytes instanceof Uint8Array)) {
      throw new TypeError(
        `LayoutCodec: UUID binary must be a Uint8Array. Received: ${typeof bytes}`
      )
    }

    if (bytes.length !== UUID_BYTE_LENGTH) {
      throw new RangeError(
        `LayoutCodec: UUID binary must be exactly ${UUID_BYTE_LENGTH} bytes. ` +
        `Received ${bytes.length} bytes.`
      )
    }
  }

  private static assertUint(name: string, value: number, max: number): void {
    if (!Number.isInteger(value) || value < 0 || value > max) {
      throw new RangeError(
        `LayoutCodec: ${name} must be an integer between 0 and ${max}. Received: ${value}`
      )
    }
  }

  private static assertNode(node: Uint8Array): void {
    if (!(node instanceof Uint8Array)) {
      throw new TypeError(
        `LayoutCodec: node must be a Uint8Array. Received: ${typeof node}`
      )
    }

    if (node.length !== NODE_BYTE_LENGTH) {
      throw new RangeError(
        `LayoutCodec: node must be exactly ${NODE_BYTE_LENGTH} bytes. ` +
        `Received ${node.length} bytes.`
      )
    }
  }
}
