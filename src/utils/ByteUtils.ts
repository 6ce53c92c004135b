/**
 * Byte helpers shared by the value object and the storage adapters.
 */
export class ByteUtils {
  /**
   * True when both views hold the same bytes. Short-circuits, so keep it
   * away from secrets.
   *
   * @throws {TypeError} an argument is not a Uint8Array.
   */
  static equal(a: Uint8Array, b: Uint8Array): boolean {
    ByteUtils.requireBytes(a, "a")
    ByteUtils.requireBytes(b, "b")

    return a.length === b.length && a.every((byte, i) => byte === b[i])
  }

  /**
   * Unsigned lexicographic comparison: negative, zero or positive like
   * Array.prototype.sort expects. A strict prefix sorts first.
   *
   * @throws {TypeError} an argument is not a Uint8Array.
   */
  static compare(a: Uint8Array, b: Uint8Array): number {
    ByteUtils.requireBytes(a, "a")
    ByteUtils.requireBytes(b, "b")

    const length = Math.min(a.length, b.length)

    for (let i = 0; i < length; i++) {
      if (a[i] !== b[i]) {
        return a[i] < b[i] ? -1 : 1
      }
    }

    return Math.sign(a.length - b.length)
  }

  /**
   * Detached copy of a view. Only the view's own range is copied, never the
   * rest of its backing ArrayBuffer.
   */
  static copy(view: Uint8Array): Uint8Array {
    ByteUtils.requireBytes(view, "view")
    return new Uint8Array(view)
  }

  /**
   * Wraps a Uint8Array in a Buffer over the same byte range, without copying.
   */
  static toBuffer(bytes: Uint8Array): Buffer {
    ByteUtils.requireBytes(bytes, "bytes")
    return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  }

  private static requireBytes(value: unknown, label: string): void {
    if (value instanceof Uint8Array) {
      return
    }

    const received = value === null ? "null" : Array.isArray(value) ? "array" : typeof value
    throw new TypeError(`ByteUtils: ${label} must be a Uint8Array or Buffer, got ${received}.`)
  }
}
