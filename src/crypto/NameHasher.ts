import crypto from "crypto"
import { HexEncoder } from "../encoding/HexEncoder"
import { LayoutCodec, UUID_BYTE_LENGTH } from "../encoding/LayoutCodec"
import { Version } from "../types"
import type { NameScheme } from "../types"

/**
 * Digest backing each name-based version under each scheme.
 *
 * canonical-string:
 *   v3 → SHA-1 (20 bytes, truncated to 16), v5 → MD5 (16 bytes).
 * rfc4122:
 *   v3 → MD5, v5 → SHA-1 truncated to 16 bytes (RFC 4122 §4.3).
 */
const DIGESTS: Record<NameScheme, Record<NameVersion, "sha1" | "md5">> = {
  "canonical-string": { [Version.MD5]: "sha1", [Version.SHA1]: "md5" },
  "rfc4122": { [Version.MD5]: "md5", [Version.SHA1]: "sha1" },
}

export type NameVersion = typeof Version.MD5 | typeof Version.SHA1

// ─────────────────────────────────────────────────────────────────────────────
// NameHasher
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Stateless digest of a namespace UUID and a name, truncated to 16 bytes.
 *
 * The returned bytes are untagged: callers stamp version and variant with
 * VersionTagger.tagBytes().
 */
export class NameHasher {
  /**
   * @param namespace - 16-byte namespace UUID.
   * @param name      - Name to hash, encoded as UTF-8.
   * @param version   - 3 or 5; selects the digest together with the scheme.
   * @param scheme    - How the namespace enters the digest.
   *
   * @returns Fresh 16-byte Uint8Array, owned by the caller.
   *
   * @throws {TypeError}  name is not a string.
   * @throws {RangeError} namespace is not 16 bytes.
   */
  static digest(
    namespace: Uint8Array,
    name: string,
    version: NameVersion,
    scheme: NameScheme = "canonical-string"
  ): Uint8Array {
    LayoutCodec.assertBinary(namespace)

    if (typeof name !== "string") {
      throw new TypeError(
        `NameHasher: name must be a string. Received: ${typeof name}`
      )
    }

    const hash = crypto.createHash(DIGESTS[scheme][version])

    if (scheme === "canonical-string") {
      // The namespace enters as its lowercase hyphenated text, not its bytes.
      hash.update(HexEncoder.encode(namespace, "lower") + name, "utf8")
    } else {
      hash.update(namespace)
      hash.update(name, "utf8")
    }

    const full = hash.digest()

    return new Uint8Array(full.subarray(0, UUID_BYTE_LENGTH))
  }
}
