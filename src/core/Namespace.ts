import { UUIDValue } from "./UUIDValue"

/**
 * Well-known namespace UUIDs for name-based generation (RFC 4122 Appendix C).
 */
export const Namespace = Object.freeze({
  /** Fully-qualified domain names. */
  DNS: UUIDValue.fromString("6ba7b810-9dad-11d1-80b4-00c04fd430c8"),
  /** URLs. */
  URL: UUIDValue.fromString("6ba7b811-9dad-11d1-80b4-00c04fd430c8"),
  /** ISO object identifiers. */
  OID: UUIDValue.fromString("6ba7b812-9dad-11d1-80b4-00c04fd430c8"),
  /** X.500 distinguished names, DER or text. */
  X500: UUIDValue.fromString("6ba7b814-9dad-11d1-80b4-00c04fd430c8"),
})

export type NamespaceName = keyof typeof Namespace
