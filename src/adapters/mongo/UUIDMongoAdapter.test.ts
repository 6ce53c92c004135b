import { Binary } from "bson"
import { describe, expect, it } from "vitest"
import { UUIDValue } from "../../core/UUIDValue"
import { UUIDMongoAdapter } from "./UUIDMongoAdapter"

const ID = "6ba7b810-9dad-11d1-80b4-00c04fd430c8"

describe("UUIDMongoAdapter", () => {
  it("stores a UUID as BSON Binary subtype 4", () => {
    const binary = UUIDMongoAdapter.toDatabase(UUIDValue.fromString(ID))

    expect(binary.sub_type).toBe(Binary.SUBTYPE_UUID)
    expect(binary.length()).toBe(16)
    expect(Buffer.from(binary.buffer.subarray(0, binary.length())).toString("hex")).toBe(
      "6ba7b8109dad11d180b400c04fd430c8"
    )
  })

  it("reads back what it stored", () => {
    const uuid = UUIDValue.fromString(ID)

    expect(UUIDMongoAdapter.fromDatabase(UUIDMongoAdapter.toDatabase(uuid)).equals(uuid)).toBe(true)
    expect(UUIDMongoAdapter.toUUIDValue(UUIDMongoAdapter.fromString(ID.toUpperCase())).toString()).toBe(ID)
  })

  it("does not alias the caller's bytes", () => {
    const bytes = UUIDValue.fromString(ID).toBinary()
    const binary = UUIDMongoAdapter.toDatabase(bytes)
    bytes[0] = 0

    expect(UUIDMongoAdapter.fromDatabase(binary).toString()).toBe(ID)
  })

  it("rejects the legacy UUID subtype", () => {
    const legacy = new Binary(Buffer.from("6ba7b8109dad11d180b400c04fd430c8", "hex"), Binary.SUBTYPE_UUID_OLD)

    expect(() => UUIDMongoAdapter.fromDatabase(legacy)).toThrow(
      "UUIDMongoAdapter.fromDatabase: expected BSON Binary subtype 4 (UUID). Received subtype 3."
    )
  })

  it("rejects subtype 4 payloads that are not 16 bytes", () => {
    const short = new Binary(Buffer.alloc(12), Binary.SUBTYPE_UUID)

    expect(() => UUIDMongoAdapter.fromDatabase(short)).toThrow(
      "LayoutCodec: UUID binary must be exactly 16 bytes. Received 12 bytes."
    )
  })

  it("rejects binary input of the wrong length", () => {
    expect(() => UUIDMongoAdapter.toDatabase(new Uint8Array(20))).toThrow(RangeError)
    expect(() => UUIDMongoAdapter.toDatabase(new Uint8Array(20))).toThrow("Received 20 bytes.")
  })
})
