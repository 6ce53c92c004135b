import { describe, expect, it } from "vitest"
import * as fc from "fast-check"
import { ParseError } from "../errors/UUIDError"
import { HexEncoder } from "./HexEncoder"

const DNS = "6ba7b810-9dad-11d1-80b4-00c04fd430c8"
const DNS_BYTES = [0x6b, 0xa7, 0xb8, 0x10, 0x9d, 0xad, 0x11, 0xd1, 0x80, 0xb4, 0x00, 0xc0, 0x4f, 0xd4, 0x30, 0xc8]

function decodeError(input: string): ParseError {
  try {
    HexEncoder.decode(input)
  } catch (err) {
    if (err instanceof ParseError) return err
    throw err
  }
  throw new Error(`expected "${input}" to be rejected`)
}

describe("HexEncoder", () => {
  describe("encode", () => {
    it("renders the canonical hyphenated form in lowercase", () => {
      expect(HexEncoder.encode(Uint8Array.from(DNS_BYTES))).toBe(DNS)
    })

    it("renders uppercase on request", () => {
      expect(HexEncoder.encode(Uint8Array.from(DNS_BYTES), "upper")).toBe("6BA7B810-9DAD-11D1-80B4-00C04FD430C8")
    })

    it("renders the plain form", () => {
      expect(HexEncoder.encodePlain(Uint8Array.from(DNS_BYTES))).toBe("6ba7b8109dad11d180b400c04fd430c8")
    })

    it("rejects binaries that are not 16 bytes", () => {
      expect(() => HexEncoder.encode(new Uint8Array(17))).toThrow(RangeError)
    })
  })

  describe("decode", () => {
    it("accepts the hyphenated form in either case", () => {
      expect(Array.from(HexEncoder.decode(DNS))).toEqual(DNS_BYTES)
      expect(Array.from(HexEncoder.decode(DNS.toUpperCase()))).toEqual(DNS_BYTES)
    })

    it("accepts the plain form", () => {
      expect(Array.from(HexEncoder.decode("6BA7B8109DAD11D180B400C04FD430C8"))).toEqual(DNS_BYTES)
    })

    it("trims surrounding ASCII whitespace", () => {
      expect(Array.from(HexEncoder.decode(`  \t${DNS}\r\n`))).toEqual(DNS_BYTES)
    })

    it("does not treat a vertical tab as whitespace", () => {
      const err = decodeError(`\v${DNS}`)

      expect(err.reason).toBe("INVALID_LENGTH")
    })

    it("reports INVALID_LENGTH for a short string", () => {
      expect(decodeError("not-a-uuid").reason).toBe("INVALID_LENGTH")
    })

    it("reports INVALID_LENGTH for a hyphenated string with one digit too many", () => {
      expect(decodeError(`${DNS}0`).reason).toBe("INVALID_LENGTH")
    })

    it("reports INVALID_LENGTH for an empty string", () => {
      expect(decodeError("   ").reason).toBe("INVALID_LENGTH")
    })

    it("reports INVALID_HEX_DIGIT for letters past f", () => {
      const err = decodeError("gggggggg-gggg-gggg-gggg-gggggggggggg")

      expect(err.reason).toBe("INVALID_HEX_DIGIT")
      expect(err.position).toBe(0)
    })

    it("maps a bad digit back to its position in the hyphenated input", () => {
      const err = decodeError("6ba7b810-9dad-11d1-80b4-00c04fd430cz")

      expect(err.reason).toBe("INVALID_HEX_DIGIT")
      expect(err.position).toBe(35)
    })

    it("reports the position of a bad digit in the plain form", () => {
      const err = decodeError("6ba7b8109dad11d180b400c04fd43xc8")

      expect(err.reason).toBe("INVALID_HEX_DIGIT")
      expect(err.position).toBe(29)
    })

    it("reports INVALID_CHARACTER for a misplaced hyphen", () => {
      const err = decodeError("6ba7b810x9dad-11d1-80b4-00c04fd430c8")

      expect(err.reason).toBe("INVALID_CHARACTER")
      expect(err.position).toBe(8)
    })

    it("reports INVALID_CHARACTER for a hyphen inside the plain form", () => {
      const err = decodeError("6ba7b8109d-d11d180b400c04fd430c8")

      expect(err.reason).toBe("INVALID_CHARACTER")
      expect(err.position).toBe(10)
    })

    it("reports INVALID_CHARACTER for punctuation before a bad hex digit", () => {
      const err = decodeError("zba7b810-9dad-11d1-80b4-00c04fd430c!")

      expect(err.reason).toBe("INVALID_CHARACTER")
      expect(err.position).toBe(35)
    })

    it("reports INVALID_CHARACTER for non-ASCII letters", () => {
      expect(decodeError("6ba7b810-9dad-11d1-80b4-00c04fd430cé").reason).toBe("INVALID_CHARACTER")
    })

    it("inverts encode for any 16 bytes in either case", () => {
      fc.assert(
        fc.property(
          fc.uint8Array({ minLength: 16, maxLength: 16 }),
          fc.constantFrom("lower" as const, "upper" as const),
          (bytes, hexCase) => {
            expect(HexEncoder.decode(HexEncoder.encode(bytes, hexCase))).toEqual(bytes)
            expect(HexEncoder.decode(HexEncoder.encodePlain(bytes, hexCase))).toEqual(bytes)
          }
        )
      )
    })
  })
})
