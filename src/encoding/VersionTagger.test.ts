import { describe, expect, it } from "vitest"
import * as fc from "fast-check"
import { DecodeError } from "../errors/UUIDError"
import { Domain, Variant, Version } from "../types"
import { VersionTagger } from "./VersionTagger"

describe("VersionTagger", () => {
  describe("version", () => {
    it("replaces only the top nibble", () => {
      expect(VersionTagger.setVersion(0xf1ec, Version.TIME)).toBe(0x11ec)
      expect(VersionTagger.setVersion(0x0abc, Version.SHA1)).toBe(0x5abc)
    })

    it("reads back every version it writes", () => {
      fc.assert(
        fc.property(
          fc.integer({ min: 0, max: 0xffff }),
          fc.constantFrom(Version.TIME, Version.DCE, Version.MD5, Version.RAND, Version.SHA1),
          (field, version) => {
            expect(VersionTagger.getVersion(VersionTagger.setVersion(field, version))).toBe(version)
          }
        )
      )
    })

    it.each([0, 6, 7, 15])("rejects version nibble %i", (nibble) => {
      let caught: unknown
      try {
        VersionTagger.getVersion(nibble << 12)
      } catch (err) {
        caught = err
      }

      expect(caught).toBeInstanceOf(DecodeError)
      expect(caught).toMatchObject({ reason: "UNRECOGNIZED_VERSION" })
    })
  })

  describe("variant", () => {
    it("writes binary 10 and keeps the low six bits", () => {
      expect(VersionTagger.setVariant(0xff)).toBe(0xbf)
      expect(VersionTagger.setVariant(0x00)).toBe(0x80)
      expect(VersionTagger.setVariant(0x39)).toBe(0xb9)
    })

    it.each<[number, Variant]>([
      [0x00, Variant.NCS],
      [0x7f, Variant.NCS],
      [0x80, Variant.RFC4122],
      [0xbf, Variant.RFC4122],
      [0xc0, Variant.MICROSOFT],
      [0xdf, Variant.MICROSOFT],
      [0xe0, Variant.FUTURE],
      [0xff, Variant.FUTURE],
    ])("classifies byte %i as %s", (byte, variant) => {
      expect(VersionTagger.getVariant(byte)).toBe(variant)
    })

    it("classifies anything setVariant produced as RFC4122", () => {
      fc.assert(
        fc.property(fc.integer({ min: 0, max: 0xff }), (byte) => {
          expect(VersionTagger.getVariant(VersionTagger.setVariant(byte))).toBe(Variant.RFC4122)
        })
      )
    })
  })

  describe("domain", () => {
    it("accepts PERSON, GROUP and ORG", () => {
      expect(VersionTagger.getDomain(0)).toBe(Domain.PERSON)
      expect(VersionTagger.getDomain(1)).toBe(Domain.GROUP)
      expect(VersionTagger.getDomain(2)).toBe(Domain.ORG)
    })

    it("rejects other values", () => {
      expect(() => VersionTagger.getDomain(3)).toThrow(DecodeError)
    })
  })

  describe("tagBytes", () => {
    it("stamps version and variant in place", () => {
      const bytes = new Uint8Array(16).fill(0xff)
      const tagged = VersionTagger.tagBytes(bytes, Version.RAND)

      expect(tagged).toBe(bytes)
      expect(bytes[6]).toBe(0x4f)
      expect(bytes[8]).toBe(0xbf)
      expect(VersionTagger.versionOf(bytes)).toBe(Version.RAND)
      expect(VersionTagger.variantOf(bytes)).toBe(Variant.RFC4122)
    })

    it("leaves every other byte alone", () => {
      const bytes = Uint8Array.from({ length: 16 }, (_, i) => i)
      VersionTagger.tagBytes(bytes, Version.MD5)

      expect(Array.from(bytes)).toEqual([0, 1, 2, 3, 4, 5, 0x36, 7, 0x88, 9, 10, 11, 12, 13, 14, 15])
    })
  })
})
