import { describe, expect, it } from "vitest"
import * as fc from "fast-check"
import { LayoutCodec } from "./LayoutCodec"

const node = Uint8Array.of(0x02, 0x42, 0xac, 0x12, 0x00, 0x02)

describe("LayoutCodec", () => {
  describe("pack", () => {
    it("writes every field big-endian at its offset", () => {
      const bytes = LayoutCodec.pack({
        timeLow: 0xab720268,
        timeMid: 0xb83f,
        timeHiAndVersion: 0x11ec,
        clockSeq: 0xb909,
        node,
      })

      expect(Array.from(bytes)).toEqual([
        0xab, 0x72, 0x02, 0x68, 0xb8, 0x3f, 0x11, 0xec, 0xb9, 0x09, 0x02, 0x42, 0xac, 0x12, 0x00, 0x02,
      ])
    })

    it("rejects a timeLow wider than 32 bits", () => {
      expect(() =>
        LayoutCodec.pack({ timeLow: 0x1_0000_0000, timeMid: 0, timeHiAndVersion: 0, clockSeq: 0, node })
      ).toThrow(RangeError)
    })

    it("rejects negative and fractional fields", () => {
      expect(() =>
        LayoutCodec.pack({ timeLow: 0, timeMid: -1, timeHiAndVersion: 0, clockSeq: 0, node })
      ).toThrow("timeMid must be an integer between 0 and 65535")
      expect(() =>
        LayoutCodec.pack({ timeLow: 0, timeMid: 0, timeHiAndVersion: 1.5, clockSeq: 0, node })
      ).toThrow(RangeError)
    })

    it("rejects a node that is not 6 bytes", () => {
      expect(() =>
        LayoutCodec.pack({ timeLow: 0, timeMid: 0, timeHiAndVersion: 0, clockSeq: 0, node: new Uint8Array(5) })
      ).toThrow("node must be exactly 6 bytes")
    })
  })

  describe("unpack", () => {
    it("reads a subarray without looking past its range", () => {
      const backing = new Uint8Array(20).fill(0xff)
      backing.set(
        [0x00, 0x00, 0x03, 0xe8, 0xc2, 0x2b, 0x21, 0xec, 0xbd, 0x01, 0xd4, 0xbe, 0xd9, 0x40, 0x8e, 0xcc],
        2
      )

      const fields = LayoutCodec.unpack(backing.subarray(2, 18))

      expect(fields.timeLow).toBe(1000)
      expect(fields.timeMid).toBe(0xc22b)
      expect(fields.timeHiAndVersion).toBe(0x21ec)
      expect(fields.clockSeq).toBe(0xbd01)
      expect(Array.from(fields.node)).toEqual([0xd4, 0xbe, 0xd9, 0x40, 0x8e, 0xcc])
    })

    it("returns a node the caller may mutate", () => {
      const bytes = LayoutCodec.pack({ timeLow: 1, timeMid: 2, timeHiAndVersion: 3, clockSeq: 4, node })
      LayoutCodec.unpack(bytes).node[0] = 0xee

      expect(bytes[10]).toBe(0x02)
    })

    it("rejects binaries that are not 16 bytes", () => {
      expect(() => LayoutCodec.unpack(new Uint8Array(15))).toThrow(
        "LayoutCodec: UUID binary must be exactly 16 bytes. Received 15 bytes."
      )
    })
  })

  it("unpack inverts pack for any in-range fields", () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 0, max: 0xffffffff }),
        fc.integer({ min: 0, max: 0xffff }),
        fc.integer({ min: 0, max: 0xffff }),
        fc.integer({ min: 0, max: 0xffff }),
        fc.uint8Array({ minLength: 6, maxLength: 6 }),
        (timeLow, timeMid, timeHiAndVersion, clockSeq, nodeBytes) => {
          const fields = { timeLow, timeMid, timeHiAndVersion, clockSeq, node: nodeBytes }
          expect(LayoutCodec.unpack(LayoutCodec.pack(fields))).toEqual(fields)
        }
      )
    )
  })
})
