import os from "os"
import { afterEach, describe, expect, it, vi } from "vitest"
import { NODE_ENV_VAR, NodeResolver } from "./NodeResolver"

function networkInterface(mac: string, internal: boolean): os.NetworkInterfaceInfo {
  return {
    address: internal ? "127.0.0.1" : "192.168.1.20",
    netmask: "255.255.255.0",
    family: "IPv4",
    mac,
    internal,
    cidr: null,
  }
}

describe("NodeResolver", () => {
  afterEach(() => {
    vi.unstubAllEnvs()
    vi.restoreAllMocks()
  })

  describe("parseNode", () => {
    it.each(["02:42:ac:12:00:02", "02-42-AC-12-00-02", "0242ac120002"])("accepts %s", (mac) => {
      expect(Array.from(NodeResolver.parseNode(mac))).toEqual([0x02, 0x42, 0xac, 0x12, 0x00, 0x02])
    })

    it("copies byte input", () => {
      const bytes = Uint8Array.of(1, 2, 3, 4, 5, 6)
      const node = NodeResolver.parseNode(bytes)
      bytes[0] = 9

      expect(node[0]).toBe(1)
    })

    it.each(["02:42:ac:12:00", "02:42-ac:12:00:02", "zz:42:ac:12:00:02", ""])("rejects %j", (mac) => {
      expect(() => NodeResolver.parseNode(mac)).toThrow(TypeError)
    })

    it("rejects byte input that is not 6 bytes", () => {
      expect(() => NodeResolver.parseNode(new Uint8Array(8), "explicit node")).toThrow(
        "NodeResolver: explicit node must be exactly 6 bytes. Received 8 bytes."
      )
    })
  })

  it("formats a node as 12 lowercase hex digits", () => {
    expect(NodeResolver.format(Uint8Array.of(0xd4, 0xbe, 0xd9, 0x40, 0x8e, 0xcc))).toBe("d4bed9408ecc")
  })

  describe("resolve", () => {
    it("prefers an explicit node over the environment", () => {
      vi.stubEnv(NODE_ENV_VAR, "aa:aa:aa:aa:aa:aa")

      const resolution = NodeResolver.resolve("02:42:ac:12:00:02")

      expect(resolution.source).toBe("explicit")
      expect(NodeResolver.format(resolution.node)).toBe("0242ac120002")
      expect(resolution.warning).toBeUndefined()
    })

    it("reads the environment variable next", () => {
      vi.stubEnv(NODE_ENV_VAR, " 02-42-ac-12-00-03 ")

      const resolution = NodeResolver.resolve()

      expect(resolution.source).toBe("env")
      expect(NodeResolver.format(resolution.node)).toBe("0242ac120003")
    })

    it("fails loudly on a malformed environment value", () => {
      vi.stubEnv(NODE_ENV_VAR, "not-a-mac")

      expect(() => NodeResolver.resolve()).toThrow(`NodeResolver: ${NODE_ENV_VAR} must be 6 bytes`)
    })

    it("takes the first non-internal, non-zero hardware address", () => {
      vi.stubEnv(NODE_ENV_VAR, "")
      vi.spyOn(os, "networkInterfaces").mockReturnValue({
        lo: [networkInterface("00:00:00:00:00:00", true)],
        eth0: [networkInterface("00:00:00:00:00:00", false)],
        eth1: [networkInterface("3c:22:fb:10:20:30", false)],
      })

      const resolution = NodeResolver.resolve()

      expect(resolution.source).toBe("network_interface")
      expect(NodeResolver.format(resolution.node)).toBe("3c22fb102030")
    })

    it("falls back to a random multicast node with a warning", () => {
      vi.stubEnv(NODE_ENV_VAR, "")
      vi.spyOn(os, "networkInterfaces").mockReturnValue({
        lo: [networkInterface("00:00:00:00:00:00", true)],
      })

      const resolution = NodeResolver.resolve()

      expect(resolution.source).toBe("random")
      expect(resolution.node[0] & 0x01).toBe(1)
      expect(resolution.warning).toContain(`node randomly assigned (${NodeResolver.format(resolution.node)})`)
    })
  })

  it("sets the multicast bit on every random node", () => {
    for (let i = 0; i < 50; i++) {
      expect(NodeResolver.randomNode()[0] & 0x01).toBe(1)
    }
  })
})
