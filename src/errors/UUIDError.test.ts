import { describe, expect, it } from "vitest"
import { DecodeError, GenerationError, ParseError, UUIDError } from "./UUIDError"

describe("UUIDError", () => {
  it("names each subclass and keeps its reason", () => {
    const err = new ParseError("INVALID_HEX_DIGIT", "bad digit", 3)

    expect(err).toBeInstanceOf(UUIDError)
    expect(err).toBeInstanceOf(Error)
    expect(err.name).toBe("ParseError")
    expect(err.reason).toBe("INVALID_HEX_DIGIT")
    expect(err.position).toBe(3)
    expect(new DecodeError("UNRECOGNIZED_VERSION", "v0").name).toBe("DecodeError")
  })

  it("chains the cause of a generation failure", () => {
    const cause = new Error("no entropy")
    const err = new GenerationError("ENTROPY_SOURCE_UNAVAILABLE", "could not read", cause)

    expect(err.cause).toBe(cause)
    expect(new GenerationError("UNSUPPORTED_PLATFORM", "no uid").cause).toBeUndefined()
  })
})
