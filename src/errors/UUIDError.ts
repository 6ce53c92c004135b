/**
 * Structural check that rejected a UUID string.
 */
export type ParseFailureReason =
  | "INVALID_LENGTH"    // not 36 (hyphenated) or 32 (plain) characters after trimming
  | "INVALID_CHARACTER" // not a letter or digit, or a hyphen in the wrong place
  | "INVALID_HEX_DIGIT" // a letter outside a–f / A–F

/**
 * Field value that is not one this library recognizes.
 */
export type DecodeFailureReason =
  | "UNRECOGNIZED_VERSION"
  | "UNRECOGNIZED_VARIANT"
  | "UNRECOGNIZED_DOMAIN"

/**
 * Platform resource a generator needed but could not read.
 */
export type GenerationFailureReason =
  | "UNSUPPORTED_PLATFORM"       // no uid/gid on this platform
  | "ENTROPY_SOURCE_UNAVAILABLE" // random bytes could not be read

/**
 * Base class for every error this library raises on bad input or an
 * unavailable platform resource. Programmer errors (wrong argument types,
 * out-of-range field values) stay plain TypeError / RangeError.
 */
export abstract class UUIDError<R extends string> extends Error {
  readonly reason: R

  protected constructor(reason: R, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.reason = reason
    this.name = new.target.name
  }
}

export class ParseError extends UUIDError<ParseFailureReason> {
  /**
   * Zero-based index into the trimmed input, when a single character is at fault.
   */
  readonly position?: number

  constructor(reason: ParseFailureReason, message: string, position?: number) {
    super(reason, message)
    this.position = position
  }
}

export class DecodeError extends UUIDError<DecodeFailureReason> {
  constructor(reason: DecodeFailureReason, message: string) {
    super(reason, message)
  }
}

export class GenerationError extends UUIDError<GenerationFailureReason> {
  constructor(reason: GenerationFailureReason, message: string, cause?: unknown) {
    super(reason, message, cause === undefined ? undefined : { cause })
  }
}
