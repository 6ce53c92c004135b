import crypto from "crypto"
import { GenerationError } from "../errors/UUIDError"

/** Width of the clock sequence field in bits. */
const CLOCK_SEQ_BITS = 14

/** Mask applied to the counter on every hand-out. */
export const CLOCK_SEQ_MASK = (1 << CLOCK_SEQ_BITS) - 1 // 0x3fff

/** Seeds are drawn from, and reduced to, 16 bits. */
const MAX_SEED = 0xffff

/** One Int32 slot holds the counter. */
const COUNTER_BYTES = Int32Array.BYTES_PER_ELEMENT

export interface ClockSequenceOptions {
  /**
   * Fixed 16-bit starting value. Random when omitted.
   */
  seed?: number

  /**
   * Counter storage to share with other instances, including ones on other
   * worker threads. Every instance over the same buffer draws from the same
   * counter. A fresh buffer is allocated when omitted; a shared buffer is
   * seeded only if `seed` is given.
   */
  buffer?: SharedArrayBuffer
}

/**
 * 14-bit clock sequence for time-based UUIDs.
 *
 * The counter is advanced with a single Atomics.add, so concurrent callers
 * (on one thread or several sharing the buffer) each receive a distinct
 * successor modulo 16384. Wraparound is silent.
 *
 * Owned explicitly and injected into the generator; there is no global
 * instance.
 */
export class ClockSequence {
  private readonly counter: Int32Array

  constructor(options: ClockSequenceOptions = {}) {
    if (options.buffer !== undefined) {
      if (!(options.buffer instanceof SharedArrayBuffer) || options.buffer.byteLength < COUNTER_BYTES) {
        throw new TypeError(
          `ClockSequence: buffer must be a SharedArrayBuffer of at least ${COUNTER_BYTES} bytes.`
        )
      }

      this.counter = new Int32Array(options.buffer, 0, 1)

      if (options.seed !== undefined) {
        this.reseed(options.seed)
      }
      return
    }

    this.counter = new Int32Array(new SharedArrayBuffer(COUNTER_BYTES))
    this.reseed(options.seed ?? ClockSequence.randomSeed())
  }

  /**
   * Returns the current value masked to 14 bits and advances the counter.
   */
  next(): number {
    return Atomics.add(this.counter, 0, 1) & CLOCK_SEQ_MASK
  }

  /**
   * Value the next call to next() will return, without advancing.
   */
  peek(): number {
    return Atomics.load(this.counter, 0) & CLOCK_SEQ_MASK
  }

  /**
   * Restarts the counter at a 16-bit seed.
   *
   * @throws {RangeError} seed is not an integer in 0–65535.
   */
  reseed(seed: number): void {
    if (!Number.isInteger(seed) || seed < 0 || seed > MAX_SEED) {
      throw new RangeError(
        `ClockSequence: seed must be an integer between 0 and ${MAX_SEED}. Received: ${seed}`
      )
    }

    Atomics.store(this.counter, 0, seed)
  }

  /**
   * The underlying storage, for handing to another worker.
   */
  get sharedBuffer(): SharedArrayBuffer {
    const { buffer } = this.counter

    if (!(buffer instanceof SharedArrayBuffer)) {
      throw new TypeError("ClockSequence: counter is not backed by a SharedArrayBuffer.")
    }

    return buffer
  }

  /**
   * Draws a random 16-bit seed from the system CSPRNG.
   *
   * @throws {GenerationError} ENTROPY_SOURCE_UNAVAILABLE if the CSPRNG fails.
   */
  static randomSeed(): number {
    try {
      return crypto.randomInt(0, MAX_SEED + 1)
    } catch (err) {
      throw new GenerationError(
        "ENTROPY_SOURCE_UNAVAILABLE",
        `ClockSequence: could not read a random seed. ` +
        `Cause: ${err instanceof Error ? err.message : String(err)}`,
        err
      )
    }
  }
}
