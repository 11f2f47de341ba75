import type { ISyncByteSink } from "./streams_sync.ts";

const MIN_GROWTH = 256;

/**
 * Synchronous byte sink that appends into a growable Uint8Array.
 *
 * `maxAccept` caps the bytes taken per write call, which lets callers
 * exercise partial-write handling against an in-memory sink.
 */
export class SyncGrowableByteSink implements ISyncByteSink {
  #buffer: Uint8Array;
  #length = 0;
  #maxAccept: number;
  #isClosed = false;

  /**
   * Creates a new growable sink.
   *
   * @param initialCapacity Bytes allocated up front.
   * @param maxAccept The maximum number of bytes accepted per write call.
   */
  public constructor(
    initialCapacity = 0,
    maxAccept = Number.POSITIVE_INFINITY,
  ) {
    if (!Number.isSafeInteger(initialCapacity) || initialCapacity < 0) {
      throw new RangeError("initialCapacity must be a non-negative integer");
    }
    if (!(maxAccept > 0)) {
      throw new RangeError("maxAccept must be positive");
    }
    this.#buffer = new Uint8Array(initialCapacity);
    this.#maxAccept = maxAccept;
  }

  /**
   * Appends a prefix of `data` of at most `maxAccept` bytes.
   *
   * @returns The number of bytes appended.
   * @throws Error If the sink has been closed.
   */
  public write(data: Uint8Array): number {
    if (this.#isClosed) {
      throw new Error("Cannot write to a closed sink");
    }
    const size = Math.min(data.length, this.#maxAccept);
    if (size === 0) {
      return 0;
    }
    this.#ensureCapacity(this.#length + size);
    this.#buffer.set(data.subarray(0, size), this.#length);
    this.#length += size;
    return size;
  }

  /**
   * Closes the sink and prevents further writes.
   */
  public close(): void {
    this.#isClosed = true;
  }

  /**
   * Returns the number of bytes written so far.
   */
  public length(): number {
    return this.#length;
  }

  /**
   * Returns a copy of the bytes written so far.
   */
  public toUint8Array(): Uint8Array {
    return this.#buffer.slice(0, this.#length);
  }

  #ensureCapacity(required: number): void {
    if (required <= this.#buffer.length) {
      return;
    }
    const capacity = Math.max(
      required,
      this.#buffer.length * 2,
      MIN_GROWTH,
    );
    const grown = new Uint8Array(capacity);
    grown.set(this.#buffer.subarray(0, this.#length));
    this.#buffer = grown;
  }
}
