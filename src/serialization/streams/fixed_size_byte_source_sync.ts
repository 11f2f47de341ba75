import type { ISyncByteSource } from "./streams_sync.ts";

/**
 * Synchronous byte source backed by a fixed Uint8Array.
 * Data is delivered sequentially, at most `maxChunk` bytes per read, until
 * the array is exhausted.
 *
 * @example
 * ```ts
 * const source = new SyncFixedSizeByteSource(new Uint8Array([1, 2, 3]), 2);
 * const target = new Uint8Array(3);
 * source.read(target); // 2
 * source.read(target.subarray(2)); // 1
 * source.read(target); // undefined
 * ```
 */
export class SyncFixedSizeByteSource implements ISyncByteSource {
  #source: Uint8Array;
  #maxChunk: number;
  #offset = 0;
  #isClosed = false;

  /**
   * Creates a new fixed-size source.
   *
   * @param source The bytes to deliver. An ArrayBuffer is wrapped, not copied.
   * @param maxChunk The maximum number of bytes returned per read call.
   */
  public constructor(
    source: Uint8Array | ArrayBuffer,
    maxChunk = Number.POSITIVE_INFINITY,
  ) {
    if (!(maxChunk > 0)) {
      throw new RangeError("maxChunk must be positive");
    }
    this.#source = source instanceof Uint8Array
      ? source
      : new Uint8Array(source);
    this.#maxChunk = maxChunk;
  }

  /**
   * Copies the next bytes into `target`.
   *
   * @returns The number of bytes copied, or undefined if the source is
   * exhausted or closed.
   */
  public read(target: Uint8Array): number | undefined {
    if (this.#isClosed || this.#offset >= this.#source.length) {
      return undefined;
    }
    const size = Math.min(
      target.length,
      this.#maxChunk,
      this.#source.length - this.#offset,
    );
    target.set(this.#source.subarray(this.#offset, this.#offset + size));
    this.#offset += size;
    return size;
  }

  /**
   * Closes the source; later reads report end of input.
   */
  public close(): void {
    this.#isClosed = true;
  }

  /**
   * Returns the number of bytes not yet delivered.
   */
  public remaining(): number {
    return this.#isClosed ? 0 : this.#source.length - this.#offset;
  }
}
