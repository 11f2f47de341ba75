import type {
  ISyncByteSink,
  ISyncByteSource,
} from "../streams/streams_sync.ts";
import { SyncFixedSizeByteSource } from "../streams/fixed_size_byte_source_sync.ts";

/** Encodes an ASCII string into bytes. */
export const ascii = (text: string): Uint8Array =>
  Uint8Array.from(text, (char) => char.charCodeAt(0));

/** Builds `length` bytes whose values follow `index % 251`. */
export const patternBytes = (length: number): Uint8Array =>
  Uint8Array.from({ length }, (_, index) => index % 251);

/**
 * Source that records every read call made against a fixed byte sequence.
 */
export class CountingSource implements ISyncByteSource {
  readonly #inner: SyncFixedSizeByteSource;
  /** Number of read calls. */
  calls = 0;
  /** Bytes handed out so far. */
  delivered = 0;

  constructor(bytes: Uint8Array, maxChunk?: number) {
    this.#inner = new SyncFixedSizeByteSource(bytes, maxChunk);
  }

  read(target: Uint8Array): number | undefined {
    this.calls++;
    const count = this.#inner.read(target);
    if (count !== undefined) {
      this.delivered += count;
    }
    return count;
  }
}

/**
 * Source that delivers `bytes` and then throws `error` instead of reporting
 * end of input.
 */
export class FailingSource implements ISyncByteSource {
  readonly #bytes: Uint8Array;
  readonly #error: Error;
  #offset = 0;

  constructor(bytes: Uint8Array, error: Error) {
    this.#bytes = bytes;
    this.#error = error;
  }

  read(target: Uint8Array): number | undefined {
    if (this.#offset >= this.#bytes.length) {
      throw this.#error;
    }
    const size = Math.min(target.length, this.#bytes.length - this.#offset);
    target.set(this.#bytes.subarray(this.#offset, this.#offset + size));
    this.#offset += size;
    return size;
  }
}

/** Source that never produces data nor reports end of input. */
export class StalledSource implements ISyncByteSource {
  calls = 0;

  read(_target: Uint8Array): number | undefined {
    this.calls++;
    return 0;
  }
}

/** Source that reports more bytes than it was asked for. */
export class OverreportingSource implements ISyncByteSource {
  read(target: Uint8Array): number | undefined {
    return target.length + 1;
  }
}

/**
 * Sink that records the size of every write and accepts at most
 * `maxAccept` bytes per call.
 */
export class RecordingSink implements ISyncByteSink {
  readonly #maxAccept: number;
  readonly #chunks: Uint8Array[] = [];
  /** Sizes accepted per write call. */
  readonly accepted: number[] = [];

  constructor(maxAccept = Number.POSITIVE_INFINITY) {
    this.#maxAccept = maxAccept;
  }

  write(data: Uint8Array): number {
    const size = Math.min(data.length, this.#maxAccept);
    this.#chunks.push(data.slice(0, size));
    this.accepted.push(size);
    return size;
  }

  bytes(): Uint8Array {
    const total = this.#chunks.reduce((sum, chunk) => sum + chunk.length, 0);
    const result = new Uint8Array(total);
    let offset = 0;
    for (const chunk of this.#chunks) {
      result.set(chunk, offset);
      offset += chunk.length;
    }
    return result;
  }
}

/** Sink that accepts `limit` bytes in total and then throws `error`. */
export class FailingSink implements ISyncByteSink {
  readonly #error: Error;
  #remaining: number;

  constructor(limit: number, error: Error) {
    this.#remaining = limit;
    this.#error = error;
  }

  write(data: Uint8Array): number {
    if (this.#remaining === 0) {
      throw this.#error;
    }
    const size = Math.min(data.length, this.#remaining);
    this.#remaining -= size;
    return size;
  }
}

/** Sink that never accepts anything. */
export class StalledSink implements ISyncByteSink {
  calls = 0;

  write(_data: Uint8Array): number {
    this.calls++;
    return 0;
  }
}
