import type { ByteOrder } from "./byte_order.ts";
import { assertTransferCount, assertValidLength } from "./conversion.ts";
import {
  MAX_CONSECUTIVE_EMPTY_TRANSFERS,
  type ScalarSize,
  SyncStreamState,
} from "./stream_state.ts";
import {
  NoProgressError,
  UnboundStreamError,
  UnexpectedEndOfInputError,
} from "./stream_errors.ts";
import type { ISyncByteSource } from "./streams/streams_sync.ts";
import { SyncFixedSizeByteSource } from "./streams/fixed_size_byte_source_sync.ts";

/** Initial capacity of the lookahead buffer. */
const DEFAULT_PEEK_CAPACITY = 64;

/** Extra bytes allocated whenever the lookahead buffer has to grow. */
const PEEK_GROWTH_INCREMENT = 64;

/**
 * Options accepted by {@link SyncSequentialReader}.
 */
export interface SyncSequentialReaderOptions {
  /** Size of the scratch chunk used by `discard` (default 1024). */
  chunkSize?: number;
  /** Initial capacity of the lookahead buffer (default 64). */
  initialPeekCapacity?: number;
}

/**
 * Reads from `source` until `target` is full or the source is exhausted.
 * Partial reads are retried; `onProgress` sees every non-empty transfer.
 *
 * @param streamOffset Stream offset of `target[0]`, for error reporting.
 * @returns The number of bytes placed into `target`.
 */
function fillFromSource(
  source: ISyncByteSource,
  target: Uint8Array,
  streamOffset: number,
  onProgress?: (count: number) => void,
): number {
  let filled = 0;
  let emptyReads = 0;
  while (filled < target.length) {
    const count = source.read(
      filled === 0 ? target : target.subarray(filled),
    );
    if (count === undefined) {
      break;
    }
    assertTransferCount(count, target.length - filled, "source.read()");
    if (count === 0) {
      emptyReads++;
      if (emptyReads >= MAX_CONSECUTIVE_EMPTY_TRANSFERS) {
        throw new NoProgressError(streamOffset + filled, emptyReads);
      }
      continue;
    }
    emptyReads = 0;
    filled += count;
    onProgress?.(count);
  }
  return filled;
}

/**
 * Sequential binary reader over an {@link ISyncByteSource}.
 *
 * Decodes fixed-width unsigned integers and IEEE-754 floats under a
 * selectable byte order and supports lookahead through {@link peek}. Peeked
 * bytes are retained and delivered to the next reads before the source is
 * read again; {@link getPosition} only counts bytes handed to real reads.
 *
 * A zero-length request always succeeds, even when no source is bound.
 *
 * @example
 * ```ts
 * const reader = SyncSequentialReader.fromBytes(
 *   new Uint8Array([0xd2, 0x04, 0x00, 0x00]),
 *   LittleEndian,
 * );
 * const header = reader.peekBytes(2); // [0xd2, 0x04], position stays 0
 * reader.readUint32(); // 1234, position 4
 * ```
 */
export class SyncSequentialReader implements ISyncByteSource {
  #source: ISyncByteSource | undefined;
  readonly #state: SyncStreamState;

  // Bytes in [#peekConsumed, #peekFilled) were fetched by peek() and not
  // yet delivered to a read.
  #peekBuffer: Uint8Array;
  #peekFilled = 0;
  #peekConsumed = 0;

  /**
   * Creates a reader bound to `source`.
   * @param source The byte source, or undefined for an unbound reader.
   * @param byteOrder Layout for typed reads, or undefined to disable them.
   * @param options Scratch and lookahead buffer sizing.
   */
  constructor(
    source: ISyncByteSource | undefined,
    byteOrder: ByteOrder | undefined,
    options: SyncSequentialReaderOptions = {},
  ) {
    const peekCapacity = options.initialPeekCapacity ?? DEFAULT_PEEK_CAPACITY;
    if (!Number.isSafeInteger(peekCapacity) || peekCapacity < 0) {
      throw new RangeError(
        `initialPeekCapacity must be a non-negative integer. Got initialPeekCapacity=${peekCapacity}`,
      );
    }
    this.#source = source;
    this.#state = new SyncStreamState(byteOrder, options.chunkSize);
    this.#peekBuffer = new Uint8Array(peekCapacity);
  }

  /**
   * Creates a reader over an in-memory byte sequence.
   */
  static fromBytes(
    bytes: Uint8Array | ArrayBuffer,
    byteOrder: ByteOrder | undefined,
    options?: SyncSequentialReaderOptions,
  ): SyncSequentialReader {
    return new SyncSequentialReader(
      new SyncFixedSizeByteSource(bytes),
      byteOrder,
      options,
    );
  }

  /** Returns the number of bytes consumed so far. */
  getPosition(): number {
    return this.#state.position;
  }

  /** Returns the active byte order, or undefined when unset. */
  getByteOrder(): ByteOrder | undefined {
    return this.#state.byteOrder;
  }

  /**
   * Switches the byte order. Can be done between any two operations;
   * buffered lookahead bytes are unaffected.
   */
  setByteOrder(byteOrder: ByteOrder | undefined): void {
    this.#state.byteOrder = byteOrder;
  }

  /**
   * Rebinds the reader to `source`, zeroes the position and abandons any
   * bytes peeked from the previous source.
   */
  reset(
    source: ISyncByteSource | undefined,
    byteOrder: ByteOrder | undefined,
  ): void {
    this.#source = source;
    this.#state.reset(byteOrder);
    this.#peekFilled = 0;
    this.#peekConsumed = 0;
  }

  /**
   * Performs a single partial read. Pending lookahead bytes are drained
   * first; otherwise the source is read once.
   *
   * @returns The number of bytes read, or undefined at end of input.
   */
  read(target: Uint8Array): number | undefined {
    if (target.length === 0) {
      return 0;
    }
    const source = this.#requireSource(`read(length=${target.length})`);
    const pending = this.#pendingPeekBytes();
    if (pending > 0) {
      const size = Math.min(pending, target.length);
      this.#takePeeked(target, size);
      return size;
    }
    const count = source.read(target);
    if (count === undefined) {
      return undefined;
    }
    assertTransferCount(count, target.length, "source.read()");
    this.#state.position += count;
    return count;
  }

  /** Reads one byte. */
  readByte(): number {
    this.#readFully(this.#state.scalarBytes(1), "readByte()");
    return this.#state.scalarView.getUint8(0);
  }

  /**
   * Reads exactly `length` bytes into a new array.
   * @throws {UnexpectedEndOfInputError} if the source runs out first.
   */
  readBytes(length: number): Uint8Array {
    assertValidLength("readBytes()", length);
    const target = new Uint8Array(length);
    this.#readFully(target, `readBytes(${length})`);
    return target;
  }

  /**
   * Fills `target` completely.
   * @throws {UnexpectedEndOfInputError} if the source runs out first.
   */
  readInto(target: Uint8Array): void {
    this.#readFully(target, `readInto(length=${target.length})`);
  }

  /** Reads an unsigned 16-bit integer in the current byte order. */
  readUint16(): number {
    const littleEndian = this.#readScalar("readUint16()", 2);
    return this.#state.scalarView.getUint16(0, littleEndian);
  }

  /** Reads an unsigned 32-bit integer in the current byte order. */
  readUint32(): number {
    const littleEndian = this.#readScalar("readUint32()", 4);
    return this.#state.scalarView.getUint32(0, littleEndian);
  }

  /** Reads an unsigned 64-bit integer in the current byte order. */
  readUint64(): bigint {
    const littleEndian = this.#readScalar("readUint64()", 8);
    return this.#state.scalarView.getBigUint64(0, littleEndian);
  }

  /** Reads a 32-bit IEEE 754 float in the current byte order. */
  readFloat32(): number {
    const littleEndian = this.#readScalar("readFloat32()", 4);
    return this.#state.scalarView.getFloat32(0, littleEndian);
  }

  /** Reads a 64-bit IEEE 754 float in the current byte order. */
  readFloat64(): number {
    const littleEndian = this.#readScalar("readFloat64()", 8);
    return this.#state.scalarView.getFloat64(0, littleEndian);
  }

  /**
   * Consumes and drops `length` bytes. Bytes pass through the chunk scratch
   * buffer, so memory use does not depend on `length`.
   */
  discard(length: number): void {
    assertValidLength("discard()", length);
    const operation = `discard(${length})`;
    const chunk = this.#state.chunk;
    let remaining = length;
    while (remaining > 0) {
      const size = Math.min(remaining, chunk.length);
      this.#readFully(
        size === chunk.length ? chunk : chunk.subarray(0, size),
        operation,
      );
      remaining -= size;
    }
  }

  /**
   * Fills `target` with the upcoming bytes without consuming them.
   *
   * Repeated peeks without an intervening read see the same bytes; a longer
   * peek extends the lookahead and a shorter one returns its prefix. If the
   * source runs out, previously peeked bytes remain pending.
   *
   * @throws {UnexpectedEndOfInputError} if the source cannot supply
   * `target.length` upcoming bytes.
   */
  peek(target: Uint8Array): void {
    const length = target.length;
    if (length === 0) {
      return;
    }
    const source = this.#requireSource(`peek(length=${length})`);
    const pending = this.#pendingPeekBytes();
    if (pending >= length) {
      target.set(
        this.#peekBuffer.subarray(
          this.#peekConsumed,
          this.#peekConsumed + length,
        ),
      );
      return;
    }
    if (pending === 0) {
      this.#peekFilled = 0;
      this.#peekConsumed = 0;
    }

    const need = length - pending;
    this.#reservePeekCapacity(need);
    const fetched = fillFromSource(
      source,
      this.#peekBuffer.subarray(this.#peekFilled, this.#peekFilled + need),
      this.#state.position + pending,
    );
    if (fetched < need) {
      throw new UnexpectedEndOfInputError(
        this.#state.position,
        length,
        pending + fetched,
      );
    }
    this.#peekFilled += need;
    target.set(
      this.#peekBuffer.subarray(this.#peekConsumed, this.#peekFilled),
    );
  }

  /**
   * Returns a copy of the next `length` bytes without consuming them.
   */
  peekBytes(length: number): Uint8Array {
    assertValidLength("peekBytes()", length);
    const target = new Uint8Array(length);
    this.peek(target);
    return target;
  }

  /**
   * @internal Test-only view of the lookahead bookkeeping.
   */
  _testOnlyPeekState(): { capacity: number; filled: number; consumed: number } {
    return {
      capacity: this.#peekBuffer.length,
      filled: this.#peekFilled,
      consumed: this.#peekConsumed,
    };
  }

  #pendingPeekBytes(): number {
    return this.#peekFilled - this.#peekConsumed;
  }

  #requireSource(operation: string): ISyncByteSource {
    if (this.#source === undefined) {
      throw new UnboundStreamError(operation, "reader");
    }
    return this.#source;
  }

  /**
   * Delivers `size` pending lookahead bytes into the front of `target`.
   */
  #takePeeked(target: Uint8Array, size: number): void {
    target.set(
      this.#peekBuffer.subarray(this.#peekConsumed, this.#peekConsumed + size),
    );
    this.#peekConsumed += size;
    this.#state.position += size;
  }

  /**
   * Reads exactly `target.length` bytes, pending lookahead bytes first.
   * Position advances with every byte delivered, so a failure leaves it at
   * the number of bytes actually obtained.
   */
  #readFully(target: Uint8Array, operation: string): void {
    const length = target.length;
    if (length === 0) {
      return;
    }
    const source = this.#requireSource(operation);
    const start = this.#state.position;

    let filled = 0;
    const pending = this.#pendingPeekBytes();
    if (pending > 0) {
      filled = Math.min(pending, length);
      this.#takePeeked(target, filled);
      if (filled === length) {
        return;
      }
    }

    const obtained = fillFromSource(
      source,
      filled === 0 ? target : target.subarray(filled),
      start + filled,
      (count) => {
        this.#state.position += count;
      },
    );
    if (filled + obtained < length) {
      throw new UnexpectedEndOfInputError(start, length, filled + obtained);
    }
  }

  /**
   * Reads a primitive into the scalar scratch buffer.
   * @returns Whether the value is laid out little-endian.
   */
  #readScalar(operation: string, size: ScalarSize): boolean {
    this.#requireSource(operation);
    const byteOrder = this.#state.requireByteOrder(operation);
    this.#readFully(this.#state.scalarBytes(size), operation);
    return byteOrder.littleEndian;
  }

  /**
   * Makes room for `need` more bytes after the fetched lookahead content.
   * Pending bytes are moved to the front of the buffer; the buffer is only
   * reallocated when that is not enough.
   */
  #reservePeekCapacity(need: number): void {
    if (this.#peekFilled + need <= this.#peekBuffer.length) {
      return;
    }
    const pending = this.#pendingPeekBytes();
    if (pending + need <= this.#peekBuffer.length) {
      this.#peekBuffer.copyWithin(0, this.#peekConsumed, this.#peekFilled);
    } else {
      const grown = new Uint8Array(pending + need + PEEK_GROWTH_INCREMENT);
      grown.set(
        this.#peekBuffer.subarray(this.#peekConsumed, this.#peekFilled),
      );
      this.#peekBuffer = grown;
    }
    this.#peekConsumed = 0;
    this.#peekFilled = pending;
  }
}
