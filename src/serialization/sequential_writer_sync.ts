import type { ByteOrder } from "./byte_order.ts";
import {
  assertTransferCount,
  assertUnsignedBigInt,
  assertUnsignedInteger,
  assertValidLength,
} from "./conversion.ts";
import {
  MAX_CONSECUTIVE_EMPTY_TRANSFERS,
  type ScalarSize,
  SyncStreamState,
} from "./stream_state.ts";
import { NoProgressError, UnboundStreamError } from "./stream_errors.ts";
import type { ISyncByteSink } from "./streams/streams_sync.ts";
import { SyncGrowableByteSink } from "./streams/growable_byte_sink_sync.ts";

/**
 * Options accepted by {@link SyncSequentialWriter}.
 */
export interface SyncSequentialWriterOptions {
  /** Size of the zero buffer used by `zeroFill` (default 1024). */
  chunkSize?: number;
}

/**
 * Sequential binary writer over an {@link ISyncByteSink}.
 *
 * Mirrors {@link SyncSequentialReader} without lookahead. Every write loops
 * until the sink has accepted all bytes, and the position advances by what
 * the sink reports as accepted.
 *
 * @example
 * ```ts
 * const { writer, sink } = SyncSequentialWriter.toBytes(BigEndian);
 * writer.writeUint32(0x000004d2);
 * writer.zeroFill(2);
 * sink.toUint8Array(); // [0x00, 0x00, 0x04, 0xd2, 0x00, 0x00]
 * ```
 */
export class SyncSequentialWriter implements ISyncByteSink {
  #sink: ISyncByteSink | undefined;
  readonly #state: SyncStreamState;

  /**
   * Creates a writer bound to `sink`.
   * @param sink The byte sink, or undefined for an unbound writer.
   * @param byteOrder Layout for typed writes, or undefined to disable them.
   * @param options Scratch buffer sizing.
   */
  constructor(
    sink: ISyncByteSink | undefined,
    byteOrder: ByteOrder | undefined,
    options: SyncSequentialWriterOptions = {},
  ) {
    this.#sink = sink;
    this.#state = new SyncStreamState(byteOrder, options.chunkSize);
  }

  /**
   * Creates a writer over a fresh in-memory sink.
   */
  static toBytes(
    byteOrder: ByteOrder | undefined,
    options?: SyncSequentialWriterOptions,
  ): { writer: SyncSequentialWriter; sink: SyncGrowableByteSink } {
    const sink = new SyncGrowableByteSink();
    return { writer: new SyncSequentialWriter(sink, byteOrder, options), sink };
  }

  /** Returns the number of bytes accepted by the sink so far. */
  getPosition(): number {
    return this.#state.position;
  }

  /** Returns the active byte order, or undefined when unset. */
  getByteOrder(): ByteOrder | undefined {
    return this.#state.byteOrder;
  }

  /** Switches the byte order. Can be done between any two writes. */
  setByteOrder(byteOrder: ByteOrder | undefined): void {
    this.#state.byteOrder = byteOrder;
  }

  /** Rebinds the writer to `sink` and zeroes the position. */
  reset(sink: ISyncByteSink | undefined, byteOrder: ByteOrder | undefined): void {
    this.#sink = sink;
    this.#state.reset(byteOrder);
  }

  /**
   * Performs a single sink write.
   * @returns The number of bytes the sink accepted.
   */
  write(data: Uint8Array): number {
    if (data.length === 0) {
      return 0;
    }
    const sink = this.#requireSink(`write(length=${data.length})`);
    const count = sink.write(data);
    assertTransferCount(count, data.length, "sink.write()");
    this.#state.position += count;
    return count;
  }

  /** Writes one byte. */
  writeByte(value: number): void {
    const operation = `writeByte(${value})`;
    this.#requireSink(operation);
    assertUnsignedInteger(value, 8, "writeByte()");
    this.#state.scalarView.setUint8(0, value);
    this.#writeFully(this.#state.scalarBytes(1), operation);
  }

  /** Writes all of `data`. An empty array is a no-op. */
  writeBytes(data: Uint8Array): void {
    this.#writeFully(data, `writeBytes(length=${data.length})`);
  }

  /** Writes an unsigned 16-bit integer in the current byte order. */
  writeUint16(value: number): void {
    const littleEndian = this.#prepareScalar("writeUint16()");
    assertUnsignedInteger(value, 16, "writeUint16()");
    this.#state.scalarView.setUint16(0, value, littleEndian);
    this.#writeScalar("writeUint16()", 2);
  }

  /** Writes an unsigned 32-bit integer in the current byte order. */
  writeUint32(value: number): void {
    const littleEndian = this.#prepareScalar("writeUint32()");
    assertUnsignedInteger(value, 32, "writeUint32()");
    this.#state.scalarView.setUint32(0, value, littleEndian);
    this.#writeScalar("writeUint32()", 4);
  }

  /** Writes an unsigned 64-bit integer in the current byte order. */
  writeUint64(value: bigint): void {
    const littleEndian = this.#prepareScalar("writeUint64()");
    assertUnsignedBigInt(value, "writeUint64()");
    this.#state.scalarView.setBigUint64(0, value, littleEndian);
    this.#writeScalar("writeUint64()", 8);
  }

  /** Writes a 32-bit IEEE 754 float in the current byte order. */
  writeFloat32(value: number): void {
    const littleEndian = this.#prepareScalar("writeFloat32()");
    this.#state.scalarView.setFloat32(0, value, littleEndian);
    this.#writeScalar("writeFloat32()", 4);
  }

  /** Writes a 64-bit IEEE 754 float in the current byte order. */
  writeFloat64(value: number): void {
    const littleEndian = this.#prepareScalar("writeFloat64()");
    this.#state.scalarView.setFloat64(0, value, littleEndian);
    this.#writeScalar("writeFloat64()", 8);
  }

  /**
   * Writes `length` zero bytes, in chunks of the zero buffer.
   * @throws {InvalidLengthError} if `length` is negative or fractional.
   */
  zeroFill(length: number): void {
    assertValidLength("zeroFill()", length);
    if (length === 0) {
      return;
    }
    const operation = `zeroFill(${length})`;
    this.#requireSink(operation);
    // The writer never writes into its chunk buffer, so it stays zeroed.
    const zeros = this.#state.chunk;
    let remaining = length;
    while (remaining > 0) {
      const size = Math.min(remaining, zeros.length);
      this.#writeFully(
        size === zeros.length ? zeros : zeros.subarray(0, size),
        operation,
      );
      remaining -= size;
    }
  }

  #requireSink(operation: string): ISyncByteSink {
    if (this.#sink === undefined) {
      throw new UnboundStreamError(operation, "writer");
    }
    return this.#sink;
  }

  /**
   * Checks that a typed write can proceed.
   * @returns Whether the value is laid out little-endian.
   */
  #prepareScalar(operation: string): boolean {
    this.#requireSink(operation);
    return this.#state.requireByteOrder(operation).littleEndian;
  }

  #writeScalar(operation: string, size: ScalarSize): void {
    this.#writeFully(this.#state.scalarBytes(size), operation);
  }

  /**
   * Hands `data` to the sink until every byte is accepted. Position advances
   * with every accepted byte, so a failure leaves it at the number of bytes
   * actually written.
   */
  #writeFully(data: Uint8Array, operation: string): void {
    if (data.length === 0) {
      return;
    }
    const sink = this.#requireSink(operation);
    let written = 0;
    let emptyWrites = 0;
    while (written < data.length) {
      const count = sink.write(written === 0 ? data : data.subarray(written));
      assertTransferCount(count, data.length - written, "sink.write()");
      if (count === 0) {
        emptyWrites++;
        if (emptyWrites >= MAX_CONSECUTIVE_EMPTY_TRANSFERS) {
          throw new NoProgressError(this.#state.position, emptyWrites);
        }
        continue;
      }
      emptyWrites = 0;
      written += count;
      this.#state.position += count;
    }
  }
}
