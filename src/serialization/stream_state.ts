import type { ByteOrder } from "./byte_order.ts";
import { ByteOrderNotSetError } from "./stream_errors.ts";

/** Default size of the chunk scratch buffer used by discard and zero-fill. */
export const DEFAULT_CHUNK_SIZE = 1024;

/**
 * Number of consecutive zero-byte transfers after which a source or sink is
 * considered stalled.
 */
export const MAX_CONSECUTIVE_EMPTY_TRANSFERS = 100;

/** Sizes of the primitive scratch views. */
export type ScalarSize = 1 | 2 | 4 | 8;

/**
 * Position, byte order and scratch buffers shared in shape by the reader and
 * the writer. Each reader or writer owns exactly one instance.
 *
 * The scratch buffers are not safe for concurrent use.
 */
export class SyncStreamState {
  /** Bytes delivered to completed reads, or accepted by the sink. */
  public position = 0;
  /** Layout used for multi-byte values; undefined disables typed operations. */
  public byteOrder: ByteOrder | undefined;

  /** Eight bytes, large enough for any primitive. */
  public readonly scalar: Uint8Array;
  /** View over `scalar` used to encode and decode primitives. */
  public readonly scalarView: DataView;
  /** Chunk-sized scratch buffer for discard and zero-fill. */
  public readonly chunk: Uint8Array;

  readonly #scalarViews: Record<ScalarSize, Uint8Array>;

  /**
   * Creates a new state record.
   * @param byteOrder The initial byte order.
   * @param chunkSize Size of the chunk scratch buffer.
   */
  constructor(byteOrder: ByteOrder | undefined, chunkSize = DEFAULT_CHUNK_SIZE) {
    if (!Number.isSafeInteger(chunkSize) || chunkSize <= 0) {
      throw new RangeError(
        `chunkSize must be a positive integer. Got chunkSize=${chunkSize}`,
      );
    }
    this.byteOrder = byteOrder;
    const scalarBuffer = new ArrayBuffer(8);
    this.scalar = new Uint8Array(scalarBuffer);
    this.scalarView = new DataView(scalarBuffer);
    this.chunk = new Uint8Array(chunkSize);
    this.#scalarViews = {
      1: this.scalar.subarray(0, 1),
      2: this.scalar.subarray(0, 2),
      4: this.scalar.subarray(0, 4),
      8: this.scalar,
    };
  }

  /**
   * Returns a view over the first `size` bytes of the scalar scratch buffer
   * without allocating.
   */
  scalarBytes(size: ScalarSize): Uint8Array {
    return this.#scalarViews[size];
  }

  /**
   * Returns the active byte order.
   * @throws {ByteOrderNotSetError} if no byte order is set.
   */
  requireByteOrder(operation: string): ByteOrder {
    if (this.byteOrder === undefined) {
      throw new ByteOrderNotSetError(operation);
    }
    return this.byteOrder;
  }

  /** Zeroes the position and switches to `byteOrder`. */
  reset(byteOrder: ByteOrder | undefined): void {
    this.position = 0;
    this.byteOrder = byteOrder;
  }
}
