import { closeSync, readSync, writeSync } from "node:fs";
import type { ISyncByteSink, ISyncByteSource } from "./streams_sync.ts";

/**
 * Byte source reading sequentially from an open file descriptor.
 * The descriptor stays owned by the caller until `close()` is called.
 */
export class SyncFileDescriptorByteSource implements ISyncByteSource {
  #fd: number;
  #isClosed = false;

  public constructor(fd: number) {
    this.#fd = fd;
  }

  /**
   * Reads from the current file offset. A zero-byte result from the
   * descriptor is reported as end of input.
   */
  public read(target: Uint8Array): number | undefined {
    if (this.#isClosed) {
      return undefined;
    }
    if (target.length === 0) {
      return 0;
    }
    const bytesRead = readSync(this.#fd, target, 0, target.length, null);
    return bytesRead === 0 ? undefined : bytesRead;
  }

  /** Closes the underlying descriptor. */
  public close(): void {
    if (this.#isClosed) {
      return;
    }
    this.#isClosed = true;
    closeSync(this.#fd);
  }
}

/**
 * Byte sink writing sequentially to an open file descriptor.
 */
export class SyncFileDescriptorByteSink implements ISyncByteSink {
  #fd: number;
  #isClosed = false;

  public constructor(fd: number) {
    this.#fd = fd;
  }

  public write(data: Uint8Array): number {
    if (this.#isClosed) {
      throw new Error("Cannot write to a closed sink");
    }
    if (data.length === 0) {
      return 0;
    }
    return writeSync(this.#fd, data, 0, data.length, null);
  }

  /** Closes the underlying descriptor. */
  public close(): void {
    if (this.#isClosed) {
      return;
    }
    this.#isClosed = true;
    closeSync(this.#fd);
  }
}
