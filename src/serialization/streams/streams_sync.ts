/**
 * Interfaces describing synchronous byte sources and sinks.
 */

/**
 * A producer of bytes that may satisfy a request only partially.
 */
export interface ISyncByteSource {
  /**
   * Reads up to `target.length` bytes into the front of `target`.
   *
   * Returns the number of bytes written into `target`, which may be less
   * than requested (including 0) without the source being exhausted.
   * Returns undefined once the source has no more data. Any other failure is
   * thrown.
   */
  read(target: Uint8Array): number | undefined;
}

/**
 * A consumer of bytes that may accept only part of what it is offered.
 */
export interface ISyncByteSink {
  /**
   * Writes a prefix of `data` and returns how many bytes were accepted.
   * Hard failures are thrown.
   */
  write(data: Uint8Array): number;
}
