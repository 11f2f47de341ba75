/**
 * Error classes raised by the sequential reader and writer.
 *
 * Each error carries the context needed to tell where a stream stopped;
 * errors raised by a source or sink itself are propagated as they are.
 */

/**
 * Error thrown when an operation is attempted on a reader without a source
 * or a writer without a sink.
 */
export class UnboundStreamError extends Error {
  /** The operation that was attempted. */
  public readonly operation: string;

  /**
   * Creates a new UnboundStreamError.
   * @param operation The operation that was attempted, e.g. `readUint16()`.
   * @param role Whether the missing side is the reader's source or the
   * writer's sink.
   */
  constructor(operation: string, role: "reader" | "writer") {
    super(`${operation}: ${role} is not bound`);
    this.name = "UnboundStreamError";
    this.operation = operation;
  }
}

/**
 * Error thrown when a typed operation runs without a byte order.
 */
export class ByteOrderNotSetError extends Error {
  /** The operation that was attempted. */
  public readonly operation: string;

  constructor(operation: string) {
    super(`${operation}: byte order is not set`);
    this.name = "ByteOrderNotSetError";
    this.operation = operation;
  }
}

/**
 * Error thrown when the source is exhausted before a request is filled.
 */
export class UnexpectedEndOfInputError extends RangeError {
  /** Stream position at which the request started. */
  public readonly position: number;
  /** The number of bytes requested. */
  public readonly requested: number;
  /** The number of bytes obtained before the source ran out. */
  public readonly received: number;

  /**
   * Creates a new UnexpectedEndOfInputError.
   * @param position Stream position at which the request started.
   * @param requested The number of bytes requested.
   * @param received The number of bytes obtained.
   */
  constructor(position: number, requested: number, received: number) {
    super(
      `Unexpected end of input. position=${position}, requested=${requested}, received=${received}`,
    );
    this.name = "UnexpectedEndOfInputError";
    this.position = position;
    this.requested = requested;
    this.received = received;
  }
}

/**
 * Error thrown when a source or sink keeps transferring zero bytes without
 * signalling end of input or failing.
 */
export class NoProgressError extends Error {
  /** Stream position when the transfer stalled. */
  public readonly position: number;
  /** Consecutive empty transfers observed. */
  public readonly attempts: number;

  constructor(position: number, attempts: number) {
    super(
      `No progress after ${attempts} consecutive empty transfers at position=${position}`,
    );
    this.name = "NoProgressError";
    this.position = position;
    this.attempts = attempts;
  }
}

/**
 * Error thrown when a length argument is negative or not an integer.
 */
export class InvalidLengthError extends RangeError {
  /** The rejected length. */
  public readonly length: number;

  constructor(operation: string, length: number) {
    super(
      `${operation}: length must be a non-negative integer. Got length=${length}`,
    );
    this.name = "InvalidLengthError";
    this.length = length;
  }
}
