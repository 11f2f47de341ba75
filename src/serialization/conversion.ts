import { InvalidLengthError } from "./stream_errors.ts";

const MAX_UINT64_BIGINT = (1n << 64n) - 1n;

/**
 * Validates a byte count passed to a length-taking operation.
 * @param operation Operation name used in the error message.
 * @param length The requested number of bytes.
 * @throws {InvalidLengthError} if the length is negative, fractional or
 * outside the safe integer range.
 */
export function assertValidLength(operation: string, length: number): void {
  if (!Number.isSafeInteger(length) || length < 0) {
    throw new InvalidLengthError(operation, length);
  }
}

/**
 * Checks that a number fits an unsigned integer of the given width.
 * @param value The value to check.
 * @param bits Bit width of the target integer.
 * @param context A string describing the value, used in the error message.
 * @throws {RangeError} if the value is not an integer in `[0, 2^bits)`.
 */
export function assertUnsignedInteger(
  value: number,
  bits: 8 | 16 | 32,
  context: string,
): void {
  if (!Number.isInteger(value) || value < 0 || value >= 2 ** bits) {
    throw new RangeError(
      `${context} value ${value} is not a ${bits}-bit unsigned integer.`,
    );
  }
}

/**
 * Checks that a bigint fits an unsigned 64-bit integer.
 * @throws {RangeError} if the value is outside `[0, 2^64)`.
 */
export function assertUnsignedBigInt(value: bigint, context: string): void {
  if (value < 0n || value > MAX_UINT64_BIGINT) {
    throw new RangeError(
      `${context} value ${value} is not a 64-bit unsigned integer.`,
    );
  }
}

/**
 * Validates the count reported by a source read or sink write.
 * @param count The count returned by the collaborator.
 * @param requested The number of bytes offered or requested.
 * @param context A string describing the call, used in the error message.
 * @throws {RangeError} if the count is not an integer in `[0, requested]`.
 */
export function assertTransferCount(
  count: number,
  requested: number,
  context: string,
): void {
  if (!Number.isInteger(count) || count < 0 || count > requested) {
    throw new RangeError(
      `${context} reported ${count} bytes for a request of ${requested}.`,
    );
  }
}
