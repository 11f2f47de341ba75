/**
 * Byte order descriptors used by the sequential reader and writer.
 *
 * A byte order only describes how a multi-byte value maps onto bytes; the
 * actual encoding is done with a `DataView` owned by the caller.
 */
export interface ByteOrder {
  /** Human readable name, used in error messages. */
  readonly name: "LittleEndian" | "BigEndian";
  /** Flag passed to the `DataView` get/set methods. */
  readonly littleEndian: boolean;
}

/** Least-significant byte first. */
export const LittleEndian: ByteOrder = Object.freeze({
  name: "LittleEndian",
  littleEndian: true,
});

/** Most-significant byte first (network order). */
export const BigEndian: ByteOrder = Object.freeze({
  name: "BigEndian",
  littleEndian: false,
});
