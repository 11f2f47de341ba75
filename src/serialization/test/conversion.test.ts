import { describe, expect, it } from "vitest";
import {
  assertTransferCount,
  assertUnsignedBigInt,
  assertUnsignedInteger,
  assertValidLength,
} from "../conversion.ts";
import { InvalidLengthError } from "../stream_errors.ts";

describe("assertValidLength", () => {
  it("accepts zero and positive integers", () => {
    expect(() => assertValidLength("op()", 0)).not.toThrow();
    expect(() => assertValidLength("op()", 4096)).not.toThrow();
  });

  it("rejects negative, fractional and unsafe lengths", () => {
    for (const length of [-1, 0.5, Number.NaN, 2 ** 53]) {
      expect(() => assertValidLength("op()", length)).toThrow(
        InvalidLengthError,
      );
    }
  });

  it("keeps the rejected length on the error", () => {
    try {
      assertValidLength("op()", -3);
    } catch (err) {
      expect(err).toBeInstanceOf(RangeError);
      expect(err).toMatchObject({ name: "InvalidLengthError", length: -3 });
    }
  });
});

describe("assertUnsignedInteger", () => {
  it("accepts the full range of each width", () => {
    expect(() => assertUnsignedInteger(0xff, 8, "v")).not.toThrow();
    expect(() => assertUnsignedInteger(0xffff, 16, "v")).not.toThrow();
    expect(() => assertUnsignedInteger(0xffffffff, 32, "v")).not.toThrow();
  });

  it("rejects values past the width", () => {
    expect(() => assertUnsignedInteger(0x100, 8, "v")).toThrow(
      "v value 256 is not a 8-bit unsigned integer.",
    );
    expect(() => assertUnsignedInteger(2 ** 32, 32, "v")).toThrow(RangeError);
  });
});

describe("assertUnsignedBigInt", () => {
  it("accepts 0 through 2^64 - 1", () => {
    expect(() => assertUnsignedBigInt(0n, "v")).not.toThrow();
    expect(() => assertUnsignedBigInt((1n << 64n) - 1n, "v")).not.toThrow();
  });

  it("rejects values outside 64 bits", () => {
    expect(() => assertUnsignedBigInt(-1n, "v")).toThrow(RangeError);
    expect(() => assertUnsignedBigInt(1n << 64n, "v")).toThrow(RangeError);
  });
});

describe("assertTransferCount", () => {
  it("accepts counts between 0 and the request", () => {
    expect(() => assertTransferCount(0, 4, "io")).not.toThrow();
    expect(() => assertTransferCount(4, 4, "io")).not.toThrow();
  });

  it("rejects negative, fractional and oversized counts", () => {
    expect(() => assertTransferCount(-1, 4, "io")).toThrow(RangeError);
    expect(() => assertTransferCount(1.5, 4, "io")).toThrow(RangeError);
    expect(() => assertTransferCount(5, 4, "io")).toThrow(
      "io reported 5 bytes for a request of 4.",
    );
  });
});
