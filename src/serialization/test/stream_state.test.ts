import { describe, expect, it } from "vitest";
import { BigEndian, LittleEndian } from "../byte_order.ts";
import { ByteOrderNotSetError } from "../stream_errors.ts";
import { DEFAULT_CHUNK_SIZE, SyncStreamState } from "../stream_state.ts";

describe("SyncStreamState", () => {
  it("hands out scalar views over one shared scratch buffer", () => {
    const state = new SyncStreamState(LittleEndian);
    state.scalarView.setUint32(0, 0x01020304, false);
    expect(state.scalarBytes(2)).toEqual(new Uint8Array([1, 2]));
    expect(state.scalarBytes(4)).toEqual(new Uint8Array([1, 2, 3, 4]));
    expect(state.scalarBytes(8).length).toBe(8);
    expect(state.scalarBytes(1)).toBe(state.scalarBytes(1));
  });

  it("keeps scratch buffers per instance", () => {
    const first = new SyncStreamState(LittleEndian);
    const second = new SyncStreamState(LittleEndian);
    first.scalarView.setUint8(0, 9);
    expect(second.scalarView.getUint8(0)).toBe(0);
    expect(first.chunk).not.toBe(second.chunk);
    expect(first.chunk.length).toBe(DEFAULT_CHUNK_SIZE);
  });

  it("requires a byte order for typed operations", () => {
    const state = new SyncStreamState(undefined);
    expect(() => state.requireByteOrder("readUint16()")).toThrow(
      ByteOrderNotSetError,
    );
    state.byteOrder = BigEndian;
    expect(state.requireByteOrder("readUint16()")).toBe(BigEndian);
  });

  it("zeroes the position on reset", () => {
    const state = new SyncStreamState(LittleEndian, 16);
    state.position = 99;
    state.reset(BigEndian);
    expect(state.position).toBe(0);
    expect(state.byteOrder).toBe(BigEndian);
    expect(state.chunk.length).toBe(16);
  });
});
