// Example: sniff a length-prefixed record's header with peek, then decode it.
import {
  BigEndian,
  SyncSequentialReader,
  SyncSequentialWriter,
} from "../src/mod.ts";

const MAGIC = 0xcafe;

// Produce a record: magic, payload length, payload, then padding to 16 bytes.
const { writer, sink } = SyncSequentialWriter.toBytes(BigEndian);
const payload = new Uint8Array([0x68, 0x69]);
writer.writeUint16(MAGIC);
writer.writeUint32(payload.length);
writer.writeBytes(payload);
writer.zeroFill(16 - writer.getPosition());

const reader = SyncSequentialReader.fromBytes(sink.toUint8Array(), BigEndian);

// Peek at the magic without consuming it; a dispatcher could hand the
// untouched reader to another decoder if it did not match.
const header = reader.peekBytes(2);
if (new DataView(header.buffer).getUint16(0) !== MAGIC) {
  throw new Error("Unrecognised record");
}

const magic = reader.readUint16();
const length = reader.readUint32();
const body = reader.readBytes(length);
reader.discard(16 - reader.getPosition());

console.log(
  `magic=0x${magic.toString(16)} length=${length} body=${
    String.fromCharCode(...body)
  } position=${reader.getPosition()}`,
);
