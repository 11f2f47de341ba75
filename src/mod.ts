// Reader and writer
export { SyncSequentialReader } from "./serialization/sequential_reader_sync.ts";
export type { SyncSequentialReaderOptions } from "./serialization/sequential_reader_sync.ts";
export { SyncSequentialWriter } from "./serialization/sequential_writer_sync.ts";
export type { SyncSequentialWriterOptions } from "./serialization/sequential_writer_sync.ts";

// Byte order
export { BigEndian, LittleEndian } from "./serialization/byte_order.ts";
export type { ByteOrder } from "./serialization/byte_order.ts";

// Errors
export {
  ByteOrderNotSetError,
  InvalidLengthError,
  NoProgressError,
  UnboundStreamError,
  UnexpectedEndOfInputError,
} from "./serialization/stream_errors.ts";

// Sources and sinks
export type {
  ISyncByteSink,
  ISyncByteSource,
} from "./serialization/streams/streams_sync.ts";
export { SyncFixedSizeByteSource } from "./serialization/streams/fixed_size_byte_source_sync.ts";
export { SyncGrowableByteSink } from "./serialization/streams/growable_byte_sink_sync.ts";
export {
  SyncFileDescriptorByteSink,
  SyncFileDescriptorByteSource,
} from "./serialization/streams/file_descriptor_streams_sync.ts";
