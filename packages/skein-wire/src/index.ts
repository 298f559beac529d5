// skein wire protocol
//
// Connection preamble, message header, length-prefixed framing, the codec
// contract with its binary and JSON implementations, the codec registry,
// and the error classes shared by client and server.

// ============================================================================
// Errors
// ============================================================================

export {
  ConnectionError,
  CodecError,
  RpcError,
  RpcErrorCode,
  messageOf,
  type ConnectionErrorKind,
  type CodecErrorKind,
} from "./errors.ts";

// ============================================================================
// Streams and Framing
// ============================================================================

export { ReadBuffer, type ByteStream } from "./stream.ts";
export { MemoryStream, createMemoryPipe } from "./memory.ts";
export { MAX_FRAME_SIZE, encodeFrame, readFrame } from "./framing.ts";
export { MAGIC, PREAMBLE_SIZE, encodePreamble, decodePreamble, type Preamble } from "./preamble.ts";
export { HeaderSchema, isHeader, type Header } from "./header.ts";

// ============================================================================
// Codecs
// ============================================================================

export { FramedCodec, type Codec, type CodecFactory } from "./codec.ts";
export { BinaryCodec } from "./binary_codec.ts";
export { JsonCodec } from "./json_codec.ts";
export { CodecRegistry, CodecType, codecRegistry, registerCodec } from "./registry.ts";
