// Error classes shared by client, server and codecs.
//
// ConnectionError and CodecError kinds "unknown-type", "duplicate" and
// "sealed" are connection- or setup-level. CodecError "decode"/"encode" and
// RpcError are call-level: they fail one call and leave the connection up.

export type ConnectionErrorKind = "io" | "eof" | "closed" | "shutdown" | "handshake";

export class ConnectionError extends Error {
  constructor(
    public kind: ConnectionErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ConnectionError";
  }

  static io(message: string, cause?: unknown): ConnectionError {
    return new ConnectionError("io", message, { cause });
  }

  /** The peer closed the stream cleanly between messages. */
  static eof(): ConnectionError {
    return new ConnectionError("eof", "end of stream");
  }

  static closed(): ConnectionError {
    return new ConnectionError("closed", "connection closed");
  }

  /** Settles calls still pending when the receive loop ends. */
  static shutdown(cause?: unknown): ConnectionError {
    return new ConnectionError("shutdown", "connection shut down", { cause });
  }

  static handshake(message: string): ConnectionError {
    return new ConnectionError("handshake", message);
  }
}

export type CodecErrorKind = "unknown-type" | "duplicate" | "sealed" | "encode" | "decode";

export class CodecError extends Error {
  constructor(
    public kind: CodecErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "CodecError";
  }

  static unknownType(tag: number): CodecError {
    return new CodecError("unknown-type", `invalid codec type ${tag}`);
  }

  static duplicate(tag: number): CodecError {
    return new CodecError("duplicate", `codec type ${tag} already registered`);
  }

  static sealed(tag: number): CodecError {
    return new CodecError("sealed", `codec type ${tag} registered after first use`);
  }

  static encode(cause: unknown): CodecError {
    return new CodecError("encode", `encode: ${messageOf(cause)}`, { cause });
  }

  static decode(cause: unknown): CodecError {
    return new CodecError("decode", `decode: ${messageOf(cause)}`, { cause });
  }
}

/** Error codes for call-level failures. */
export const RpcErrorCode = {
  /** Handler raised an error; the message is its text */
  USER: 0,
  /** Name is not of the form "Service.Method" */
  MALFORMED_NAME: 1,
  SERVICE_NOT_FOUND: 2,
  METHOD_NOT_FOUND: 3,
  /** Request body did not decode with the method's argument schema */
  INVALID_PAYLOAD: 4,
  /** Client-side deadline passed before the response arrived */
  DEADLINE_EXCEEDED: 5,
} as const;

export type RpcErrorCode = (typeof RpcErrorCode)[keyof typeof RpcErrorCode];

const SERVER_PREFIX = "rpc server: ";

const WIRE_TEMPLATES: ReadonlyArray<[string, RpcErrorCode]> = [
  [`${SERVER_PREFIX}service/method request ill-formed: `, RpcErrorCode.MALFORMED_NAME],
  [`${SERVER_PREFIX}cannot find service `, RpcErrorCode.SERVICE_NOT_FOUND],
  [`${SERVER_PREFIX}cannot find method `, RpcErrorCode.METHOD_NOT_FOUND],
  [`${SERVER_PREFIX}invalid payload: `, RpcErrorCode.INVALID_PAYLOAD],
];

/**
 * Call-level error. The message is the text carried in the response
 * header's error field.
 */
export class RpcError extends Error {
  readonly code: RpcErrorCode;

  constructor(code: RpcErrorCode, message: string) {
    super(message);
    this.name = "RpcError";
    this.code = code;
  }

  isUserError(): boolean {
    return this.code === RpcErrorCode.USER;
  }

  static malformedName(serviceMethod: string): RpcError {
    return new RpcError(
      RpcErrorCode.MALFORMED_NAME,
      `${SERVER_PREFIX}service/method request ill-formed: ${serviceMethod}`,
    );
  }

  static serviceNotFound(service: string): RpcError {
    return new RpcError(RpcErrorCode.SERVICE_NOT_FOUND, `${SERVER_PREFIX}cannot find service ${service}`);
  }

  static methodNotFound(service: string, method: string): RpcError {
    return new RpcError(
      RpcErrorCode.METHOD_NOT_FOUND,
      `${SERVER_PREFIX}cannot find method ${method} on service ${service}`,
    );
  }

  static invalidPayload(detail: string): RpcError {
    return new RpcError(RpcErrorCode.INVALID_PAYLOAD, `${SERVER_PREFIX}invalid payload: ${detail}`);
  }

  static deadlineExceeded(serviceMethod: string, timeoutMs: number): RpcError {
    return new RpcError(
      RpcErrorCode.DEADLINE_EXCEEDED,
      `${serviceMethod}: deadline of ${timeoutMs}ms exceeded`,
    );
  }

  /** Rebuild the error a server sent as header text. */
  static fromWire(text: string): RpcError {
    for (const [prefix, code] of WIRE_TEMPLATES) {
      if (text.startsWith(prefix)) return new RpcError(code, text);
    }
    return new RpcError(RpcErrorCode.USER, text);
  }
}

/** Message of a thrown value; non-Error throws are stringified. */
export function messageOf(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
