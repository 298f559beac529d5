// RPC client: multiplexes concurrent calls over one connection.
//
// Requests are written under a send lock with a fresh sequence number; a
// single receive loop matches responses back to pending calls by sequence.
// When the loop ends, every call still pending fails with "connection shut
// down".

import {
  CodecError,
  CodecType,
  ConnectionError,
  RpcError,
  codecRegistry,
  encodePreamble,
  messageOf,
  type ByteStream,
  type Codec,
  type CodecRegistry,
} from "@skein/wire";
import { Call } from "./call.ts";
import { createChannel, type Channel } from "./channel.ts";
import { callLogger, createLogger, type CallHooks, type Logger } from "./logging.ts";
import { SendLock } from "./send_lock.ts";
import type { MethodShape } from "./service.ts";

export interface ClientConfig {
  /** Codec type tag announced in the preamble. */
  codecType: number;
  /** Registry the codec type is looked up in. */
  codecs: CodecRegistry;
  logger: Logger;
  /** Per-call hooks, or null to disable. */
  logging: CallHooks | null;
}

export function defaultClientConfig(): ClientConfig {
  return {
    codecType: CodecType.Binary,
    codecs: codecRegistry,
    logger: createLogger("skein:client"),
    logging: callLogger(),
  };
}

export interface CallOptions<R> {
  /**
   * Channel the settled call is delivered on. Must have capacity >= 1; a
   * fresh capacity-1 channel is used when omitted.
   */
  done?: Channel<Call<R>>;
  /** Fail the call with DEADLINE_EXCEEDED if no response arrives in time. */
  timeoutMs?: number;
}

function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}

/**
 * Perform the client handshake on `stream` and start the receive loop.
 *
 * @throws CodecError "unknown-type" when the codec type is not registered
 *   (the stream is closed), or the write error when the preamble cannot be
 *   sent
 */
export async function createClient(stream: ByteStream, config: Partial<ClientConfig> = {}): Promise<Client> {
  const cfg: ClientConfig = { ...defaultClientConfig(), ...config };

  const factory = cfg.codecs.lookup(cfg.codecType);
  if (!factory) {
    stream.close();
    throw CodecError.unknownType(cfg.codecType);
  }

  try {
    await stream.write(encodePreamble(cfg.codecType));
  } catch (e) {
    stream.close();
    throw e;
  }

  return new Client(factory(stream), cfg);
}

export class Client {
  private seq = 0n;
  private pending = new Map<bigint, Call>();
  private closing = false;
  private shutdown = false;
  private readonly sendLock = new SendLock();
  private readonly logger: Logger;
  private readonly hooks: CallHooks | null;

  /** Settles once the receive loop has ended and pending calls are failed. */
  readonly terminated: Promise<void>;

  constructor(
    private readonly codec: Codec,
    config: Partial<ClientConfig> = {},
  ) {
    const cfg: ClientConfig = { ...defaultClientConfig(), ...config };
    this.logger = cfg.logger;
    this.hooks = cfg.logging;
    this.terminated = this.receive();
  }

  /** Number of calls written and awaiting a response. */
  get pendingCalls(): number {
    return this.pending.size;
  }

  /** True until close() is called or the connection shuts down. */
  isAvailable(): boolean {
    return !this.closing && !this.shutdown;
  }

  /**
   * Close the connection. Pending calls fail with "connection shut down"
   * once the receive loop notices.
   *
   * @throws ConnectionError "closed" if already closed or shut down
   */
  close(): void {
    if (this.closing || this.shutdown) throw ConnectionError.closed();
    this.closing = true;
    this.codec.close();
  }

  /**
   * Start a call without waiting for it. The settled call is delivered on
   * `call.done`.
   */
  goCall<R = unknown>(
    serviceMethod: string,
    args: unknown,
    shape: MethodShape,
    options: CallOptions<R> = {},
  ): Call<R> {
    const done = options.done ?? createChannel<Call<R>>(1);
    if (done.capacity < 1) {
      throw new RangeError("rpc client: done channel is unbuffered");
    }

    const call = new Call<R>(serviceMethod, args, shape, done, this.logger);
    this.observe(call);
    if (options.timeoutMs !== undefined) {
      this.armDeadline(call, options.timeoutMs);
    }
    void this.send(call);
    return call;
  }

  /** Invoke `serviceMethod` and wait for its reply. */
  async call<R = unknown>(
    serviceMethod: string,
    args: unknown,
    shape: MethodShape,
    options: { timeoutMs?: number } = {},
  ): Promise<R> {
    const call = this.goCall<R>(serviceMethod, args, shape, options);
    await call.done.recv();
    return call.unwrap();
  }

  private observe(call: Call): void {
    const hooks = this.hooks;
    if (!hooks) return;
    const record = { serviceMethod: call.serviceMethod, args: call.args, startedAt: performance.now() };
    hooks.pre(record);
    call.whenSettled(() => {
      const error = call.error;
      hooks.post(record, error ? { ok: false, error } : { ok: true, value: call.reply });
    });
  }

  private armDeadline(call: Call, timeoutMs: number): void {
    const timer = setTimeout(() => {
      if (call.seq !== 0n && this.pending.get(call.seq) === call) {
        this.pending.delete(call.seq);
      }
      call.reject(RpcError.deadlineExceeded(call.serviceMethod, timeoutMs));
    }, timeoutMs);
    call.whenSettled(() => clearTimeout(timer));
  }

  private removeCall(seq: bigint): Call | undefined {
    const call = this.pending.get(seq);
    this.pending.delete(seq);
    return call;
  }

  private send(call: Call): Promise<void> {
    return this.sendLock.run(async () => {
      // deadline passed while queued for the lock
      if (call.settled) return;

      if (this.closing || this.shutdown) {
        call.reject(ConnectionError.shutdown());
        return;
      }

      const seq = ++this.seq;
      call.seq = seq;
      this.pending.set(seq, call);

      try {
        await this.codec.write({ seq, serviceMethod: call.serviceMethod, error: "" }, call.args, call.shape.args);
      } catch (e) {
        this.removeCall(seq)?.reject(toError(e));
      }
    });
  }

  private async receive(): Promise<void> {
    let failure: unknown;
    try {
      for (;;) {
        const header = await this.codec.readHeader();
        const call = this.removeCall(header.seq);

        if (!call) {
          // no pending call: it already failed (write error or deadline)
          this.logger.debug("discarding late response", { seq: header.seq.toString() });
          await this.codec.readBody(null);
          continue;
        }

        // the call is out of the table: settle it here even if the body read fails
        if (header.error !== "") {
          try {
            await this.codec.readBody(null);
          } catch (e) {
            call.reject(ConnectionError.shutdown(e));
            throw e;
          }
          call.reject(RpcError.fromWire(header.error));
          continue;
        }

        let reply: unknown;
        try {
          reply = await this.codec.readBody(call.shape.reply);
        } catch (e) {
          call.reject(e instanceof CodecError ? e : ConnectionError.shutdown(e));
          if (!(e instanceof CodecError)) throw e;
          continue;
        }
        call.resolve(reply);
      }
    } catch (e) {
      failure = e;
    }

    if (!(failure instanceof ConnectionError && (failure.kind === "eof" || failure.kind === "closed"))) {
      this.logger.debug("receive loop ended", { error: messageOf(failure) });
    }
    await this.terminateCalls(failure);
  }

  private terminateCalls(cause: unknown): Promise<void> {
    return this.sendLock.run(() => {
      this.shutdown = true;
      const err = ConnectionError.shutdown(cause);
      const calls = [...this.pending.values()];
      this.pending.clear();
      for (const call of calls) call.reject(err);
      this.codec.close();
    });
  }
}
