// RPC server: accepts connections, dispatches requests concurrently and
// writes one response per request over the same connection.

import {
  CodecError,
  ConnectionError,
  PREAMBLE_SIZE,
  RpcError,
  codecRegistry,
  decodePreamble,
  messageOf,
  type ByteStream,
  type Codec,
  type CodecRegistry,
  type Header,
  type Preamble,
} from "@skein/wire";
import type { Schema } from "@skein/postcard";
import { createLogger, type Logger } from "./logging.ts";
import { SendLock } from "./send_lock.ts";
import {
  buildService,
  RegistrationError,
  type MethodType,
  type Service,
  type ServiceDescriptor,
} from "./service.ts";

/** Source of incoming connections. */
export interface Listener {
  /**
   * Resolve with the next connection. Rejects with ConnectionError "closed"
   * once the listener is closed; other rejections are transient.
   */
  accept(): Promise<ByteStream>;
  close(): void | Promise<void>;
}

export interface ServerConfig {
  /** Registry the client's codec type is looked up in. */
  codecs: CodecRegistry;
  logger: Logger;
}

export function defaultServerConfig(): ServerConfig {
  return {
    codecs: codecRegistry,
    logger: createLogger("skein:server"),
  };
}

interface Target {
  service: Service;
  method: MethodType;
}

function isQuietEnd(e: unknown): boolean {
  return e instanceof ConnectionError && (e.kind === "eof" || e.kind === "closed");
}

/** Header error text for a thrown value; never empty. */
function errorText(e: unknown): string {
  const text = messageOf(e);
  return text === "" ? "rpc server: method failed" : text;
}

export class Server {
  private serviceMap = new Map<string, Service>();
  private readonly codecs: CodecRegistry;
  private readonly logger: Logger;

  constructor(config: Partial<ServerConfig> = {}) {
    const cfg: ServerConfig = { ...defaultServerConfig(), ...config };
    this.codecs = cfg.codecs;
    this.logger = cfg.logger;
  }

  /**
   * Publish the methods `descriptor` lists on `receiver`.
   *
   * @throws RegistrationError "duplicate" when a service of that name
   *   exists, or whatever buildService rejects
   */
  register(receiver: object, descriptor: ServiceDescriptor): Service {
    const service = buildService(receiver, descriptor);
    if (this.serviceMap.has(service.name)) {
      throw RegistrationError.duplicate(service.name);
    }
    this.serviceMap.set(service.name, service);
    this.logger.debug("registered service", {
      service: service.name,
      methods: [...service.methods.keys()],
    });
    return service;
  }

  /** Registered services, for inspecting call counts. */
  services(): Service[] {
    return [...this.serviceMap.values()];
  }

  /**
   * Resolve "Service.Method"; the split is on the last dot.
   *
   * @throws RpcError MALFORMED_NAME, SERVICE_NOT_FOUND or METHOD_NOT_FOUND
   */
  findService(serviceMethod: string): Target {
    const dot = serviceMethod.lastIndexOf(".");
    if (dot < 0) {
      throw RpcError.malformedName(serviceMethod);
    }
    const serviceName = serviceMethod.slice(0, dot);
    const methodName = serviceMethod.slice(dot + 1);

    const service = this.serviceMap.get(serviceName);
    if (!service) {
      throw RpcError.serviceNotFound(serviceName);
    }
    const method = service.method(methodName);
    if (!method) {
      throw RpcError.methodNotFound(serviceName, methodName);
    }
    return { service, method };
  }

  /**
   * Serve every connection `listener` yields, each independently. Returns
   * when the listener is closed.
   */
  async accept(listener: Listener): Promise<void> {
    for (;;) {
      let stream: ByteStream;
      try {
        stream = await listener.accept();
      } catch (e) {
        if (e instanceof ConnectionError && e.kind === "closed") return;
        this.logger.error("listener accept error", { error: messageOf(e) });
        continue;
      }
      void this.serveConnection(stream);
    }
  }

  /**
   * Check the preamble and serve the connection until it ends. A connection
   * with a short preamble, bad magic or unknown codec type is closed without
   * a response.
   */
  async serveConnection(stream: ByteStream): Promise<void> {
    let preamble: Preamble;
    try {
      preamble = decodePreamble(await stream.readExact(PREAMBLE_SIZE));
    } catch (e) {
      this.logger.warn("rejecting connection", { error: messageOf(e) });
      stream.close();
      return;
    }

    const factory = this.codecs.lookup(preamble.codecType);
    if (!factory) {
      this.logger.warn("rejecting connection", { error: `invalid codec type ${preamble.codecType}` });
      stream.close();
      return;
    }

    await this.serveCodec(factory(stream));
  }

  /**
   * Read requests until the stream ends, dispatching each concurrently.
   * Waits for every outstanding response before closing the codec.
   */
  async serveCodec(codec: Codec): Promise<void> {
    const sendLock = new SendLock();
    const inFlight = new Set<Promise<void>>();
    const spawn = (work: () => Promise<void>): void => {
      const task: Promise<void> = work().finally(() => {
        inFlight.delete(task);
      });
      inFlight.add(task);
    };

    for (;;) {
      let header: Header;
      try {
        header = await codec.readHeader();
      } catch (e) {
        if (!isQuietEnd(e)) {
          this.logger.error("read request header", { error: messageOf(e) });
        }
        break;
      }

      let target: Target;
      try {
        target = this.findService(header.serviceMethod);
      } catch (e) {
        try {
          await codec.readBody(null);
        } catch (readErr) {
          this.logger.error("read request body", { error: messageOf(readErr) });
          break;
        }
        const response = { ...header, error: errorText(e) };
        spawn(() => this.writeResponse(codec, sendLock, response, undefined, null));
        continue;
      }

      let args: unknown;
      try {
        args = await codec.readBody(target.method.shape.args);
      } catch (e) {
        if (!(e instanceof CodecError)) {
          this.logger.error("read request body", { error: messageOf(e) });
          break;
        }
        const response = { ...header, error: RpcError.invalidPayload(e.message).message };
        spawn(() => this.writeResponse(codec, sendLock, response, undefined, null));
        continue;
      }

      const request = target;
      spawn(() => this.handleRequest(codec, sendLock, header, request, args));
    }

    await Promise.all([...inFlight]);
    codec.close();
  }

  private async handleRequest(
    codec: Codec,
    sendLock: SendLock,
    header: Header,
    { service, method }: Target,
    args: unknown,
  ): Promise<void> {
    let reply: unknown;
    try {
      reply = await service.call(method, args, method.newReplyv());
    } catch (e) {
      this.logger.debug("method failed", { serviceMethod: header.serviceMethod, error: messageOf(e) });
      await this.writeResponse(codec, sendLock, { ...header, error: errorText(e) }, undefined, null);
      return;
    }
    await this.writeResponse(codec, sendLock, header, reply, method.shape.reply);
  }

  private async writeResponse(
    codec: Codec,
    sendLock: SendLock,
    header: Header,
    body: unknown,
    schema: Schema | null,
  ): Promise<void> {
    try {
      await sendLock.run(() => codec.write(header, body, schema));
    } catch (e) {
      if (e instanceof CodecError && schema !== null) {
        // nothing was written; report the bad reply to the caller instead
        const error = `rpc server: encode reply: ${e.message}`;
        await this.writeResponse(codec, sendLock, { ...header, error }, undefined, null);
        return;
      }
      this.logger.error("write response", { serviceMethod: header.serviceMethod, error: messageOf(e) });
    }
  }
}

/** Process-wide server behind the package-level register/accept. */
export const defaultServer = new Server();

export function register(receiver: object, descriptor: ServiceDescriptor): Service {
  return defaultServer.register(receiver, descriptor);
}

export function accept(listener: Listener): Promise<void> {
  return defaultServer.accept(listener);
}
