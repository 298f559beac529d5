// Dispatch table: binds "Service.Method" names to methods on a receiver.
//
// A ServiceDescriptor lists the invocable methods of a receiver together
// with their argument and reply schemas. buildService checks the receiver
// against it and produces the Service the server dispatches through.

import { zeroValue, type Schema } from "@skein/postcard";

/** Argument and reply schemas of one method. */
export interface MethodShape {
  args: Schema;
  reply: Schema;
}

export interface ServiceDescriptor {
  /** Service name; defaults to the receiver's class name. */
  name?: string;
  methods: Record<string, MethodShape>;
}

/**
 * Declare a service once for use by both client and server.
 *
 * @example
 * ```typescript
 * const Arith = defineService({
 *   name: "Arith",
 *   methods: {
 *     Add: { args: { kind: "struct", fields: { num1: { kind: "i32" }, num2: { kind: "i32" } } }, reply: { kind: "i32" } },
 *   },
 * });
 * await client.call("Arith.Add", { num1: 1, num2: 2 }, Arith.methods.Add);
 * ```
 */
export function defineService<D extends ServiceDescriptor>(descriptor: D): D {
  return descriptor;
}

/**
 * Handler signature. Receives the decoded argument and the allocated reply
 * placeholder; returns the reply, or fills the placeholder and returns
 * nothing. Throwing fails the call.
 */
export type Handler<A = unknown, R = unknown> = (args: A, reply: R) => R | void | Promise<R | void>;

export type RegistrationErrorKind = "duplicate" | "invalid-name" | "invalid-method" | "no-methods";

export class RegistrationError extends Error {
  constructor(
    public kind: RegistrationErrorKind,
    message: string,
  ) {
    super(message);
    this.name = "RegistrationError";
  }

  static duplicate(name: string): RegistrationError {
    return new RegistrationError("duplicate", `rpc server: service already defined: ${name}`);
  }

  static invalidName(name: string): RegistrationError {
    return new RegistrationError("invalid-name", `rpc server: invalid service name ${JSON.stringify(name)}`);
  }

  static invalidMethod(service: string, method: string, reason: string): RegistrationError {
    return new RegistrationError("invalid-method", `rpc server: ${service}.${method}: ${reason}`);
  }

  static noMethods(name: string): RegistrationError {
    return new RegistrationError("no-methods", `rpc server: service ${name} has no methods`);
  }
}

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

type Invoke = (args: unknown, reply: unknown) => unknown;

/** One invocable method and its call counter. */
export class MethodType {
  private calls = 0;

  constructor(
    readonly name: string,
    readonly shape: MethodShape,
    private readonly invoke: Invoke,
  ) {}

  /** Number of times the method has been invoked. */
  get numCalls(): number {
    return this.calls;
  }

  /** Fresh, empty reply value: empty maps and vecs, zero values otherwise. */
  newReplyv(): unknown {
    return zeroValue(this.shape.reply);
  }

  /** Invoke the handler; resolves with the reply it produced. */
  async call(args: unknown, reply: unknown): Promise<unknown> {
    this.calls++;
    const result = await this.invoke(args, reply);
    return result === undefined ? reply : result;
  }
}

export class Service {
  constructor(
    readonly name: string,
    readonly receiver: object,
    readonly methods: ReadonlyMap<string, MethodType>,
  ) {}

  method(name: string): MethodType | undefined {
    return this.methods.get(name);
  }

  call(method: MethodType, args: unknown, reply: unknown): Promise<unknown> {
    return method.call(args, reply);
  }
}

function receiverName(receiver: object): string {
  const ctor: unknown = Reflect.get(receiver, "constructor");
  return typeof ctor === "function" ? ctor.name : "";
}

/**
 * Build the dispatch table for `receiver`.
 *
 * @throws RegistrationError when the name is not a plain identifier (or is
 *   "Object", an anonymous literal), a listed method is missing or takes
 *   more than two parameters, or nothing is listed
 */
export function buildService(receiver: object, descriptor: ServiceDescriptor): Service {
  const name = descriptor.name ?? receiverName(receiver);
  if (!IDENTIFIER.test(name) || name === "Object") {
    throw RegistrationError.invalidName(name);
  }

  const entries = Object.entries(descriptor.methods);
  if (entries.length === 0) throw RegistrationError.noMethods(name);

  const methods = new Map<string, MethodType>();
  for (const [methodName, shape] of entries) {
    if (!IDENTIFIER.test(methodName)) {
      throw RegistrationError.invalidMethod(name, methodName, "not an identifier");
    }
    const fn: unknown = Reflect.get(receiver, methodName);
    if (typeof fn !== "function") {
      throw RegistrationError.invalidMethod(name, methodName, "not a function");
    }
    if (fn.length > 2) {
      throw RegistrationError.invalidMethod(name, methodName, `takes ${fn.length} parameters, at most 2`);
    }
    methods.set(
      methodName,
      new MethodType(methodName, shape, (args, reply) => Reflect.apply(fn, receiver, [args, reply])),
    );
  }

  return new Service(name, receiver, methods);
}
