// Tests for the dispatch table

import { describe, it, expect } from "vitest";
import type { Schema } from "@skein/postcard";
import { buildService, defineService, RegistrationError, type ServiceDescriptor } from "./service.ts";

const Args: Schema = {
  kind: "struct",
  fields: { num1: { kind: "i32" }, num2: { kind: "i32" } },
};

interface ArithArgs {
  num1: number;
  num2: number;
}

class Arith {
  Add(args: ArithArgs): number {
    return args.num1 + args.num2;
  }

  async Mul(args: ArithArgs): Promise<number> {
    return args.num1 * args.num2;
  }

  Index(args: ArithArgs, reply: Map<string, number>): void {
    reply.set("sum", args.num1 + args.num2);
  }

  Three(a: unknown, b: unknown, c: unknown): unknown {
    return [a, b, c];
  }
}

const ArithService = defineService({
  methods: {
    Add: { args: Args, reply: { kind: "i32" } },
    Mul: { args: Args, reply: { kind: "i32" } },
    Index: { args: Args, reply: { kind: "map", key: { kind: "string" }, value: { kind: "i32" } } },
  },
});

function registrationKind(fn: () => void): string | null {
  try {
    fn();
  } catch (e) {
    if (e instanceof RegistrationError) return e.kind;
    throw e;
  }
  return null;
}

describe("buildService", () => {
  it("names the service after the receiver's class", () => {
    const service = buildService(new Arith(), ArithService);
    expect(service.name).toBe("Arith");
    expect([...service.methods.keys()]).toEqual(["Add", "Mul", "Index"]);
  });

  it("prefers the descriptor name", () => {
    expect(buildService(new Arith(), { ...ArithService, name: "Calc" }).name).toBe("Calc");
  });

  it("accepts plain objects when the descriptor names them", () => {
    const echo = { Say: (args: string) => args };
    const service = buildService(echo, {
      name: "Echo",
      methods: { Say: { args: { kind: "string" }, reply: { kind: "string" } } },
    });
    expect(service.name).toBe("Echo");
  });

  it("rejects anonymous and malformed names", () => {
    const echo = { Say: (args: string) => args };
    const methods: ServiceDescriptor["methods"] = {
      Say: { args: { kind: "string" }, reply: { kind: "string" } },
    };
    expect(registrationKind(() => buildService(echo, { methods }))).toBe("invalid-name");
    expect(registrationKind(() => buildService(echo, { name: "Echo.V2", methods }))).toBe("invalid-name");
    expect(registrationKind(() => buildService(echo, { name: "", methods }))).toBe("invalid-name");
  });

  it("rejects missing methods and methods with too many parameters", () => {
    const arith = new Arith();
    expect(
      registrationKind(() =>
        buildService(arith, { methods: { Sub: { args: Args, reply: { kind: "i32" } } } }),
      ),
    ).toBe("invalid-method");
    expect(
      registrationKind(() =>
        buildService(arith, { methods: { Three: { args: Args, reply: { kind: "i32" } } } }),
      ),
    ).toBe("invalid-method");
  });

  it("rejects descriptors without methods", () => {
    expect(registrationKind(() => buildService(new Arith(), { methods: {} }))).toBe("no-methods");
  });
});

describe("MethodType", () => {
  it("invokes the handler on its receiver and counts calls", async () => {
    const service = buildService(new Arith(), ArithService);
    const add = service.method("Add");
    if (!add) throw new Error("Add not registered");

    expect(await service.call(add, { num1: 1, num2: 2 }, add.newReplyv())).toBe(3);
    expect(await service.call(add, { num1: 5, num2: 5 }, add.newReplyv())).toBe(10);
    expect(add.numCalls).toBe(2);
  });

  it("awaits async handlers", async () => {
    const mul = buildService(new Arith(), ArithService).method("Mul");
    expect(await mul?.call({ num1: 3, num2: 4 }, 0)).toBe(12);
  });

  it("returns the filled placeholder when the handler returns nothing", async () => {
    const index = buildService(new Arith(), ArithService).method("Index");
    if (!index) throw new Error("Index not registered");
    const reply = index.newReplyv();
    expect(reply).toEqual(new Map());
    expect(await index.call({ num1: 2, num2: 3 }, reply)).toEqual(new Map([["sum", 5]]));
  });

  it("counts failed invocations too", async () => {
    const service = buildService(
      {
        Fail: () => {
          throw new Error("nope");
        },
      },
      { name: "Broken", methods: { Fail: { args: { kind: "bool" }, reply: { kind: "bool" } } } },
    );
    const fail = service.method("Fail");
    if (!fail) throw new Error("Fail not registered");
    await expect(fail.call(true, false)).rejects.toThrow("nope");
    expect(fail.numCalls).toBe(1);
  });
});
