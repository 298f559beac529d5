import { describe, it, expect, vi } from "vitest";
import { Call } from "./call.ts";
import { createChannel } from "./channel.ts";
import type { MethodShape } from "./service.ts";

const shape: MethodShape = { args: { kind: "i32" }, reply: { kind: "i32" } };
const logger = () => ({ debug: vi.fn(), warn: vi.fn(), error: vi.fn() });

describe("Call", () => {
  it("settles once and ignores later outcomes", async () => {
    const done = createChannel<Call<number>>(2);
    const call = new Call<number>("Arith.Add", 1, shape, done, logger());

    expect(call.resolve(3)).toBe(true);
    expect(call.reject(new Error("late"))).toBe(false);
    expect(call.resolve(4)).toBe(false);

    expect(await done.recv()).toBe(call);
    expect(call.reply).toBe(3);
    expect(call.error).toBeNull();
    expect(call.unwrap()).toBe(3);
  });

  it("throws its error from unwrap", () => {
    const call = new Call<number>("Arith.Div", 1, shape, createChannel(1), logger());
    call.reject(new Error("divide by zero"));
    expect(call.reply).toBeUndefined();
    expect(() => call.unwrap()).toThrow("divide by zero");
  });

  it("refuses to unwrap before settling", () => {
    const call = new Call<number>("Arith.Add", 1, shape, createChannel(1), logger());
    expect(() => call.unwrap()).toThrow("Arith.Add: call has not settled");
  });

  it("delivers before running settle listeners", () => {
    const done = createChannel<Call<number>>(1);
    const call = new Call<number>("Arith.Add", 1, shape, done, logger());
    const order: string[] = [];
    vi.spyOn(done, "send").mockImplementation(() => {
      order.push("delivered");
      return true;
    });
    call.whenSettled(() => order.push("listener"));
    call.resolve(1);
    call.whenSettled(() => order.push("late listener"));
    expect(order).toEqual(["delivered", "listener", "late listener"]);
  });

  it("still delivers when a listener throws", async () => {
    const done = createChannel<Call<number>>(1);
    const log = logger();
    const call = new Call<number>("Arith.Add", 1, shape, done, log);
    const after = vi.fn();
    call.whenSettled(() => {
      throw new Error("hook broke");
    });
    call.whenSettled(after);

    expect(call.resolve(5)).toBe(true);
    expect(await done.recv()).toBe(call);
    expect(after).toHaveBeenCalledTimes(1);
    expect(log.warn).toHaveBeenCalledWith("call listener failed", {
      serviceMethod: "Arith.Add",
      error: "hook broke",
    });
  });

  it("logs a dropped completion", () => {
    const done = createChannel<Call<number>>(1);
    done.close();
    const log = logger();
    const call = new Call<number>("Arith.Add", 1, shape, done, log);
    call.resolve(2);
    expect(log.debug).toHaveBeenCalledWith("completion dropped: done channel full or closed", {
      serviceMethod: "Arith.Add",
      seq: "0",
    });
  });
});
