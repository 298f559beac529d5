import { describe, it, expect } from "vitest";
import { Channel, createChannel } from "./channel.ts";

describe("createChannel", () => {
  it("buffers up to its capacity", () => {
    const ch = createChannel<number>(2);
    expect(ch.capacity).toBe(2);
    expect(ch.send(1)).toBe(true);
    expect(ch.send(2)).toBe(true);
    expect(ch.send(3)).toBe(false);
  });

  it("delivers in order", async () => {
    const ch = createChannel<string>(3);
    ch.send("a");
    ch.send("b");
    expect(await ch.recv()).toBe("a");
    expect(await ch.recv()).toBe("b");
  });

  it("hands values straight to a waiting receiver", async () => {
    const ch = createChannel<number>(0);
    const pending = ch.recv();
    expect(ch.send(7)).toBe(true);
    expect(await pending).toBe(7);
    expect(ch.send(8)).toBe(false);
  });

  it("wakes receivers with null on close", async () => {
    const ch = createChannel<number>();
    const pending = ch.recv();
    ch.close();
    expect(await pending).toBeNull();
    expect(ch.isClosed()).toBe(true);
    expect(ch.send(1)).toBe(false);
  });

  it("keeps buffered values receivable after close", async () => {
    const ch = createChannel<string>(2);
    ch.send("a");
    ch.close();
    expect(ch.length).toBe(1);
    expect(await ch.recv()).toBe("a");
    expect(await ch.recv()).toBeNull();
  });

  it("stays in order while producer and consumer interleave", async () => {
    const ch = new Channel<number>(3);
    const received: Array<number | null> = [];
    let next = 0;
    for (let round = 0; round < 5; round++) {
      while (ch.send(next)) next++;
      received.push(await ch.recv(), await ch.recv());
    }
    expect(received).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
    expect(ch.length).toBe(1);
  });

  it("rejects invalid capacities", () => {
    expect(() => createChannel(-1)).toThrow(RangeError);
    expect(() => createChannel(1.5)).toThrow(RangeError);
  });
});
