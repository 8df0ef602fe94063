import { describe, it, expect } from "vitest";

import { OrderTimeoutError } from "../../errors";
import { PaperOrderExecutor } from "../collaborators";
import { SerialQueue, withOrderTimeout } from "../serialQueue";

function delay(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

describe("SerialQueue", () => {
  it("runs tasks one at a time in submission order", async () => {
    const queue = new SerialQueue();
    const events: string[] = [];

    const task = (name: string, ms: number) => async () => {
      events.push(`${name}:start`);
      await delay(ms);
      events.push(`${name}:end`);
      return name;
    };

    const results = await Promise.all([queue.run(task("a", 10)), queue.run(task("b", 1))]);

    expect(results).toEqual(["a", "b"]);
    expect(events).toEqual(["a:start", "a:end", "b:start", "b:end"]);
    expect(queue.getStats().pending).toBe(0);
  });

  it("keeps running after a task fails", async () => {
    const queue = new SerialQueue();

    const failed = queue.run(async () => {
      throw new Error("boom");
    });
    const next = queue.run(async () => "ok");

    await expect(failed).rejects.toThrow("boom");
    await expect(next).resolves.toBe("ok");
  });
});

describe("withOrderTimeout", () => {
  it("passes through a timely result", async () => {
    await expect(withOrderTimeout(Promise.resolve(7), "BTCUSDT", 50)).resolves.toBe(7);
  });

  it("rejects once the deadline passes", async () => {
    const never = new Promise<number>(() => undefined);
    await expect(withOrderTimeout(never, "BTCUSDT", 10)).rejects.toMatchObject({
      code: "ORDER_TIMEOUT",
      status: 504,
      symbol: "BTCUSDT",
      timeoutMs: 10,
    });
    await expect(withOrderTimeout(never, "BTCUSDT", 10)).rejects.toBeInstanceOf(OrderTimeoutError);
  });
});

describe("PaperOrderExecutor", () => {
  it("applies slippage against the order side", async () => {
    const paper = new PaperOrderExecutor({ slippage: 0.01, now: () => 42 });

    const buy = await paper.place({ clientOrderId: "c1", symbol: "BTCUSDT", side: "long", quantity: 2, referencePrice: 100 });
    const sell = await paper.place({ clientOrderId: "c2", symbol: "BTCUSDT", side: "short", quantity: 2, referencePrice: 100 });

    expect(buy).toMatchObject({ price: 101, quantity: 2, filledAt: 42 });
    expect(sell).toMatchObject({ price: 99, quantity: 2, filledAt: 42 });
    expect(paper.getFills()).toHaveLength(2);
  });

  it("rejects an empty order", async () => {
    const paper = new PaperOrderExecutor();
    await expect(
      paper.place({ clientOrderId: "c1", symbol: "BTCUSDT", side: "long", quantity: 0, referencePrice: 100 }),
    ).rejects.toThrow(/Paper order rejected/);
  });
});
