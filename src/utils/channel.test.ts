import { describe, it, expect, vi } from "vitest";
import { Channel } from "./channel.js";

interface Tick {
  n: number;
}

async function collect(channel: Channel<Tick>): Promise<number[]> {
  const values: number[] = [];
  for await (const tick of channel) {
    values.push(tick.n);
  }
  return values;
}

describe("Channel", () => {
  it("should deliver buffered values then end on close", async () => {
    const channel = new Channel<Tick>();
    channel.push({ n: 1 });
    channel.push({ n: 2 });
    channel.close();

    await expect(collect(channel)).resolves.toEqual([1, 2]);
  });

  it("should wake a waiting consumer", async () => {
    const channel = new Channel<Tick>();
    const pending = channel.next();

    channel.push({ n: 5 });

    await expect(pending).resolves.toEqual({ value: { n: 5 }, done: false });
  });

  it("should ignore pushes after close", async () => {
    const channel = new Channel<Tick>();
    channel.close();
    channel.push({ n: 9 });

    await expect(collect(channel)).resolves.toEqual([]);
  });

  it("should notify the producer when the consumer breaks early", async () => {
    const channel = new Channel<Tick>();
    const onCancel = vi.fn();
    channel.onCancel(onCancel);
    channel.push({ n: 1 });
    channel.push({ n: 2 });

    for await (const tick of channel) {
      if (tick.n === 1) break;
    }

    expect(onCancel).toHaveBeenCalledTimes(1);
    expect(channel.isClosed).toBe(true);
  });

  it("should not notify cancellation after a normal close", async () => {
    const channel = new Channel<Tick>();
    const onCancel = vi.fn();
    channel.onCancel(onCancel);
    channel.close();

    await channel.return();

    expect(onCancel).not.toHaveBeenCalled();
  });
});
