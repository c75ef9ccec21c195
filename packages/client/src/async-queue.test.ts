import { describe, expect, it } from "vitest";
import { AsyncQueue } from "./async-queue";

describe("AsyncQueue", () => {
  it("hands pushed values to waiting readers", async () => {
    const queue = new AsyncQueue<number>();
    const pending = queue.next();
    queue.push(1);
    expect(await pending).toEqual({ value: 1, done: false });
  });

  it("drains buffered values before reporting a failure", async () => {
    const queue = new AsyncQueue<number>();
    queue.push(1);
    queue.push(2);
    queue.fail(new Error("boom"));

    expect(await queue.next()).toEqual({ value: 1, done: false });
    expect(await queue.next()).toEqual({ value: 2, done: false });
    await expect(queue.next()).rejects.toThrow("boom");
  });

  it("ends iteration after close", async () => {
    const queue = new AsyncQueue<string>();
    queue.push("a");
    queue.close();
    const seen: string[] = [];
    for await (const value of queue) seen.push(value);
    expect(seen).toEqual(["a"]);
    expect(() => queue.push("b")).toThrow("Cannot push into a closed queue");
  });

  it("ignores a failure after close", async () => {
    const queue = new AsyncQueue<string>();
    queue.close();
    queue.fail(new Error("late"));
    expect(await queue.next()).toEqual({ value: undefined, done: true });
  });
});
