/**
 * Keyed Lock Tests
 */

import { describe, it, expect } from "vitest";
import { KeyedLock } from "./lock";

function tick(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 5));
}

describe("KeyedLock", () => {
  it("runs callbacks for one key in call order without overlap", async () => {
    const lock = new KeyedLock();
    const events: string[] = [];

    const task = (label: string) =>
      lock.run("page:Home/WebHome", async () => {
        events.push(`${label}:start`);
        await tick();
        events.push(`${label}:end`);
        return label;
      });

    const results = await Promise.all([task("a"), task("b"), task("c")]);

    expect(results).toEqual(["a", "b", "c"]);
    expect(events).toEqual(["a:start", "a:end", "b:start", "b:end", "c:start", "c:end"]);
  });

  it("lets different keys proceed independently", async () => {
    const lock = new KeyedLock();
    let release: () => void = () => {};
    const blocked = new Promise<void>((resolve) => {
      release = resolve;
    });

    const slow = lock.run("web:Home", () => blocked.then(() => "slow"));
    const fast = await lock.run("web:Other", async () => "fast");

    expect(fast).toBe("fast");
    release();
    expect(await slow).toBe("slow");
  });

  it("keeps running queued callbacks after a failure", async () => {
    const lock = new KeyedLock();

    const failing = lock.run("k", async () => {
      throw new Error("boom");
    });
    const next = lock.run("k", async () => "ok");

    await expect(failing).rejects.toThrow("boom");
    expect(await next).toBe("ok");
  });

  it("forgets keys once idle", async () => {
    const lock = new KeyedLock();

    const pending = lock.run("k", async () => {
      await tick();
    });
    expect(lock.size).toBe(1);

    await pending;
    expect(lock.size).toBe(0);
  });
});
