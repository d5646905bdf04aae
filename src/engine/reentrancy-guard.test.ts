import { describe, it, expect } from "vitest";
import { ReentrancyGuard } from "./reentrancy-guard.js";
import { LedgerError } from "./errors.js";

describe("ReentrancyGuard", () => {
  it("returns the operation's value and releases the lock", async () => {
    const guard = new ReentrancyGuard();
    await expect(guard.run(async () => 42)).resolves.toBe(42);
    expect(guard.locked).toBe(false);
  });

  it("rejects a nested acquisition with REENTRANT_CALL", async () => {
    const guard = new ReentrancyGuard();
    let inner: unknown;
    await guard.run(async () => {
      inner = await guard.run(async () => "nested").catch((err: unknown) => err);
    });
    expect(inner).toBeInstanceOf(LedgerError);
    expect(inner).toMatchObject({ code: "REENTRANT_CALL", kind: "state-conflict" });
  });

  it("releases the lock when the operation throws", async () => {
    const guard = new ReentrancyGuard();
    await expect(
      guard.run(async () => {
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");
    expect(guard.locked).toBe(false);
    await expect(guard.run(async () => "again")).resolves.toBe("again");
  });

  it("fails fast for a concurrent caller instead of queueing", async () => {
    const guard = new ReentrancyGuard();
    let release: () => void = () => undefined;
    const first = guard.run(
      () =>
        new Promise<string>((resolve) => {
          release = () => resolve("first");
        })
    );
    expect(guard.locked).toBe(true);
    expect(() => guard.assertUnlocked()).toThrow(LedgerError);
    await expect(guard.run(async () => "second")).rejects.toMatchObject({ code: "REENTRANT_CALL" });
    release();
    await expect(first).resolves.toBe("first");
    expect(guard.locked).toBe(false);
  });
});
