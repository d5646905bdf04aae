import { describe, it, expect, beforeEach } from "vitest";
import { assertStakeAllowed, RoundLedger } from "./round-ledger.js";
import { LedgerError } from "./errors.js";

function codeOf(fn: () => void): string | undefined {
  try {
    fn();
  } catch (err) {
    return err instanceof LedgerError ? err.code : "not-a-ledger-error";
  }
  return undefined;
}

describe("RoundLedger", () => {
  let ledger: RoundLedger;

  beforeEach(() => {
    ledger = new RoundLedger(1210n);
  });

  it("starts at round 1 with empty pools", () => {
    expect(ledger.round).toBe(1);
    expect(ledger.baseline).toBe(1210n);
    expect(ledger.pools()).toEqual({ higher: 0n, lower: 0n });
  });

  it("accumulates repeated stakes on the same side", () => {
    ledger.record("alice", "HIGHER", 40n);
    const total = ledger.record("alice", "HIGHER", 60n);
    expect(total).toEqual({ higher: 100n, lower: 0n });
    expect(ledger.pools()).toEqual({ higher: 100n, lower: 0n });
  });

  it("allows one participant on both sides", () => {
    ledger.record("alice", "HIGHER", 10n);
    ledger.record("alice", "LOWER", 25n);
    ledger.record("bob", "LOWER", 5n);
    expect(ledger.stakeOf("alice")).toEqual({ higher: 10n, lower: 25n });
    expect(ledger.pools()).toEqual({ higher: 10n, lower: 30n });
  });

  it("keeps past books readable after advancing", () => {
    ledger.record("alice", "HIGHER", 10n);
    expect(ledger.advance(1450n)).toBe(2);
    expect(ledger.baseline).toBe(1450n);
    expect(ledger.pools()).toEqual({ higher: 0n, lower: 0n });
    expect(ledger.stakeOf("alice")).toEqual({ higher: 0n, lower: 0n });
    expect(ledger.stakeOf("alice", 1)).toEqual({ higher: 10n, lower: 0n });
    expect(ledger.book(1)?.pools).toEqual({ higher: 10n, lower: 0n });
  });

  it("returns copies, not live entries", () => {
    ledger.record("alice", "HIGHER", 10n);
    const pools = ledger.pools();
    pools.higher = 999n;
    expect(ledger.pools().higher).toBe(10n);
  });
});

describe("assertStakeAllowed", () => {
  const config = { paused: false, minStake: 10n, maxStake: 100n };

  it("accepts amounts inside the bounds while open", () => {
    expect(codeOf(() => assertStakeAllowed(config, 10n, true))).toBeUndefined();
    expect(codeOf(() => assertStakeAllowed(config, 100n, true))).toBeUndefined();
  });

  it("rejects in priority order: pause, amount, window", () => {
    expect(codeOf(() => assertStakeAllowed({ ...config, paused: true }, 1n, false))).toBe("PAUSED");
    expect(codeOf(() => assertStakeAllowed(config, -1n, true))).toBe("INVALID_AMOUNT");
    expect(codeOf(() => assertStakeAllowed(config, 9n, false))).toBe("BELOW_MIN_STAKE");
    expect(codeOf(() => assertStakeAllowed(config, 101n, true))).toBe("ABOVE_MAX_STAKE");
    expect(codeOf(() => assertStakeAllowed(config, 50n, false))).toBe("BETTING_CLOSED");
  });

  it("treats a zero maximum as unlimited", () => {
    expect(codeOf(() => assertStakeAllowed({ ...config, maxStake: 0n }, 10_000_000n, true))).toBeUndefined();
  });
});
