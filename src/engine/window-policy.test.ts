import { describe, it, expect } from "vitest";
import {
  bettingDeadline,
  bettingOpen,
  settlementDue,
  timeUntilBettingCloses,
  timeUntilSettlement,
} from "./window-policy.js";

const BASE = { lastSettlement: 1_000, interval: 300, cutoff: 60 };

describe("window policy", () => {
  it("deadline is lastSettlement + interval - cutoff", () => {
    expect(bettingDeadline(1_000, 300, 60)).toBe(1_240);
  });

  describe("bettingOpen", () => {
    it("is open one second before the deadline", () => {
      expect(bettingOpen({ ...BASE, now: 1_239, paused: false })).toBe(true);
    });

    it("is closed exactly at the deadline", () => {
      expect(bettingOpen({ ...BASE, now: 1_240, paused: false })).toBe(false);
    });

    it("is closed while paused, even early in the window", () => {
      expect(bettingOpen({ ...BASE, now: 1_001, paused: true })).toBe(false);
    });

    it("closes at settlement time when cutoff is zero", () => {
      expect(bettingOpen({ ...BASE, cutoff: 0, now: 1_299, paused: false })).toBe(true);
      expect(bettingOpen({ ...BASE, cutoff: 0, now: 1_300, paused: false })).toBe(false);
    });
  });

  describe("remaining time", () => {
    it("counts down to the deadline and floors at zero", () => {
      expect(timeUntilBettingCloses({ ...BASE, now: 1_000 })).toBe(240);
      expect(timeUntilBettingCloses({ ...BASE, now: 1_239 })).toBe(1);
      expect(timeUntilBettingCloses({ ...BASE, now: 1_240 })).toBe(0);
      expect(timeUntilBettingCloses({ ...BASE, now: 5_000 })).toBe(0);
    });

    it("counts down to settlement and floors at zero", () => {
      expect(timeUntilSettlement({ ...BASE, now: 1_240 })).toBe(60);
      expect(timeUntilSettlement({ ...BASE, now: 1_300 })).toBe(0);
      expect(timeUntilSettlement({ ...BASE, now: 1_400 })).toBe(0);
    });

    it("betting is open exactly when time until close is positive", () => {
      for (const now of [999, 1_000, 1_239, 1_240, 1_241, 1_300]) {
        const open = bettingOpen({ ...BASE, now, paused: false });
        expect(open).toBe(timeUntilBettingCloses({ ...BASE, now }) > 0);
      }
    });
  });

  describe("settlementDue", () => {
    it("becomes due at lastSettlement + interval", () => {
      expect(settlementDue({ ...BASE, now: 1_299 })).toBe(false);
      expect(settlementDue({ ...BASE, now: 1_300 })).toBe(true);
      expect(settlementDue({ ...BASE, now: 2_000 })).toBe(true);
    });
  });
});
