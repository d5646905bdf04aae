/**
 * Pull-based claims. Each (round, participant) is paid at most once, from the
 * RoundResult frozen at settlement, never from live pools.
 *
 * The claimed flag is written before the outbound transfer, so a recipient that
 * re-enters cannot be paid twice; if the transfer fails the flag is rolled back
 * and the participant may retry.
 */

import type { RoundResult, SideStakes } from "../types/ledger.js";
import { LEDGER_EVENT_NAMES } from "../types/ledger-events.js";
import { normalizeIdentity } from "./access-control.js";
import { LedgerError } from "./errors.js";
import { claimKey, type EngineDeps, type MarketLedgerState } from "./market-state.js";
import { stakeOnSide } from "./round-ledger.js";

export type ClaimQuote = { ok: true; amount: bigint } | { ok: false; error: LedgerError };

/** Payout owed for a frozen result and the participant's stakes in that round. */
export function computePayout(result: RoundResult, stakes: SideStakes): bigint {
  switch (result.tag) {
    case "ONE_SIDED":
      return stakes.higher + stakes.lower;
    case "DECIDED": {
      if (result.winningSide === null) return 0n;
      const winningPool = stakeOnSide({ higher: result.higherPool, lower: result.lowerPool }, result.winningSide);
      const own = stakeOnSide(stakes, result.winningSide);
      if (own === 0n || winningPool === 0n) return 0n;
      return (own * result.distributable) / winningPool;
    }
    case "TIE":
    case "NO_PARTICIPATION":
      return 0n;
  }
}

export class ClaimEngine {
  constructor(
    private readonly state: MarketLedgerState,
    private readonly deps: EngineDeps
  ) {}

  /** What claim() would do right now, without doing it. */
  quote(round: number, participant: string, now: number): ClaimQuote {
    const result = this.state.results.get(round);
    if (result === undefined) {
      return { ok: false, error: new LedgerError("ROUND_NOT_SETTLED", `round ${round} has no result`) };
    }
    if (this.state.claimed.has(claimKey(round, participant))) {
      return { ok: false, error: new LedgerError("ALREADY_CLAIMED", `${participant} already claimed round ${round}`) };
    }
    const window = this.state.config.claimWindow;
    if (window > 0 && now > result.settledAt + window) {
      return { ok: false, error: new LedgerError("CLAIM_WINDOW_CLOSED", `claims for round ${round} closed at ${result.settledAt + window}`) };
    }
    const amount = computePayout(result, this.state.ledger.stakeOf(participant, round));
    if (amount === 0n) {
      return { ok: false, error: new LedgerError("NOTHING_TO_CLAIM", `${participant} has nothing to claim for round ${round} (${result.tag})`) };
    }
    if (amount > this.state.heldBalance) {
      return {
        ok: false,
        error: new LedgerError("INSUFFICIENT_BALANCE", `payout of ${amount} exceeds held balance ${this.state.heldBalance}`),
      };
    }
    return { ok: true, amount };
  }

  /** 0 whenever claim() would fail, otherwise exactly what it would pay. */
  claimable(round: number, participant: string): bigint {
    const quote = this.quote(round, normalizeIdentity(participant), this.deps.clock.now());
    return quote.ok ? quote.amount : 0n;
  }

  async claim(caller: string, round: number): Promise<bigint> {
    const participant = normalizeIdentity(caller);
    return this.deps.guard.run(async () => {
      const now = this.deps.clock.now();
      const quote = this.quote(round, participant, now);
      if (!quote.ok) throw quote.error;

      const key = claimKey(round, participant);
      this.state.claimed.add(key);
      try {
        await this.deps.transport.send(participant, quote.amount);
      } catch (err) {
        this.state.claimed.delete(key);
        throw new LedgerError("TRANSFER_FAILED", `payout of ${quote.amount} to ${participant} failed`, { cause: err });
      }
      this.state.heldBalance -= quote.amount;

      this.deps.audit.append({
        type: LEDGER_EVENT_NAMES.WINNINGS_CLAIMED,
        round,
        participant,
        amount: quote.amount,
        at: now,
      });
      return quote.amount;
    });
  }
}
