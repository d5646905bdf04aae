/**
 * Round ledger: per-round stake bookkeeping.
 *
 * Only the current round accepts stakes. Books of past rounds are kept read-only so
 * claims can look up what a participant had on each side when the round settled.
 * Settlement never enumerates participants, so there is no bound on their number.
 */

import type { MarketConfig, Side, SideStakes } from "../types/ledger.js";
import { LedgerError } from "./errors.js";

export interface RoundBook {
  round: number;
  baseline: bigint;
  pools: SideStakes;
  stakes: Map<string, SideStakes>;
}

function emptyStakes(): SideStakes {
  return { higher: 0n, lower: 0n };
}

function addToSide(target: SideStakes, side: Side, amount: bigint): void {
  if (side === "HIGHER") target.higher += amount;
  else target.lower += amount;
}

export function stakeOnSide(stakes: SideStakes, side: Side): bigint {
  return side === "HIGHER" ? stakes.higher : stakes.lower;
}

/** Stake admission: pause, amount bounds, then the betting window. */
export function assertStakeAllowed(
  config: Pick<MarketConfig, "paused" | "minStake" | "maxStake">,
  amount: bigint,
  bettingOpen: boolean
): void {
  if (config.paused) throw new LedgerError("PAUSED", "market is paused");
  if (amount < 0n) throw new LedgerError("INVALID_AMOUNT", "stake must not be negative");
  if (amount < config.minStake) {
    throw new LedgerError("BELOW_MIN_STAKE", `minimum stake is ${config.minStake}`);
  }
  if (config.maxStake !== 0n && amount > config.maxStake) {
    throw new LedgerError("ABOVE_MAX_STAKE", `maximum stake is ${config.maxStake}`);
  }
  if (!bettingOpen) throw new LedgerError("BETTING_CLOSED", "betting is closed for this round");
}

export class RoundLedger {
  private readonly books = new Map<number, RoundBook>();
  private currentRound: number;

  constructor(initialBaseline: bigint, firstRound = 1) {
    this.currentRound = firstRound;
    this.books.set(firstRound, this.openBook(firstRound, initialBaseline));
  }

  private openBook(round: number, baseline: bigint): RoundBook {
    return { round, baseline, pools: emptyStakes(), stakes: new Map() };
  }

  get round(): number {
    return this.currentRound;
  }

  current(): RoundBook {
    const book = this.books.get(this.currentRound);
    if (book === undefined) throw new Error(`RoundLedger: missing book for round ${this.currentRound}`);
    return book;
  }

  book(round: number): RoundBook | undefined {
    return this.books.get(round);
  }

  get baseline(): bigint {
    return this.current().baseline;
  }

  /** Aggregate pools of the current round (copy). */
  pools(): SideStakes {
    const { higher, lower } = this.current().pools;
    return { higher, lower };
  }

  /** Participant's cumulative stake in a round (zeros when absent). */
  stakeOf(participant: string, round = this.currentRound): SideStakes {
    const entry = this.books.get(round)?.stakes.get(participant);
    return entry ? { higher: entry.higher, lower: entry.lower } : emptyStakes();
  }

  /**
   * Add to the participant's stake on one side of the current round.
   * Callers validate the amount and the window first; this only books it.
   */
  record(participant: string, side: Side, amount: bigint): SideStakes {
    const book = this.current();
    let entry = book.stakes.get(participant);
    if (entry === undefined) {
      entry = emptyStakes();
      book.stakes.set(participant, entry);
    }
    addToSide(entry, side, amount);
    addToSide(book.pools, side, amount);
    return { higher: entry.higher, lower: entry.lower };
  }

  /** Seal the current book and open the next round on the given baseline. */
  advance(nextBaseline: bigint): number {
    this.currentRound += 1;
    this.books.set(this.currentRound, this.openBook(this.currentRound, nextBaseline));
    return this.currentRound;
  }
}
