/**
 * Wagering ledger types.
 * Amounts are bigint base units. Times are Unix seconds.
 * Outcome and baseline values are fixed-point with 2 implied decimals (1210n = 12.10).
 */

export type Side = "HIGHER" | "LOWER";

export type RoundResultTag = "NO_PARTICIPATION" | "ONE_SIDED" | "TIE" | "DECIDED";

/** Stake held on each side, per participant or aggregated per round. */
export interface SideStakes {
  higher: bigint;
  lower: bigint;
}

export interface MarketConfig {
  minStake: bigint;
  /** 0 = unlimited. */
  maxStake: bigint;
  settlementInterval: number;
  /** Lead time before settlement at which betting closes. */
  bettingCutoff: number;
  feeBps: number;
  owner: string;
  keeper: string;
  /** Reference to the trusted outcome report source (e.g. "binance:btcusdt"). */
  outcomeSource: string;
  treasury: string;
  paused: boolean;
  outcomeMin: bigint;
  outcomeMax: bigint;
  /** When on, settlement rejects outcomes that move further than safeModeMaxMoveBps from baseline. */
  safeMode: boolean;
  safeModeMaxMoveBps: number;
  /** Seconds after settlement during which claims are accepted. 0 = no expiry. */
  claimWindow: number;
}

/** Frozen at settlement; all later claims read this snapshot. */
export interface RoundResult {
  round: number;
  tag: RoundResultTag;
  higherPool: bigint;
  lowerPool: bigint;
  /** Set only when tag is DECIDED. */
  winningSide: Side | null;
  /** DECIDED: pot after fee. ONE_SIDED: refundable new stakes. Otherwise 0. */
  distributable: bigint;
  fee: bigint;
  baseline: bigint;
  outcome: bigint;
  settledAt: number;
  rolloverAfter: bigint;
}

export interface MarketStateView {
  round: number;
  baseline: bigint;
  higherPool: bigint;
  lowerPool: bigint;
  rollover: bigint;
  heldBalance: bigint;
  paused: boolean;
  bettingOpen: boolean;
  timeUntilBettingCloses: number;
  timeUntilSettlement: number;
  lastSettlement: number;
}

/** Outbound value movement: payouts, the treasury fee and rescues. May reject. */
export interface ValueTransport {
  send(recipient: string, amount: bigint): Promise<void>;
}

/** Trusted outcome report channel read by the keeper. */
export interface OutcomeSource {
  latestOutcome(): Promise<bigint>;
}

export interface Clock {
  /** Current Unix time in seconds. */
  now(): number;
}

export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};
