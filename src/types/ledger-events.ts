import type { MarketConfig, RoundResultTag, Side } from "./ledger.js";

export const LEDGER_EVENT_NAMES = {
  BET_PLACED: "BET_PLACED",
  ROUND_SETTLED: "ROUND_SETTLED",
  WINNINGS_CLAIMED: "WINNINGS_CLAIMED",
  MARKET_CONFIG_UPDATED: "MARKET_CONFIG_UPDATED",
  FUNDS_RESCUED: "FUNDS_RESCUED",
} as const;

export type LedgerEventName = (typeof LEDGER_EVENT_NAMES)[keyof typeof LEDGER_EVENT_NAMES];

export interface BetPlacedEvent {
  type: typeof LEDGER_EVENT_NAMES.BET_PLACED;
  round: number;
  participant: string;
  side: Side;
  amount: bigint;
  /** Baseline of the round at the time of the stake. */
  baseline: bigint;
  at: number;
}

export interface RoundSettledEvent {
  type: typeof LEDGER_EVENT_NAMES.ROUND_SETTLED;
  round: number;
  outcome: bigint;
  previousBaseline: bigint;
  winningSide: Side | null;
  tie: boolean;
  tag: RoundResultTag;
  totalPot: bigint;
  fee: bigint;
  rollover: bigint;
  at: number;
}

export interface WinningsClaimedEvent {
  type: typeof LEDGER_EVENT_NAMES.WINNINGS_CLAIMED;
  round: number;
  participant: string;
  amount: bigint;
  at: number;
}

export interface MarketConfigUpdatedEvent {
  type: typeof LEDGER_EVENT_NAMES.MARKET_CONFIG_UPDATED;
  field: keyof MarketConfig;
  value: string;
  by: string;
  at: number;
}

export interface FundsRescuedEvent {
  type: typeof LEDGER_EVENT_NAMES.FUNDS_RESCUED;
  recipient: string;
  amount: bigint;
  by: string;
  at: number;
}

export type LedgerEvent =
  | BetPlacedEvent
  | RoundSettledEvent
  | WinningsClaimedEvent
  | MarketConfigUpdatedEvent
  | FundsRescuedEvent;
