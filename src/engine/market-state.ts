import type { Clock, MarketConfig, RoundResult, ValueTransport } from "../types/ledger.js";
import type { AuditLog } from "./audit-log.js";
import type { ReentrancyGuard } from "./reentrancy-guard.js";
import type { RoundLedger } from "./round-ledger.js";

/** Mutable market state shared by the settlement and claim engines. */
export interface MarketLedgerState {
  config: MarketConfig;
  ledger: RoundLedger;
  rollover: bigint;
  lastSettlement: number;
  /** Value the market currently holds: stakes in, fees, payouts and rescues out. */
  heldBalance: bigint;
  results: Map<number, RoundResult>;
  /** Keys from claimKey(). Set once per (round, participant), never cleared after a paid claim. */
  claimed: Set<string>;
}

export interface EngineDeps {
  transport: ValueTransport;
  guard: ReentrancyGuard;
  audit: AuditLog;
  clock: Clock;
}

export function claimKey(round: number, participant: string): string {
  return `${round}:${participant}`;
}
