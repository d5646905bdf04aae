/**
 * WagerMarket: the public surface of the ledger.
 *
 * Holds the config singleton and the shared state, delegates settlement and claims
 * to their engines, and funnels every config change through an owner-checked
 * setter that re-validates the whole config before it is applied.
 *
 * Mutations are synchronous up to the first awaited transfer, and every awaited
 * transfer runs under the reentrancy guard, so two mutating calls never interleave.
 */

import type {
  Clock,
  MarketConfig,
  MarketStateView,
  RoundResult,
  Side,
  SideStakes,
  ValueTransport,
} from "../types/ledger.js";
import { systemClock } from "../types/ledger.js";
import { LEDGER_EVENT_NAMES } from "../types/ledger-events.js";
import { marketConfigSchema, type MarketConfigInput } from "../schemas/market.schema.js";
import { normalizeIdentity, requireOwner } from "./access-control.js";
import { AuditLog } from "./audit-log.js";
import { ClaimEngine } from "./claim-engine.js";
import { LedgerError } from "./errors.js";
import { claimKey, type EngineDeps, type MarketLedgerState } from "./market-state.js";
import { ReentrancyGuard } from "./reentrancy-guard.js";
import { assertStakeAllowed, RoundLedger } from "./round-ledger.js";
import { SettlementEngine } from "./settlement-engine.js";
import * as windowPolicy from "./window-policy.js";

export interface WagerMarketOptions {
  config: MarketConfigInput;
  initialBaseline: bigint;
  transport: ValueTransport;
  clock?: Clock;
  audit?: AuditLog;
  /** Treated as the last settlement time of round 0. Defaults to clock.now(). */
  openedAt?: number;
}

export function parseMarketConfig(input: MarketConfigInput): MarketConfig {
  const parsed = marketConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue?.path.join(".") ?? "config";
    throw new LedgerError("INVALID_CONFIG", `${where}: ${issue?.message ?? "invalid market config"}`);
  }
  return parsed.data;
}

export class WagerMarket {
  private readonly state: MarketLedgerState;
  private readonly deps: EngineDeps;
  private readonly settlement: SettlementEngine;
  private readonly claims: ClaimEngine;

  constructor(options: WagerMarketOptions) {
    const config = parseMarketConfig(options.config);
    if (options.initialBaseline < config.outcomeMin || options.initialBaseline > config.outcomeMax) {
      throw new LedgerError("INVALID_CONFIG", `initial baseline ${options.initialBaseline} outside outcome bounds`);
    }
    const clock = options.clock ?? systemClock;
    this.state = {
      config,
      ledger: new RoundLedger(options.initialBaseline),
      rollover: 0n,
      lastSettlement: options.openedAt ?? clock.now(),
      heldBalance: 0n,
      results: new Map(),
      claimed: new Set(),
    };
    this.deps = {
      transport: options.transport,
      guard: new ReentrancyGuard(),
      audit: options.audit ?? new AuditLog(),
      clock,
    };
    this.settlement = new SettlementEngine(this.state, this.deps);
    this.claims = new ClaimEngine(this.state, this.deps);
  }

  get audit(): AuditLog {
    return this.deps.audit;
  }

  private windowInput() {
    const { config, lastSettlement } = this.state;
    return {
      now: this.deps.clock.now(),
      lastSettlement,
      interval: config.settlementInterval,
      cutoff: config.bettingCutoff,
      paused: config.paused,
    };
  }

  // ── Reads ──────────────────────────────────────────────────────

  bettingOpen(): boolean {
    return windowPolicy.bettingOpen(this.windowInput());
  }

  timeUntilBettingCloses(): number {
    return windowPolicy.timeUntilBettingCloses(this.windowInput());
  }

  timeUntilSettlement(): number {
    return windowPolicy.timeUntilSettlement(this.windowInput());
  }

  settlementDue(): boolean {
    return windowPolicy.settlementDue(this.windowInput());
  }

  getMarketState(): MarketStateView {
    const input = this.windowInput();
    const { ledger } = this.state;
    const pools = ledger.pools();
    return {
      round: ledger.round,
      baseline: ledger.baseline,
      higherPool: pools.higher,
      lowerPool: pools.lower,
      rollover: this.state.rollover,
      heldBalance: this.state.heldBalance,
      paused: this.state.config.paused,
      bettingOpen: windowPolicy.bettingOpen(input),
      timeUntilBettingCloses: windowPolicy.timeUntilBettingCloses(input),
      timeUntilSettlement: windowPolicy.timeUntilSettlement(input),
      lastSettlement: this.state.lastSettlement,
    };
  }

  getConfig(): MarketConfig {
    return { ...this.state.config };
  }

  /** Participant's stakes in the current round. */
  getMyBet(participant: string): SideStakes {
    return this.state.ledger.stakeOf(normalizeIdentity(participant));
  }

  getBet(round: number, participant: string): SideStakes {
    return this.state.ledger.stakeOf(normalizeIdentity(participant), round);
  }

  getRoundResult(round: number): RoundResult | undefined {
    const result = this.state.results.get(round);
    return result ? { ...result } : undefined;
  }

  hasClaimed(round: number, participant: string): boolean {
    return this.state.claimed.has(claimKey(round, normalizeIdentity(participant)));
  }

  claimable(round: number, participant: string): bigint {
    return this.claims.claimable(round, participant);
  }

  // ── Value-bearing operations ───────────────────────────────────

  stake(caller: string, side: Side, amount: bigint): SideStakes {
    const participant = normalizeIdentity(caller);
    this.deps.guard.assertUnlocked();
    const input = this.windowInput();
    assertStakeAllowed(this.state.config, amount, windowPolicy.bettingOpen(input));

    const { ledger } = this.state;
    const total = ledger.record(participant, side, amount);
    this.state.heldBalance += amount;
    this.deps.audit.append({
      type: LEDGER_EVENT_NAMES.BET_PLACED,
      round: ledger.round,
      participant,
      side,
      amount,
      baseline: ledger.baseline,
      at: input.now,
    });
    return total;
  }

  settle(caller: string, reportedOutcome: bigint): Promise<RoundResult> {
    return this.settlement.settle(caller, reportedOutcome);
  }

  claim(caller: string, round: number): Promise<bigint> {
    return this.claims.claim(caller, round);
  }

  /** Value may only enter through stake(); anything else is refused. */
  receive(from: string, amount: bigint): never {
    throw new LedgerError("UNSOLICITED_TRANSFER", `refusing ${amount} from ${from}: value enters only by staking`);
  }

  // ── Admin ──────────────────────────────────────────────────────

  private update<K extends keyof MarketConfig>(caller: string, field: K, value: MarketConfig[K]): void {
    this.deps.guard.assertUnlocked();
    const { config } = this.state;
    requireOwner(config, caller);
    const next = parseMarketConfig({ ...config, [field]: value });
    this.state.config = next;
    this.deps.audit.append({
      type: LEDGER_EVENT_NAMES.MARKET_CONFIG_UPDATED,
      field,
      value: String(next[field]),
      by: normalizeIdentity(caller),
      at: this.deps.clock.now(),
    });
  }

  pause(caller: string): void {
    this.deps.guard.assertUnlocked();
    requireOwner(this.state.config, caller);
    if (this.state.config.paused) throw new LedgerError("PAUSED", "market is already paused");
    this.update(caller, "paused", true);
  }

  unpause(caller: string): void {
    this.deps.guard.assertUnlocked();
    requireOwner(this.state.config, caller);
    if (!this.state.config.paused) throw new LedgerError("NOT_PAUSED", "market is not paused");
    this.update(caller, "paused", false);
  }

  setKeeper(caller: string, keeper: string): void {
    this.update(caller, "keeper", keeper);
  }

  setTreasury(caller: string, treasury: string): void {
    this.update(caller, "treasury", treasury);
  }

  setOutcomeSource(caller: string, outcomeSource: string): void {
    this.update(caller, "outcomeSource", outcomeSource);
  }

  transferOwnership(caller: string, newOwner: string): void {
    this.update(caller, "owner", newOwner);
  }

  setMinBet(caller: string, amount: bigint): void {
    this.update(caller, "minStake", amount);
  }

  /** 0 removes the maximum. */
  setMaxBet(caller: string, amount: bigint): void {
    this.update(caller, "maxStake", amount);
  }

  setFeeBps(caller: string, feeBps: number): void {
    this.update(caller, "feeBps", feeBps);
  }

  setSafeMode(caller: string, enabled: boolean, maxMoveBps?: number): void {
    this.deps.guard.assertUnlocked();
    requireOwner(this.state.config, caller);
    if (maxMoveBps !== undefined) this.update(caller, "safeModeMaxMoveBps", maxMoveBps);
    this.update(caller, "safeMode", enabled);
  }

  setClaimWindow(caller: string, seconds: number): void {
    this.update(caller, "claimWindow", seconds);
  }

  /** Last-resort recovery of stuck value. Only while paused. */
  async rescue(caller: string, recipient: string, amount: bigint): Promise<void> {
    requireOwner(this.state.config, caller);
    if (!this.state.config.paused) throw new LedgerError("NOT_PAUSED", "rescue is only available while paused");
    const to = normalizeIdentity(recipient);
    await this.deps.guard.run(async () => {
      if (amount <= 0n) throw new LedgerError("INVALID_AMOUNT", "rescue amount must be positive");
      if (amount > this.state.heldBalance) {
        throw new LedgerError("INSUFFICIENT_BALANCE", `rescue of ${amount} exceeds held balance ${this.state.heldBalance}`);
      }
      try {
        await this.deps.transport.send(to, amount);
      } catch (err) {
        throw new LedgerError("TRANSFER_FAILED", `rescue of ${amount} to ${to} failed`, { cause: err });
      }
      this.state.heldBalance -= amount;
      this.deps.audit.append({
        type: LEDGER_EVENT_NAMES.FUNDS_RESCUED,
        recipient: to,
        amount,
        by: normalizeIdentity(caller),
        at: this.deps.clock.now(),
      });
    });
  }
}
