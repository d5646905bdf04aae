/**
 * Settlement: turns one trusted outcome report into a frozen RoundResult.
 *
 * Classification, in priority order:
 *   NO_PARTICIPATION  no new stakes this round; rollover carried unchanged
 *   ONE_SIDED         exactly one pool empty; stakes refundable, rollover untouched
 *   TIE               outcome == baseline; whole pot (stakes + rollover) rolls over
 *   DECIDED           fee on new stakes only, the rest goes to the winning side
 *
 * Nothing is committed until the treasury fee transfer succeeds. The result is
 * recorded before the round rotates; claims only ever read the recorded result.
 */

import type { RoundResult, Side, SideStakes } from "../types/ledger.js";
import { LEDGER_EVENT_NAMES } from "../types/ledger-events.js";
import { requireSettler } from "./access-control.js";
import { LedgerError } from "./errors.js";
import type { EngineDeps, MarketLedgerState } from "./market-state.js";
import { settlementDue } from "./window-policy.js";

export const BPS_DENOMINATOR = 10_000n;

export interface ClassifyInput {
  round: number;
  baseline: bigint;
  outcome: bigint;
  pools: SideStakes;
  rollover: bigint;
  feeBps: number;
  settledAt: number;
}

export function computeFee(newStakes: bigint, feeBps: number): bigint {
  return (newStakes * BigInt(feeBps)) / BPS_DENOMINATOR;
}

export function classifyRound(input: ClassifyInput): RoundResult {
  const { higher, lower } = input.pools;
  const newStakes = higher + lower;
  const totalDistributable = newStakes + input.rollover;
  const frozen = {
    round: input.round,
    higherPool: higher,
    lowerPool: lower,
    baseline: input.baseline,
    outcome: input.outcome,
    settledAt: input.settledAt,
  };

  // Covers totalDistributable == 0, and also the case it does not: an empty round
  // with rollover is NO_PARTICIPATION rather than TIE or DECIDED, whatever the
  // outcome. A decided round would zero the rollover with no winner to claim it,
  // so the rollover is carried to the next round unchanged.
  if (newStakes === 0n) {
    return {
      ...frozen,
      tag: "NO_PARTICIPATION",
      winningSide: null,
      distributable: 0n,
      fee: 0n,
      rolloverAfter: input.rollover,
    };
  }

  if (higher === 0n || lower === 0n) {
    return {
      ...frozen,
      tag: "ONE_SIDED",
      winningSide: null,
      distributable: newStakes,
      fee: 0n,
      rolloverAfter: input.rollover,
    };
  }

  if (input.outcome === input.baseline) {
    return {
      ...frozen,
      tag: "TIE",
      winningSide: null,
      distributable: 0n,
      fee: 0n,
      rolloverAfter: totalDistributable,
    };
  }

  const winningSide: Side = input.outcome > input.baseline ? "HIGHER" : "LOWER";
  const fee = computeFee(newStakes, input.feeBps);
  return {
    ...frozen,
    tag: "DECIDED",
    winningSide,
    distributable: totalDistributable - fee,
    fee,
    rolloverAfter: 0n,
  };
}

function absDiff(a: bigint, b: bigint): bigint {
  return a > b ? a - b : b - a;
}

export class SettlementEngine {
  constructor(
    private readonly state: MarketLedgerState,
    private readonly deps: EngineDeps
  ) {}

  private assertOutcomeAccepted(outcome: bigint, baseline: bigint): void {
    const { config } = this.state;
    if (outcome < config.outcomeMin || outcome > config.outcomeMax) {
      throw new LedgerError(
        "OUTCOME_OUT_OF_RANGE",
        `outcome ${outcome} outside [${config.outcomeMin}, ${config.outcomeMax}]`
      );
    }
    if (config.safeMode) {
      const limit = (baseline * BigInt(config.safeModeMaxMoveBps)) / BPS_DENOMINATOR;
      if (absDiff(outcome, baseline) > limit) {
        throw new LedgerError(
          "OUTCOME_MOVE_TOO_LARGE",
          `outcome ${outcome} moves more than ${config.safeModeMaxMoveBps} bps from baseline ${baseline}`
        );
      }
    }
  }

  async settle(caller: string, reportedOutcome: bigint): Promise<RoundResult> {
    requireSettler(this.state.config, caller);
    return this.deps.guard.run(async () => {
      const { state } = this;
      const { config, ledger } = state;
      if (config.paused) throw new LedgerError("PAUSED", "market is paused");

      const now = this.deps.clock.now();
      if (!settlementDue({ now, lastSettlement: state.lastSettlement, interval: config.settlementInterval })) {
        throw new LedgerError(
          "ROUND_NOT_SETTLEABLE",
          `round ${ledger.round} settles at ${state.lastSettlement + config.settlementInterval}`
        );
      }
      const baseline = ledger.baseline;
      const rolloverBefore = state.rollover;
      this.assertOutcomeAccepted(reportedOutcome, baseline);

      const result = classifyRound({
        round: ledger.round,
        baseline,
        outcome: reportedOutcome,
        pools: ledger.pools(),
        rollover: rolloverBefore,
        feeBps: config.feeBps,
        settledAt: now,
      });

      if (result.fee > state.heldBalance) {
        throw new LedgerError("INSUFFICIENT_BALANCE", `fee of ${result.fee} exceeds held balance ${state.heldBalance}`);
      }
      if (result.fee > 0n) {
        try {
          await this.deps.transport.send(config.treasury, result.fee);
        } catch (err) {
          throw new LedgerError("TRANSFER_FAILED", `treasury rejected fee of ${result.fee}`, { cause: err });
        }
      }

      state.results.set(result.round, result);
      state.heldBalance -= result.fee;
      state.rollover = result.rolloverAfter;
      state.lastSettlement = now;
      ledger.advance(reportedOutcome);

      this.deps.audit.append({
        type: LEDGER_EVENT_NAMES.ROUND_SETTLED,
        round: result.round,
        outcome: reportedOutcome,
        previousBaseline: baseline,
        winningSide: result.winningSide,
        tie: result.tag === "TIE",
        tag: result.tag,
        totalPot: result.higherPool + result.lowerPool + rolloverBefore,
        fee: result.fee,
        rollover: result.rolloverAfter,
        at: now,
      });
      return result;
    });
  }
}
