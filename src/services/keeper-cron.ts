/**
 * Optional in-process keeper: on an interval, settle the current round as soon as
 * it is due, using the latest report from the outcome source.
 * Enabled with KEEPER_CRON_ENABLED; the keeper identity must hold the keeper (or owner) role.
 */

import type { FastifyBaseLogger } from "fastify";
import type { WagerMarket } from "../engine/market.js";
import { formatOutcome } from "../lib/fixed-point.js";
import type { OutcomeSource, RoundResult } from "../types/ledger.js";

export interface KeeperCronOptions {
  market: WagerMarket;
  source: OutcomeSource;
  keeper: string;
  intervalMs: number;
}

let intervalId: ReturnType<typeof setInterval> | null = null;
let ticking = false;

/** Settles when due. Returns the result, or null when nothing was settled. */
export async function runKeeperTick(
  market: WagerMarket,
  source: OutcomeSource,
  keeper: string,
  log: FastifyBaseLogger
): Promise<RoundResult | null> {
  if (market.getConfig().paused || !market.settlementDue()) return null;
  let outcome: bigint;
  try {
    outcome = await source.latestOutcome();
  } catch (err) {
    log.warn({ err }, "Keeper could not read outcome source");
    return null;
  }
  try {
    const result = await market.settle(keeper, outcome);
    log.info(
      { round: result.round, tag: result.tag, outcome: formatOutcome(outcome), fee: result.fee.toString() },
      "Keeper settled round"
    );
    return result;
  } catch (err) {
    log.warn({ err, outcome: formatOutcome(outcome) }, "Keeper settlement failed");
    return null;
  }
}

export function startKeeperCron(options: KeeperCronOptions, log: FastifyBaseLogger): void {
  if (intervalId !== null) return;
  const tick = () => {
    if (ticking) return;
    ticking = true;
    void runKeeperTick(options.market, options.source, options.keeper, log)
      .catch((err: unknown) => log.warn({ err }, "Keeper tick error"))
      .finally(() => {
        ticking = false;
      });
  };
  log.info({ intervalMs: options.intervalMs, keeper: options.keeper }, "Keeper cron started");
  tick();
  intervalId = setInterval(tick, options.intervalMs);
}

export function stopKeeperCron(): void {
  if (intervalId !== null) {
    clearInterval(intervalId);
    intervalId = null;
  }
}
