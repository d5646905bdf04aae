/**
 * JSON shapes for ledger values. Amounts become decimal integer strings,
 * outcome-scale values become 2-decimal price strings.
 */

import type { MarketConfig, MarketStateView, RoundResult, SideStakes } from "../types/ledger.js";
import type { LedgerEvent } from "../types/ledger-events.js";
import { formatOutcome } from "./fixed-point.js";

const PRICE_FIELDS = new Set(["baseline", "outcome", "previousBaseline", "outcomeMin", "outcomeMax"]);

type Serialized = Record<string, string | number | boolean | null>;

function serializeRecord(record: object): Serialized {
  const out: Serialized = {};
  for (const [key, value] of Object.entries(record)) {
    if (typeof value === "bigint") {
      out[key] = PRICE_FIELDS.has(key) ? formatOutcome(value) : value.toString();
    } else if (typeof value === "string" || typeof value === "number" || typeof value === "boolean" || value === null) {
      out[key] = value;
    }
  }
  return out;
}

export function serializeMarketState(state: MarketStateView): Serialized {
  return serializeRecord(state);
}

export function serializeConfig(config: MarketConfig): Serialized {
  return serializeRecord(config);
}

export function serializeRoundResult(result: RoundResult): Serialized {
  return serializeRecord(result);
}

export function serializeStakes(stakes: SideStakes): { higher: string; lower: string } {
  return { higher: stakes.higher.toString(), lower: stakes.lower.toString() };
}

export function serializeEvent(event: LedgerEvent): Serialized {
  return serializeRecord(event);
}
