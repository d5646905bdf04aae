/**
 * Fans committed ledger events out to Redis so other processes (frontends via a
 * socket gateway, indexers) can follow the market. The AuditLog stays the
 * canonical trail; a failed publish is logged and dropped.
 */

import type { FastifyBaseLogger } from "fastify";
import { REDIS_CHANNELS } from "../config/index.js";
import type { AuditLog } from "../engine/audit-log.js";
import { serializeEvent } from "../lib/serialize.js";
import { LEDGER_EVENT_NAMES, type LedgerEvent } from "../types/ledger-events.js";

/** Satisfied by an ioredis client. */
export interface EventPublisherClient {
  publish(channel: string, message: string): Promise<unknown>;
}

export function channelFor(event: LedgerEvent): string {
  switch (event.type) {
    case LEDGER_EVENT_NAMES.BET_PLACED:
      return REDIS_CHANNELS.BETS;
    case LEDGER_EVENT_NAMES.ROUND_SETTLED:
      return REDIS_CHANNELS.ROUNDS;
    case LEDGER_EVENT_NAMES.WINNINGS_CLAIMED:
      return REDIS_CHANNELS.CLAIMS;
    case LEDGER_EVENT_NAMES.MARKET_CONFIG_UPDATED:
    case LEDGER_EVENT_NAMES.FUNDS_RESCUED:
      return REDIS_CHANNELS.MARKET_UPDATES;
  }
}

/** Returns a function that stops publishing. */
export function startEventPublisher(
  audit: AuditLog,
  client: EventPublisherClient,
  log: FastifyBaseLogger
): () => void {
  return audit.subscribe((event) => {
    const channel = channelFor(event);
    client.publish(channel, JSON.stringify(serializeEvent(event))).catch((err: unknown) => {
      log.warn({ err, channel, type: event.type }, "Ledger event publish failed");
    });
  });
}
