import { describe, it, expect, vi } from "vitest";
import { AccountBook } from "../../src/services/account-book.service.js";
import { channelFor, startEventPublisher } from "../../src/services/event-publisher.service.js";
import { ManualClock, newTestMarket, testLogger } from "../helpers/test-app.js";

function setup(publish: (channel: string, message: string) => Promise<unknown>) {
  const market = newTestMarket(new AccountBook(), new ManualClock());
  const { log, warn } = testLogger();
  const client = { publish: vi.fn(publish) };
  const stop = startEventPublisher(market.audit, client, log);
  return { market, client, warn, stop };
}

describe("event publisher", () => {
  it("routes each event type to its channel", () => {
    expect(channelFor({ type: "WINNINGS_CLAIMED", round: 1, participant: "a", amount: 1n, at: 0 })).toBe(
      "wager:claims"
    );
    expect(channelFor({ type: "FUNDS_RESCUED", recipient: "v", amount: 1n, by: "owner", at: 0 })).toBe(
      "wager:market_updates"
    );
  });

  it("publishes committed events as JSON with string amounts", () => {
    const { market, client } = setup(async () => 1);
    market.stake("alice", "LOWER", 25n);
    expect(client.publish).toHaveBeenCalledTimes(1);
    const [channel, message] = client.publish.mock.calls[0] ?? [];
    expect(channel).toBe("wager:bets");
    expect(JSON.parse(String(message))).toEqual({
      type: "BET_PLACED",
      round: 1,
      participant: "alice",
      side: "LOWER",
      amount: "25",
      baseline: "12.10",
      at: 1100,
    });
  });

  it("publishes config changes on the market updates channel", () => {
    const { market, client } = setup(async () => 1);
    market.setFeeBps("owner", 150);
    expect(client.publish).toHaveBeenCalledWith(
      "wager:market_updates",
      JSON.stringify({ type: "MARKET_CONFIG_UPDATED", field: "feeBps", value: "150", by: "owner", at: 1100 })
    );
  });

  it("logs failed publishes without failing the ledger operation", async () => {
    const { market, warn } = setup(async () => {
      throw new Error("redis down");
    });
    expect(() => market.stake("alice", "HIGHER", 10n)).not.toThrow();
    await vi.waitFor(() => {
      expect(warn).toHaveBeenCalledWith(
        expect.objectContaining({ channel: "wager:bets", type: "BET_PLACED" }),
        "Ledger event publish failed"
      );
    });
    expect(market.getMarketState().higherPool).toBe(10n);
  });

  it("stops publishing once unsubscribed", () => {
    const { market, client, stop } = setup(async () => 1);
    stop();
    market.stake("alice", "HIGHER", 10n);
    expect(client.publish).not.toHaveBeenCalled();
  });
});
