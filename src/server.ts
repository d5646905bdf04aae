import dotenv from "dotenv";
dotenv.config();

import { buildApp } from "./app.js";
import { config, marketConfigFromEnv } from "./config/index.js";
import { AuditLog, WagerMarket } from "./engine/index.js";
import { parseOutcome } from "./lib/fixed-point.js";
import { closeRedis, getRedisPublisher } from "./lib/redis.js";
import { AccountBook } from "./services/account-book.service.js";
import { startEventPublisher } from "./services/event-publisher.service.js";
import { startKeeperCron, stopKeeperCron } from "./services/keeper-cron.js";
import { BinancePriceFeed } from "./services/price-feed.service.js";

const accounts = new AccountBook();
const audit = new AuditLog();
const market = new WagerMarket({
  config: marketConfigFromEnv(),
  initialBaseline: parseOutcome(config.initialBaseline),
  transport: accounts,
  audit,
});

const fastify = await buildApp({
  market,
  accounts,
  jwtSecret: config.jwtSecret,
  logger: { level: config.logLevel },
  corsOrigin: config.corsOrigin,
});

const publisher = getRedisPublisher();
const stopPublishing = publisher ? startEventPublisher(audit, publisher, fastify.log) : null;
let priceFeed: BinancePriceFeed | null = null;

const start = async () => {
  try {
    await fastify.listen({ port: config.port, host: "0.0.0.0" });
    if (config.keeperCronEnabled) {
      priceFeed = new BinancePriceFeed({
        wsUrl: config.binanceWsUrl,
        symbol: config.priceFeedSymbol,
        log: fastify.log,
        publisher,
      });
      priceFeed.connect();
      startKeeperCron(
        { market, source: priceFeed, keeper: config.marketKeeper, intervalMs: config.keeperPollIntervalMs },
        fastify.log
      );
    }
    fastify.log.info(
      { round: market.getMarketState().round, redis: publisher !== null, keeper: config.keeperCronEnabled },
      "Wager ledger started"
    );
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
};

const shutdown = async () => {
  stopKeeperCron();
  priceFeed?.close();
  stopPublishing?.();
  await fastify.close();
  await closeRedis();
  process.exit(0);
};

process.on("SIGINT", () => void shutdown());
process.on("SIGTERM", () => void shutdown());

void start();
