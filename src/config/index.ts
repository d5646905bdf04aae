import type { MarketConfigInput } from "../schemas/market.schema.js";
import { parseOutcome } from "../lib/fixed-point.js";

const requiredEnv = (key: string): string => {
  const value = process.env[key];
  if (value === undefined || value === "") {
    throw new Error(`Missing required env: ${key}`);
  }
  return value;
};

const optionalEnv = (key: string, fallback: string): string => {
  return process.env[key] ?? fallback;
};

const flagEnv = (key: string): boolean => {
  const v = process.env[key];
  return v === "true" || v === "1";
};

function makeConfig() {
  return {
    get port(): number {
      return Number(optionalEnv("PORT", "3000"));
    },
    get nodeEnv(): string {
      return optionalEnv("NODE_ENV", "development");
    },
    get logLevel(): string {
      return optionalEnv("LOG_LEVEL", "info");
    },
    /** Secret for participant JWTs (HS256). `sub` is the caller identity. */
    get jwtSecret(): string {
      return requiredEnv("JWT_SECRET");
    },
    /** When unset, ledger events are kept in process only. */
    get redisUrl(): string | undefined {
      return process.env.REDIS_URL?.trim() || undefined;
    },
    /** Comma-separated origins (e.g. "http://localhost:3000,http://localhost:3001"). "*" or "true" = allow all. */
    get corsOrigin(): string | string[] | true {
      const o = process.env.CORS_ORIGIN?.trim();
      if (o === "true" || o === "*") return true;
      const raw = o ?? "http://localhost:3000";
      const list = raw.split(",").map((s) => s.trim()).filter(Boolean);
      return list.length > 1 ? list : list[0] ?? raw;
    },
    get marketOwner(): string {
      return requiredEnv("MARKET_OWNER");
    },
    /** Defaults to the owner. */
    get marketKeeper(): string {
      return process.env.MARKET_KEEPER?.trim() || this.marketOwner;
    },
    get marketTreasury(): string {
      return process.env.MARKET_TREASURY?.trim() || this.marketOwner;
    },
    get minStake(): string {
      return optionalEnv("MIN_STAKE", "1000");
    },
    /** 0 = unlimited. */
    get maxStake(): string {
      return optionalEnv("MAX_STAKE", "0");
    },
    get settlementIntervalSeconds(): number {
      return Number(optionalEnv("SETTLEMENT_INTERVAL_SECONDS", "3600"));
    },
    get bettingCutoffSeconds(): number {
      return Number(optionalEnv("BETTING_CUTOFF_SECONDS", "300"));
    },
    get feeBps(): number {
      return Number(optionalEnv("FEE_BPS", "200"));
    },
    /** Outcome bounds and initial baseline are prices with 2 decimals, e.g. "12.10". */
    get outcomeMin(): string {
      return optionalEnv("OUTCOME_MIN", "0.01");
    },
    get outcomeMax(): string {
      return optionalEnv("OUTCOME_MAX", "10000000");
    },
    get initialBaseline(): string {
      return requiredEnv("INITIAL_BASELINE");
    },
    /** 0 = claims never expire. */
    get claimWindowSeconds(): number {
      return Number(optionalEnv("CLAIM_WINDOW_SECONDS", "0"));
    },
    get safeModeEnabled(): boolean {
      return flagEnv("SAFE_MODE");
    },
    get safeModeMaxMoveBps(): number {
      return Number(optionalEnv("SAFE_MODE_MAX_MOVE_BPS", "1000"));
    },
    /** If true, the server settles due rounds itself, as the keeper, from the price feed. */
    get keeperCronEnabled(): boolean {
      return flagEnv("KEEPER_CRON_ENABLED");
    },
    get keeperPollIntervalMs(): number {
      return Math.max(1_000, Number(process.env.KEEPER_POLL_INTERVAL_MS) || 15_000);
    },
    get binanceWsUrl(): string {
      return optionalEnv("BINANCE_WS_URL", "wss://stream.binance.com:9443/ws");
    },
    get priceFeedSymbol(): string {
      return optionalEnv("PRICE_FEED_SYMBOL", "btcusdt").toLowerCase();
    },
  };
}

export const config = makeConfig();

/** Market config for a fresh ledger, from env. Validated by the market on construction. */
export function marketConfigFromEnv(): MarketConfigInput {
  return {
    minStake: BigInt(config.minStake),
    maxStake: BigInt(config.maxStake),
    settlementInterval: config.settlementIntervalSeconds,
    bettingCutoff: config.bettingCutoffSeconds,
    feeBps: config.feeBps,
    owner: config.marketOwner,
    keeper: config.marketKeeper,
    outcomeSource: `binance:${config.priceFeedSymbol}`,
    treasury: config.marketTreasury,
    paused: false,
    outcomeMin: parseOutcome(config.outcomeMin),
    outcomeMax: parseOutcome(config.outcomeMax),
    safeMode: config.safeModeEnabled,
    safeModeMaxMoveBps: config.safeModeMaxMoveBps,
    claimWindow: config.claimWindowSeconds,
  };
}

export const REDIS_CHANNELS = {
  BETS: "wager:bets",
  ROUNDS: "wager:rounds",
  CLAIMS: "wager:claims",
  MARKET_UPDATES: "wager:market_updates",
  PRICE_FEED: "wager:price_feed",
} as const;
