import WebSocket from "ws";
import type { FastifyBaseLogger } from "fastify";
import { REDIS_CHANNELS } from "../config/index.js";
import { formatOutcome, parseOutcome } from "../lib/fixed-point.js";
import type { EventPublisherClient } from "./event-publisher.service.js";
import type { OutcomeSource } from "../types/ledger.js";

const RECONNECT_DELAY_MS = 5000;
const DEFAULT_MAX_AGE_MS = 60_000;

interface BinanceTickerMessage {
  e: string;
  s: string;
  c: string;
}

function isTickerMessage(value: unknown): value is BinanceTickerMessage {
  return (
    typeof value === "object" &&
    value !== null &&
    "e" in value &&
    "s" in value &&
    "c" in value &&
    typeof value.e === "string" &&
    typeof value.s === "string" &&
    typeof value.c === "string"
  );
}

export interface BinancePriceFeedOptions {
  wsUrl: string;
  symbol: string;
  log: FastifyBaseLogger;
  /** Optional fan-out of every accepted tick on REDIS_CHANNELS.PRICE_FEED. */
  publisher?: EventPublisherClient | null;
  /** Reports older than this are refused. */
  maxAgeMs?: number;
  now?: () => number;
}

/**
 * Last traded price from the Binance 24h ticker stream, as an outcome report.
 * Prices are truncated to 2 decimals.
 */
export class BinancePriceFeed implements OutcomeSource {
  private ws: WebSocket | null = null;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private closed = false;
  private lastPrice: bigint | null = null;
  private lastUpdateMs = 0;

  constructor(private readonly options: BinancePriceFeedOptions) {}

  get source(): string {
    return `binance:${this.options.symbol.toLowerCase()}`;
  }

  connect(): void {
    this.closed = false;
    const url = `${this.options.wsUrl}/${this.options.symbol.toLowerCase()}@ticker`;
    const ws = new WebSocket(url);
    this.ws = ws;

    ws.on("message", (raw: WebSocket.RawData) => {
      this.handleMessage(raw.toString());
    });

    ws.on("close", () => {
      this.ws = null;
      if (this.closed) return;
      this.reconnectTimer = setTimeout(() => this.connect(), RECONNECT_DELAY_MS);
    });

    ws.on("error", (err: Error) => {
      this.options.log.warn({ err }, "Binance WS error");
    });
  }

  /** Returns the accepted price, or null when the frame is not a usable ticker for this symbol. */
  handleMessage(raw: string): bigint | null {
    let msg: unknown;
    try {
      msg = JSON.parse(raw);
    } catch (err) {
      this.options.log.warn({ err }, "Binance message parse error");
      return null;
    }
    if (!isTickerMessage(msg) || msg.e !== "24hTicker") return null;
    if (msg.s.toLowerCase() !== this.options.symbol.toLowerCase()) return null;
    let price: bigint;
    try {
      price = parseOutcome(msg.c);
    } catch (err) {
      this.options.log.warn({ err, price: msg.c }, "Binance ticker price rejected");
      return null;
    }
    this.lastPrice = price;
    this.lastUpdateMs = this.now();
    this.publish(price);
    return price;
  }

  async latestOutcome(): Promise<bigint> {
    if (this.lastPrice === null) {
      throw new Error(`No price received yet from ${this.source}`);
    }
    const age = this.now() - this.lastUpdateMs;
    const maxAge = this.options.maxAgeMs ?? DEFAULT_MAX_AGE_MS;
    if (age > maxAge) {
      throw new Error(`Price from ${this.source} is stale (${age}ms old)`);
    }
    return this.lastPrice;
  }

  close(): void {
    this.closed = true;
    if (this.reconnectTimer !== null) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    this.ws?.close();
    this.ws = null;
  }

  private now(): number {
    return this.options.now ? this.options.now() : Date.now();
  }

  private publish(price: bigint): void {
    const pub = this.options.publisher;
    if (!pub) return;
    const payload = JSON.stringify({ source: this.source, price: formatOutcome(price), at: this.lastUpdateMs });
    pub.publish(REDIS_CHANNELS.PRICE_FEED, payload).catch((err: unknown) => {
      this.options.log.warn({ err }, "Price feed publish failed");
    });
  }
}
