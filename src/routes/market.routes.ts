import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import { requireCaller } from "../lib/permissions.js";
import { parseOutcome } from "../lib/fixed-point.js";
import {
  serializeConfig,
  serializeEvent,
  serializeMarketState,
  serializeRoundResult,
  serializeStakes,
} from "../lib/serialize.js";
import {
  amountBodySchema,
  eventsQuerySchema,
  settleBodySchema,
  stakeBodySchema,
} from "../schemas/market.schema.js";

export async function registerMarketRoutes(app: FastifyInstance): Promise<void> {
  app.get("/api/market", async (_req: FastifyRequest, reply: FastifyReply) => {
    return reply.send(serializeMarketState(app.market.getMarketState()));
  });

  app.get("/api/market/config", async (_req: FastifyRequest, reply: FastifyReply) => {
    return reply.send(serializeConfig(app.market.getConfig()));
  });

  app.get("/api/market/bets/me", async (req: FastifyRequest, reply: FastifyReply) => {
    const caller = requireCaller(req, reply);
    if (caller === null) return;
    const { round } = app.market.getMarketState();
    return reply.send({ round, participant: caller, ...serializeStakes(app.market.getMyBet(caller)) });
  });

  app.post("/api/market/bets", async (req: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
    const caller = requireCaller(req, reply);
    if (caller === null) return;
    const parsed = stakeBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: "Validation failed", details: parsed.error.flatten() });
    }
    const { side, amount } = parsed.data;
    const total = app.market.stake(caller, side, amount);
    const { round } = app.market.getMarketState();
    req.log.info({ round, participant: caller, side, amount: amount.toString() }, "Stake placed");
    return reply.code(201).send({
      round,
      participant: caller,
      side,
      amount: amount.toString(),
      total: serializeStakes(total),
    });
  });

  app.post("/api/market/settle", async (req: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
    const caller = requireCaller(req, reply);
    if (caller === null) return;
    const parsed = settleBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: "Validation failed", details: parsed.error.flatten() });
    }
    const result = await app.market.settle(caller, parseOutcome(parsed.data.outcome));
    req.log.info({ round: result.round, tag: result.tag }, "Round settled");
    return reply.send(serializeRoundResult(result));
  });

  /** Value only enters by staking; direct deposits are always refused. */
  app.post("/api/market/deposit", async (req: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
    const caller = requireCaller(req, reply);
    if (caller === null) return;
    const parsed = amountBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: "Validation failed", details: parsed.error.flatten() });
    }
    app.market.receive(caller, parsed.data.amount);
  });

  app.get("/api/market/events", async (req: FastifyRequest<{ Querystring: unknown }>, reply: FastifyReply) => {
    const parsed = eventsQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return reply.code(400).send({ error: "Invalid query", details: parsed.error.flatten() });
    }
    const events = app.market.audit.list(parsed.data);
    return reply.send({ data: events.map(serializeEvent), total: events.length });
  });
}
