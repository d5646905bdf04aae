import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import { requireCaller } from "../lib/permissions.js";
import { serializeRoundResult } from "../lib/serialize.js";
import { claimableParamsSchema, roundParamsSchema } from "../schemas/market.schema.js";

export async function registerRoundRoutes(app: FastifyInstance): Promise<void> {
  app.get("/api/rounds/:round", async (req: FastifyRequest<{ Params: unknown }>, reply: FastifyReply) => {
    const parsed = roundParamsSchema.safeParse(req.params);
    if (!parsed.success) {
      return reply.code(400).send({ error: "Invalid params", details: parsed.error.flatten() });
    }
    const result = app.market.getRoundResult(parsed.data.round);
    if (!result) return reply.code(404).send({ error: "Round not settled" });
    return reply.send(serializeRoundResult(result));
  });

  app.get(
    "/api/rounds/:round/claimable/:participant",
    async (req: FastifyRequest<{ Params: unknown }>, reply: FastifyReply) => {
      const parsed = claimableParamsSchema.safeParse(req.params);
      if (!parsed.success) {
        return reply.code(400).send({ error: "Invalid params", details: parsed.error.flatten() });
      }
      const { round, participant } = parsed.data;
      return reply.send({
        round,
        participant,
        amount: app.market.claimable(round, participant).toString(),
        claimed: app.market.hasClaimed(round, participant),
      });
    }
  );

  app.post("/api/rounds/:round/claim", async (req: FastifyRequest<{ Params: unknown }>, reply: FastifyReply) => {
    const caller = requireCaller(req, reply);
    if (caller === null) return;
    const parsed = roundParamsSchema.safeParse(req.params);
    if (!parsed.success) {
      return reply.code(400).send({ error: "Invalid params", details: parsed.error.flatten() });
    }
    const { round } = parsed.data;
    const amount = await app.market.claim(caller, round);
    req.log.info({ round, participant: caller, amount: amount.toString() }, "Winnings claimed");
    return reply.send({ round, participant: caller, amount: amount.toString() });
  });
}
