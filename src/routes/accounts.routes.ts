import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import { identityBodySchema } from "../schemas/market.schema.js";

export async function registerAccountRoutes(app: FastifyInstance): Promise<void> {
  app.get("/api/accounts/:address", async (req: FastifyRequest<{ Params: unknown }>, reply: FastifyReply) => {
    const parsed = identityBodySchema.safeParse(req.params);
    if (!parsed.success) {
      return reply.code(400).send({ error: "Invalid params", details: parsed.error.flatten() });
    }
    const { address } = parsed.data;
    return reply.send({
      address,
      balance: app.accounts.balanceOf(address).toString(),
      frozen: app.accounts.isFrozen(address),
    });
  });
}
