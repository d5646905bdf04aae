/**
 * Owner-only setters. Role checks live in the ledger; these routes only
 * authenticate, validate the body and report the resulting config.
 */

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import type { z } from "zod";
import { requireCaller } from "../lib/permissions.js";
import { serializeConfig } from "../lib/serialize.js";
import {
  amountBodySchema,
  claimWindowBodySchema,
  feeBodySchema,
  identityBodySchema,
  outcomeSourceBodySchema,
  rescueBodySchema,
  safeModeBodySchema,
} from "../schemas/market.schema.js";

export async function registerAdminRoutes(app: FastifyInstance): Promise<void> {
  const configUpdate = <T extends z.ZodTypeAny>(
    path: string,
    schema: T,
    apply: (caller: string, body: z.output<T>) => void
  ) => {
    app.post(path, async (req: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const caller = requireCaller(req, reply);
      if (caller === null) return;
      const parsed = schema.safeParse(req.body);
      if (!parsed.success) {
        return reply.code(400).send({ error: "Validation failed", details: parsed.error.flatten() });
      }
      apply(caller, parsed.data);
      req.log.info({ path, by: caller }, "Market config updated");
      return reply.send(serializeConfig(app.market.getConfig()));
    });
  };

  app.post("/api/admin/pause", async (req: FastifyRequest, reply: FastifyReply) => {
    const caller = requireCaller(req, reply);
    if (caller === null) return;
    app.market.pause(caller);
    req.log.warn({ by: caller }, "Market paused");
    return reply.send(serializeConfig(app.market.getConfig()));
  });

  app.post("/api/admin/unpause", async (req: FastifyRequest, reply: FastifyReply) => {
    const caller = requireCaller(req, reply);
    if (caller === null) return;
    app.market.unpause(caller);
    req.log.info({ by: caller }, "Market unpaused");
    return reply.send(serializeConfig(app.market.getConfig()));
  });

  configUpdate("/api/admin/keeper", identityBodySchema, (caller, body) => app.market.setKeeper(caller, body.address));
  configUpdate("/api/admin/treasury", identityBodySchema, (caller, body) =>
    app.market.setTreasury(caller, body.address)
  );
  configUpdate("/api/admin/owner", identityBodySchema, (caller, body) =>
    app.market.transferOwnership(caller, body.address)
  );
  configUpdate("/api/admin/outcome-source", outcomeSourceBodySchema, (caller, body) =>
    app.market.setOutcomeSource(caller, body.outcomeSource)
  );
  configUpdate("/api/admin/min-bet", amountBodySchema, (caller, body) => app.market.setMinBet(caller, body.amount));
  configUpdate("/api/admin/max-bet", amountBodySchema, (caller, body) => app.market.setMaxBet(caller, body.amount));
  configUpdate("/api/admin/fee", feeBodySchema, (caller, body) => app.market.setFeeBps(caller, body.feeBps));
  configUpdate("/api/admin/safe-mode", safeModeBodySchema, (caller, body) =>
    app.market.setSafeMode(caller, body.enabled, body.maxMoveBps)
  );
  configUpdate("/api/admin/claim-window", claimWindowBodySchema, (caller, body) =>
    app.market.setClaimWindow(caller, body.seconds)
  );

  app.post("/api/admin/rescue", async (req: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
    const caller = requireCaller(req, reply);
    if (caller === null) return;
    const parsed = rescueBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: "Validation failed", details: parsed.error.flatten() });
    }
    const { recipient, amount } = parsed.data;
    await app.market.rescue(caller, recipient, amount);
    req.log.warn({ by: caller, recipient, amount: amount.toString() }, "Funds rescued");
    return reply.send({
      recipient,
      amount: amount.toString(),
      heldBalance: app.market.getMarketState().heldBalance.toString(),
    });
  });
}
