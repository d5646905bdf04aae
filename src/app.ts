import Fastify, { type FastifyError, type FastifyInstance, type FastifyServerOptions } from "fastify";
import fastifyCors from "@fastify/cors";
import { isLedgerError, type LedgerErrorKind, type WagerMarket } from "./engine/index.js";
import { resolveRequestAuth } from "./lib/auth.js";
import type { AccountBook } from "./services/account-book.service.js";
import { registerMarketRoutes } from "./routes/market.routes.js";
import { registerRoundRoutes } from "./routes/rounds.routes.js";
import { registerAdminRoutes } from "./routes/admin.routes.js";
import { registerAccountRoutes } from "./routes/accounts.routes.js";

export interface AppDeps {
  market: WagerMarket;
  accounts: AccountBook;
  jwtSecret: string;
  logger?: FastifyServerOptions["logger"];
  corsOrigin?: string | string[] | true;
}

const STATUS_BY_KIND: Record<LedgerErrorKind, number> = {
  validation: 400,
  authorization: 403,
  "state-conflict": 409,
  "transfer-failure": 502,
};

export async function buildApp(deps: AppDeps): Promise<FastifyInstance> {
  const app = Fastify({ logger: deps.logger ?? false });

  await app.register(fastifyCors, {
    origin: deps.corsOrigin ?? true,
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization"],
  });

  app.decorate("market", deps.market);
  app.decorate("accounts", deps.accounts);

  app.addHook("preValidation", async (request) => {
    request.auth = resolveRequestAuth(request, deps.jwtSecret);
  });

  app.setErrorHandler<FastifyError>((err, req, reply) => {
    if (isLedgerError(err)) {
      const status = STATUS_BY_KIND[err.kind];
      if (err.kind === "transfer-failure") {
        req.log.warn({ err, code: err.code }, "Ledger transfer failed");
      }
      return reply.code(status).send({ error: err.message, code: err.code });
    }
    const status = err.statusCode ?? 500;
    if (status >= 500) {
      req.log.error({ err }, "Unhandled error");
      return reply.code(500).send({ error: "Internal Server Error" });
    }
    return reply.code(status).send({ error: err.message });
  });

  app.get("/health", async () => ({ status: "ok" }));

  await registerMarketRoutes(app);
  await registerRoundRoutes(app);
  await registerAdminRoutes(app);
  await registerAccountRoutes(app);

  return app;
}
