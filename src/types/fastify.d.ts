import type { WagerMarket } from "../engine/market.js";
import type { AccountBook } from "../services/account-book.service.js";
import type { RequestAuth } from "./auth.js";

declare module "fastify" {
  interface FastifyInstance {
    market: WagerMarket;
    accounts: AccountBook;
  }
  interface FastifyRequest {
    auth?: RequestAuth;
  }
}
