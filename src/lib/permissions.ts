import type { FastifyRequest, FastifyReply } from "fastify";

/**
 * Caller identity for a mutating route. Sends 401 and returns null if unauthenticated.
 * Role checks (owner, keeper) happen in the ledger itself.
 */
export function requireCaller(req: FastifyRequest, reply: FastifyReply): string | null {
  const auth = req.auth;
  if (auth == null) {
    reply.code(401).send({ error: "Authentication required" });
    return null;
  }
  return auth.address;
}
