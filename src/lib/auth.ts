import type { FastifyRequest } from "fastify";
import type { RequestAuth } from "../types/auth.js";
import { getTokenFromRequest, verifyToken } from "./jwt.js";

const AUTH_HEADER = "authorization";

export function getJwtFromRequest(req: FastifyRequest): string | null {
  const auth = req.headers[AUTH_HEADER];
  return getTokenFromRequest(typeof auth === "string" ? auth : undefined);
}

/** Invalid or missing tokens resolve to null; routes decide whether that is a 401. */
export function resolveRequestAuth(req: FastifyRequest, jwtSecret: string): RequestAuth {
  const token = getJwtFromRequest(req);
  if (token === null) return null;
  const payload = verifyToken(token, jwtSecret);
  if (payload === null) return null;
  return { type: "participant", address: payload.sub.trim().toLowerCase() };
}
