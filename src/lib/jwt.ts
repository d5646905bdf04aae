import jwt from "jsonwebtoken";

export interface JwtPayload {
  sub: string;
  iat?: number;
  exp?: number;
}

function isJwtPayload(value: unknown): value is JwtPayload {
  return (
    typeof value === "object" &&
    value !== null &&
    "sub" in value &&
    typeof value.sub === "string" &&
    value.sub.trim() !== ""
  );
}

export function verifyToken(token: string, secret: string): JwtPayload | null {
  let decoded: unknown;
  try {
    decoded = jwt.verify(token, secret, { algorithms: ["HS256"] });
  } catch {
    return null;
  }
  return isJwtPayload(decoded) ? decoded : null;
}

export function signToken(sub: string, secret: string, expiresInSeconds = 3600): string {
  return jwt.sign({ sub }, secret, { algorithm: "HS256", expiresIn: expiresInSeconds });
}

export function getTokenFromRequest(authHeader: string | undefined): string | null {
  if (authHeader?.toLowerCase().startsWith("bearer ")) return authHeader.slice(7).trim();
  return null;
}
