import type { FastifyRequest } from "fastify";
import jwt from "jsonwebtoken";

const CSRF_PURPOSE = "csrf";

export function issueCsrfToken(sessionId: string, secret: string, ttlSeconds: number) {
  return jwt.sign({ sid: sessionId, purpose: CSRF_PURPOSE }, secret, { expiresIn: ttlSeconds });
}

/** A token is valid only for the session it was issued to. */
export function verifyCsrfToken(token: string, sessionId: string, secret: string) {
  try {
    const decoded = jwt.verify(token, secret);
    if (typeof decoded === "string") return false;
    return decoded.purpose === CSRF_PURPOSE && decoded.sid === sessionId;
  } catch {
    return false;
  }
}

function headerValue(value: string | string[] | undefined) {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Header first (`X-CSRFToken`, then `X-CSRF-Token`), then the `csrf_token`
 * body field that classic form posts carry.
 */
export function readCsrfToken(req: FastifyRequest, bodyToken?: string): string | null {
  const token =
    headerValue(req.headers["x-csrftoken"]) || headerValue(req.headers["x-csrf-token"]) || bodyToken;
  return token ? token : null;
}
