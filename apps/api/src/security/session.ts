import { randomUUID } from "node:crypto";
import type { FastifyReply, FastifyRequest } from "fastify";

export const SESSION_COOKIE = "clinic_sid";

export function readSessionId(req: FastifyRequest): string | null {
  const raw = req.cookies[SESSION_COOKIE];
  if (!raw) return null;
  const unsigned = req.unsignCookie(raw);
  return unsigned.valid && unsigned.value ? unsigned.value : null;
}

/** Returns the caller's session id, starting a new session cookie when there is none. */
export function ensureSession(req: FastifyRequest, reply: FastifyReply): string {
  const existing = readSessionId(req);
  if (existing) return existing;

  const sessionId = randomUUID();
  reply.setCookie(SESSION_COOKIE, sessionId, {
    path: "/",
    httpOnly: true,
    sameSite: "lax",
    signed: true,
  });
  return sessionId;
}
