import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { DateTime } from "luxon";
import { z } from "zod";
import type { AppConfig } from "../config";
import { StatusChangeError } from "../errors";
import { AppointmentStatusSchema, canTransition, type AppointmentStatus } from "../appointments/status";
import type { AppointmentRecord, AppointmentStore } from "../appointments/store";
import { issueCsrfToken, readCsrfToken, verifyCsrfToken } from "../security/csrf";
import { ensureSession, readSessionId } from "../security/session";
import { renderAppointmentsPage, type StatusCounts } from "../views/AppointmentsPage";
import { NoticeSchema, statusNotice, type Notice } from "../views/notices";

const StatusParamsSchema = z.object({
  id: z.string().min(1),
});

// Form posts and JSON clients share one body shape; nothing is required here
// so each missing piece maps to its own error code below.
const StatusChangeBodySchema = z
  .object({
    status: z.string().optional(),
    csrf_token: z.string().optional(),
    next: z.string().optional(),
  })
  .catch({});

const PageQuerySchema = z.object({
  day: z
    .string()
    .regex(/^\d{4}-\d{2}-\d{2}$/, "Use YYYY-MM-DD")
    .optional(),
  show: z.enum(["all", "scheduled", "done"]).default("all"),
  selected: z.string().optional(),
  notice: NoticeSchema.optional().catch(undefined),
});

const DEFAULT_NEXT = "/appointments";
// Relative hints are resolved against this origin; anything that lands elsewhere is dropped.
const REDIRECT_BASE = "http://clinic.invalid";

type RouteDeps = {
  store: AppointmentStore;
  config: AppConfig;
};

function wantsJson(req: FastifyRequest) {
  const accept = req.headers.accept ?? "";
  const contentType = req.headers["content-type"] ?? "";
  return accept.includes("application/json") || contentType.includes("application/json");
}

function resolveLocal(path: string) {
  try {
    const url = new URL(path, REDIRECT_BASE);
    return url.origin === REDIRECT_BASE ? url : null;
  } catch {
    return null;
  }
}

/** Only same-origin paths are followed; anything else falls back to the list. */
export function safeNext(next: string | undefined) {
  const url = next?.startsWith("/") ? resolveLocal(next) : null;
  return url ? `${url.pathname}${url.search}${url.hash}` : DEFAULT_NEXT;
}

/** Sets (or with no notice, clears) the `notice` parameter on a same-origin path. */
export function withNotice(path: string, notice?: Notice) {
  const url = resolveLocal(safeNext(path));
  if (!url) return DEFAULT_NEXT;
  if (notice) url.searchParams.set("notice", notice);
  else if (url.searchParams.has("notice")) url.searchParams.delete("notice");
  return `${url.pathname}${url.search}${url.hash}`;
}

function countByStatus(appointments: AppointmentRecord[]): StatusCounts {
  const counts: StatusCounts = { scheduled: 0, done: 0, total: appointments.length };
  for (const appt of appointments) counts[appt.status] += 1;
  return counts;
}

export async function appointmentsRoutes(app: FastifyInstance, { store, config }: RouteDeps) {
  async function changeStatus(
    req: FastifyRequest,
    id: string,
    body: z.infer<typeof StatusChangeBodySchema>
  ): Promise<AppointmentRecord> {
    const token = readCsrfToken(req, body.csrf_token);
    if (!token) throw new StatusChangeError("csrf_missing", "The CSRF token is missing.");

    const sessionId = readSessionId(req);
    if (!sessionId || !verifyCsrfToken(token, sessionId, config.csrfSecret)) {
      throw new StatusChangeError("csrf_invalid", "The CSRF token is invalid.");
    }

    const parsedStatus = AppointmentStatusSchema.safeParse(body.status);
    if (!parsedStatus.success) throw new StatusChangeError("invalid_status");
    const nextStatus: AppointmentStatus = parsedStatus.data;

    const current = await store.findById(id);
    if (!current) throw new StatusChangeError("not_found", "Appointment not found");
    if (!canTransition(current.status, nextStatus)) throw new StatusChangeError("illegal_transition");

    const updated = await store.updateStatus(id, nextStatus);
    if (!updated) throw new StatusChangeError("not_found", "Appointment not found");

    req.log.info({ appointmentId: id, from: current.status, to: updated.status }, "appointment status changed");
    return updated;
  }

  function rejectStatusChange(req: FastifyRequest, reply: FastifyReply, err: StatusChangeError, next: string) {
    req.log.warn({ code: err.code }, "appointment status change rejected");
    if (wantsJson(req)) {
      return reply.code(err.statusCode).send({ ok: false, error: err.code });
    }
    // A classic form post gets a bare 400 for a forged or stale token;
    // anything else goes back to the page, which shows the stored status.
    if (err.isCsrfFailure) {
      return reply.code(400).type("text/plain; charset=utf-8").send(err.message);
    }
    const notice = NoticeSchema.safeParse(err.code);
    return reply.code(303).redirect(withNotice(next, notice.success ? notice.data : undefined));
  }

  // CHANGE STATUS (fetch clients and fallback form posts)
  app.post("/appointments/:id/status", async (req, reply) => {
    const { id } = StatusParamsSchema.parse(req.params);
    const body = StatusChangeBodySchema.parse(req.body ?? {});
    const next = safeNext(body.next);

    try {
      const updated = await changeStatus(req, id, body);
      if (wantsJson(req)) return reply.send({ ok: true, status: updated.status });
      return reply.code(303).redirect(withNotice(next, statusNotice(updated.status)));
    } catch (err) {
      if (err instanceof StatusChangeError) return rejectStatusChange(req, reply, err, next);
      req.log.error({ err, appointmentId: id }, "appointment status change failed");
      if (wantsJson(req)) return reply.code(500).send({ ok: false, error: "server_error" });
      throw err;
    }
  });

  // DAY PAGE
  app.get("/appointments", async (req, reply) => {
    const query = PageQuerySchema.parse(req.query);

    const day = query.day
      ? DateTime.fromISO(query.day, { zone: config.clinicTimeZone }).startOf("day")
      : DateTime.now().setZone(config.clinicTimeZone).startOf("day");
    if (!day.isValid) {
      return reply.code(400).send({ error: "Invalid 'day'. Use YYYY-MM-DD" });
    }

    const all = await store.listBetween({
      from: day.toJSDate(),
      to: day.plus({ days: 1 }).toJSDate(),
    });
    const appointments = query.show === "all" ? all : all.filter((a) => a.status === query.show);
    const selected = query.selected ? all.find((a) => a.id === query.selected) ?? null : null;

    const sessionId = ensureSession(req, reply);
    const csrfToken = issueCsrfToken(sessionId, config.csrfSecret, config.csrfTtlSeconds);

    const html = renderAppointmentsPage({
      day,
      timeZone: config.clinicTimeZone,
      show: query.show,
      appointments,
      counts: countByStatus(all),
      selected,
      csrfToken,
      scriptUrl: config.statusScriptUrl,
      notice: query.notice,
      next: withNotice(req.url),
    });

    return reply.type("text/html; charset=utf-8").send(html);
  });
}
