import { z } from "zod";
import { STATUS_LABELS, type AppointmentStatus } from "../appointments/status";

/** One-shot outcome of a form post, carried back to the page as `?notice=`. */
export const NoticeSchema = z.enum(["status_scheduled", "status_done", "invalid_status", "illegal_transition", "not_found"]);

export type Notice = z.infer<typeof NoticeSchema>;

export type NoticeTone = "ok" | "err";

export const NOTICES: Record<Notice, { tone: NoticeTone; message: string }> = {
  status_scheduled: { tone: "ok", message: `Appointment marked as ${STATUS_LABELS.scheduled}.` },
  status_done: { tone: "ok", message: `Appointment marked as ${STATUS_LABELS.done}.` },
  invalid_status: { tone: "err", message: "That status is not recognised." },
  illegal_transition: { tone: "err", message: "That status change is not allowed." },
  not_found: { tone: "err", message: "Appointment not found." },
};

export function statusNotice(status: AppointmentStatus): Notice {
  switch (status) {
    case "scheduled":
      return "status_scheduled";
    case "done":
      return "status_done";
  }
}
