import { z } from "zod";

export const APPOINTMENT_STATUSES = ["scheduled", "done"] as const;

export const AppointmentStatusSchema = z.enum(APPOINTMENT_STATUSES);

export type AppointmentStatus = z.infer<typeof AppointmentStatusSchema>;

export const STATUS_LABELS: Record<AppointmentStatus, string> = {
  scheduled: "Scheduled",
  done: "Done",
};

export function oppositeStatus(status: AppointmentStatus): AppointmentStatus {
  switch (status) {
    case "scheduled":
      return "done";
    case "done":
      return "scheduled";
  }
}

/**
 * Transitions the status endpoint accepts. Writing the current status again
 * is allowed so a repeated submit of the same form stays harmless.
 */
const TRANSITIONS: Record<AppointmentStatus, readonly AppointmentStatus[]> = {
  scheduled: ["scheduled", "done"],
  done: ["done", "scheduled"],
};

export function canTransition(from: AppointmentStatus, to: AppointmentStatus) {
  return TRANSITIONS[from].includes(to);
}
