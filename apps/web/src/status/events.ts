import { logger } from "../lib/logger";
import type { AppointmentStatus } from "./contract";

export type IgnoreReason = "no_endpoint" | "unknown_status" | "unchanged" | "in_flight";

export type StatusSyncEvent =
  | { name: "ignored"; controlId: string; reason: IgnoreReason }
  | { name: "optimistic"; controlId: string; from: AppointmentStatus; to: AppointmentStatus }
  | { name: "confirmed"; controlId: string; status: AppointmentStatus; serverConfirmed: boolean }
  | { name: "failed"; controlId: string; reason: string; revertedTo: AppointmentStatus }
  | { name: "fallback_submitted"; controlId: string; status: AppointmentStatus };

export type StatusSyncHook = (event: StatusSyncEvent) => void;

export const logStatusSyncEvent: StatusSyncHook = (event) => {
  switch (event.name) {
    case "failed":
      logger.warn("[status-sync]", event);
      return;
    case "ignored":
    case "optimistic":
    case "confirmed":
    case "fallback_submitted":
      logger.debug("[status-sync]", event);
      return;
  }
};
