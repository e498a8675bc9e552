import { z } from "zod";

export const APPOINTMENT_STATUSES = ["scheduled", "done"] as const;

export const AppointmentStatusSchema = z.enum(APPOINTMENT_STATUSES);

export type AppointmentStatus = z.infer<typeof AppointmentStatusSchema>;

export function parseStatus(value: string | null | undefined): AppointmentStatus | null {
  const parsed = AppointmentStatusSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

export function oppositeStatus(status: AppointmentStatus): AppointmentStatus {
  switch (status) {
    case "scheduled":
      return "done";
    case "done":
      return "scheduled";
  }
}

export type StatusChangeRequest = {
  status: AppointmentStatus;
  csrfToken: string;
  next?: string;
};

export const STATUS_REQUEST_CONTENT_TYPE = "application/x-www-form-urlencoded;charset=UTF-8";

/** `status=…&csrf_token=…[&next=…]`, the same fields the classic form posts. */
export function encodeStatusChange({ status, csrfToken, next }: StatusChangeRequest) {
  const body = new URLSearchParams({ status, csrf_token: csrfToken });
  if (next) body.set("next", next);
  return body.toString();
}

const StatusChangePayloadSchema = z.object({
  ok: z.unknown().optional(),
  status: z.unknown().optional(),
  error: z.unknown().optional(),
});

export type StatusChangePayload = z.infer<typeof StatusChangePayloadSchema>;

/**
 * Reads the endpoint's JSON body. Text that is not JSON at all yields null;
 * JSON that is not an object yields an empty payload.
 */
export function readStatusChangePayload(raw: unknown): StatusChangePayload | null {
  let data: unknown = raw;
  if (typeof raw === "string") {
    try {
      data = JSON.parse(raw);
    } catch {
      return null;
    }
  }
  const parsed = StatusChangePayloadSchema.safeParse(data);
  return parsed.success ? parsed.data : {};
}
