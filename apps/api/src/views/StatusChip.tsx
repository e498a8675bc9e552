import clsx from "clsx";
import { STATUS_LABELS, oppositeStatus, type AppointmentStatus } from "../appointments/status";

type Props = {
  appointmentId: string;
  status: AppointmentStatus;
  csrfToken: string;
  next: string;
};

export function statusUrl(appointmentId: string) {
  return `/appointments/${encodeURIComponent(appointmentId)}/status`;
}

/**
 * Single-button control. Without the sync script the button submits its form,
 * which already carries the flipped status.
 */
export function StatusChip({ appointmentId, status, csrfToken, next }: Props) {
  return (
    <form method="post" action={statusUrl(appointmentId)} className="status-form">
      <input type="hidden" name="status" value={oppositeStatus(status)} />
      <input type="hidden" name="csrf_token" value={csrfToken} />
      <input type="hidden" name="next" value={next} />
      <button
        type="submit"
        className={clsx("status-chip", status === "done" ? "is-done" : "is-scheduled")}
        data-appt-id={appointmentId}
        data-status={status}
        data-label-done={STATUS_LABELS.done}
        data-label-scheduled={STATUS_LABELS.scheduled}
        aria-pressed={status === "done"}
      >
        {STATUS_LABELS[status]}
      </button>
    </form>
  );
}
