import clsx from "clsx";
import { APPOINTMENT_STATUSES, STATUS_LABELS, type AppointmentStatus } from "../appointments/status";
import { statusUrl } from "./StatusChip";

type Props = {
  appointmentId: string;
  status: AppointmentStatus;
  csrfToken: string;
  next: string;
};

export function StatusToggle({ appointmentId, status, csrfToken, next }: Props) {
  const url = statusUrl(appointmentId);
  return (
    <form
      method="post"
      action={url}
      className="status-toggle"
      data-appt-id={appointmentId}
      data-status={status}
      data-status-url={url}
    >
      <input type="hidden" name="status" value={status} />
      <input type="hidden" name="csrf_token" value={csrfToken} />
      <input type="hidden" name="next" value={next} />
      {APPOINTMENT_STATUSES.map((choice) => (
        <button
          key={choice}
          type="button"
          className={clsx("status-choice", choice === status && "is-active")}
          data-status-choice={choice}
          aria-pressed={choice === status}
        >
          {STATUS_LABELS[choice]}
        </button>
      ))}
    </form>
  );
}
