import clsx from "clsx";
import { DateTime } from "luxon";
import { renderToStaticMarkup } from "react-dom/server";
import { STATUS_LABELS, type AppointmentStatus } from "../appointments/status";
import type { AppointmentRecord } from "../appointments/store";
import { StatusChip } from "./StatusChip";
import { StatusToggle } from "./StatusToggle";
import { NOTICES, type Notice } from "./notices";

export type ShowFilter = "all" | AppointmentStatus;

export type StatusCounts = Record<AppointmentStatus, number> & { total: number };

export type AppointmentsPageProps = {
  day: DateTime;
  timeZone: string;
  show: ShowFilter;
  appointments: AppointmentRecord[];
  counts: StatusCounts;
  selected: AppointmentRecord | null;
  csrfToken: string;
  scriptUrl: string;
  notice?: Notice;
  /** Where the status forms send the browser back to. */
  next: string;
};

const FILTERS: ShowFilter[] = ["all", "scheduled", "done"];

function formatRange(appt: AppointmentRecord, timeZone: string) {
  const start = DateTime.fromJSDate(appt.startsAt, { zone: timeZone });
  const end = DateTime.fromJSDate(appt.endsAt, { zone: timeZone });
  return `${start.toFormat("HH:mm")}–${end.toFormat("HH:mm")}`;
}

function filterHref(day: DateTime, show: ShowFilter) {
  return `/appointments?day=${day.toISODate()}&show=${show}`;
}

export function AppointmentsPage({
  day,
  timeZone,
  show,
  appointments,
  counts,
  selected,
  csrfToken,
  scriptUrl,
  notice,
  next,
}: AppointmentsPageProps) {
  return (
    <html lang="en">
      <head>
        <meta charSet="utf-8" />
        <meta name="csrf-token" content={csrfToken} />
        <title>{`Appointments · ${day.toFormat("dd LLL yyyy")}`}</title>
      </head>
      <body>
        <main className="panel">
          <div className="panel-inner">
            <h1 className="panel-title">Appointments for {day.toFormat("cccc dd LLL yyyy")}</h1>

            {notice && (
              <div className={clsx("notice", `is-${NOTICES[notice].tone}`)} role="status">
                {NOTICES[notice].message}
              </div>
            )}

            <nav className="filters">
              {FILTERS.map((f) => (
                <a key={f} href={filterHref(day, f)} className={clsx("filter", f === show && "is-active")}>
                  {f === "all" ? "All" : STATUS_LABELS[f]}
                </a>
              ))}
              <span className="small muted">
                {counts.scheduled} scheduled · {counts.done} done · {counts.total} total
              </span>
            </nav>

            {appointments.length === 0 ? (
              <div className="empty-state">No appointments for this day.</div>
            ) : (
              <div className="appointments-list">
                {appointments.map((appt) => (
                  <div key={appt.id} className="appointment-card">
                    <div className="appointment-title">
                      <a href={`/appointments?day=${day.toISODate()}&show=${show}&selected=${encodeURIComponent(appt.id)}`}>{appt.title}</a>
                    </div>
                    <div>{appt.patientName ?? "Unassigned patient"}</div>
                    <div className="small muted">
                      {formatRange(appt, timeZone)} · {appt.doctorLabel}
                    </div>
                    <StatusChip appointmentId={appt.id} status={appt.status} csrfToken={csrfToken} next={next} />
                  </div>
                ))}
              </div>
            )}
          </div>
        </main>

        {selected && (
          <aside className="panel">
            <div className="panel-inner">
              <h2 className="panel-title">{selected.title}</h2>
              <div className="small muted">
                {formatRange(selected, timeZone)} · {selected.doctorLabel}
              </div>
              <StatusToggle appointmentId={selected.id} status={selected.status} csrfToken={csrfToken} next={next} />
            </div>
          </aside>
        )}

        <script src={scriptUrl} defer />
      </body>
    </html>
  );
}

export function renderAppointmentsPage(props: AppointmentsPageProps) {
  return `<!DOCTYPE html>${renderToStaticMarkup(<AppointmentsPage {...props} />)}`;
}
