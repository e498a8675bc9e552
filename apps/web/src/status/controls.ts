import { parseStatus, type AppointmentStatus } from "./contract";

export type StatusControlKind = "chip" | "toggle";

/** A status chip or toggle group as found in the page markup. */
export type StatusControl = {
  element: HTMLElement;
  kind: StatusControlKind;
  appointmentId: string | null;
};

export const TOGGLE_SELECTOR = ".status-toggle";
export const CHOICE_SELECTOR = "[data-status-choice]";
export const CHIP_SELECTOR = ".status-chip[data-appt-id]";

const DEFAULT_LABELS: Record<AppointmentStatus, string> = {
  scheduled: "Scheduled",
  done: "Done",
};

export function resolveControl(element: HTMLElement): StatusControl {
  const toggle = element.matches(TOGGLE_SELECTOR) ? element : element.closest<HTMLElement>(TOGGLE_SELECTOR);
  const target = toggle ?? element;
  return {
    element: target,
    kind: toggle ? "toggle" : "chip",
    appointmentId: target.dataset.apptId || null,
  };
}

/** Explicit `data-status-url`, then a form `action`, then the appointment-scoped route. */
export function resolveEndpoint({ element, appointmentId }: StatusControl): string | null {
  return (
    element.dataset.statusUrl ||
    element.getAttribute("action") ||
    (appointmentId ? `/appointments/${encodeURIComponent(appointmentId)}/status` : null)
  );
}

/**
 * Status the control currently shows. Controls rendered without one count as
 * scheduled; a value outside the enumeration yields null.
 */
export function readStatus({ element }: StatusControl): AppointmentStatus | null {
  const raw = element.dataset.status;
  if (!raw) return "scheduled";
  return parseStatus(raw);
}

function applyChipState(chip: HTMLElement, status: AppointmentStatus) {
  chip.dataset.status = status;
  chip.classList.toggle("is-done", status === "done");
  chip.classList.toggle("is-scheduled", status === "scheduled");
  chip.textContent =
    status === "done"
      ? chip.dataset.labelDone || DEFAULT_LABELS.done
      : chip.dataset.labelScheduled || DEFAULT_LABELS.scheduled;
  chip.setAttribute("aria-pressed", status === "done" ? "true" : "false");
}

function applyToggleState(toggle: HTMLElement, status: AppointmentStatus) {
  toggle.dataset.status = status;
  toggle.querySelectorAll<HTMLElement>(CHOICE_SELECTOR).forEach((button) => {
    const active = button.dataset.statusChoice === status;
    button.classList.toggle("is-active", active);
    button.setAttribute("aria-pressed", active ? "true" : "false");
  });
}

export function applyStatus(control: StatusControl, status: AppointmentStatus) {
  switch (control.kind) {
    case "chip":
      applyChipState(control.element, status);
      return;
    case "toggle":
      applyToggleState(control.element, status);
      return;
  }
}

/** The control itself when it is a form, else a form inside it, else the form around it. */
export function findFallbackForm({ element }: StatusControl): HTMLFormElement | null {
  if (element instanceof HTMLFormElement) return element;
  return element.querySelector("form") ?? element.closest("form");
}

export function readRedirectHint(control: StatusControl): string | undefined {
  const scopes = [control.element, findFallbackForm(control)];
  for (const scope of scopes) {
    const input = scope?.querySelector('input[name="next"]');
    if (input instanceof HTMLInputElement && input.value) return input.value;
  }
  return undefined;
}

/** Writes the desired status into the form's hidden field and submits it. */
export function submitFallbackForm(form: HTMLFormElement, status: AppointmentStatus) {
  const input = form.querySelector('input[name="status"]');
  if (input instanceof HTMLInputElement) input.value = status;
  form.submit();
}
