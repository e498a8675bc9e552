import { isAxiosError, type AxiosInstance } from "axios";
import { http as defaultHttp } from "../lib/http";
import { logger } from "../lib/logger";
import {
  STATUS_REQUEST_CONTENT_TYPE,
  encodeStatusChange,
  oppositeStatus,
  parseStatus,
  readStatusChangePayload,
  type AppointmentStatus,
  type StatusChangePayload,
} from "./contract";
import {
  CHIP_SELECTOR,
  CHOICE_SELECTOR,
  TOGGLE_SELECTOR,
  applyStatus,
  findFallbackForm,
  readRedirectHint,
  readStatus,
  resolveControl,
  resolveEndpoint,
  submitFallbackForm,
  type StatusControl,
} from "./controls";
import { readCsrfToken } from "./csrf";
import { logStatusSyncEvent, type IgnoreReason, type StatusSyncHook } from "./events";

export const ERROR_FLASH_MS = 1500;

export type StatusSynchronizerOptions = {
  http?: AxiosInstance;
  document?: Document;
  /** How long the `error` class stays on a control after a failed save. */
  errorFlashMs?: number;
  onEvent?: StatusSyncHook;
};

type ControlState = {
  saving: boolean;
  flashTimer?: ReturnType<typeof setTimeout>;
};

type ClickRoute = {
  element: HTMLElement;
  desired?: AppointmentStatus;
};

class StatusChangeFailure extends Error {
  constructor(readonly reason: string) {
    super(reason);
    this.name = "StatusChangeFailure";
  }
}

function errorCode(payload: StatusChangePayload | null) {
  return typeof payload?.error === "string" && payload.error ? payload.error : null;
}

function failureReason(err: unknown) {
  if (err instanceof StatusChangeFailure) return err.reason;
  if (isAxiosError(err)) return err.code ?? "network_error";
  return err instanceof Error ? err.message : "unknown_error";
}

/**
 * Drives every status chip and toggle group on the page through one
 * protocol: optimistic update, form-encoded POST, reconcile against the
 * server's answer, and on any failure revert and fall back to submitting the
 * control's classic form.
 *
 * At most one request is in flight per control; clicks on a control that is
 * saving are dropped, not queued.
 */
export class StatusSynchronizer {
  private readonly http: AxiosInstance;
  private readonly doc: Document;
  private readonly errorFlashMs: number;
  private readonly onEvent: StatusSyncHook;
  private readonly states = new WeakMap<HTMLElement, ControlState>();
  private readonly inFlight = new Set<Promise<void>>();

  constructor(options: StatusSynchronizerOptions = {}) {
    this.http = options.http ?? defaultHttp;
    this.doc = options.document ?? document;
    this.errorFlashMs = options.errorFlashMs ?? ERROR_FLASH_MS;
    this.onEvent = options.onEvent ?? logStatusSyncEvent;
  }

  /**
   * Changes the status shown by the control that contains `element`. Toggle
   * groups pass the chosen value; chips omit it and flip. Never rejects.
   */
  requestStatusChange(element: HTMLElement, desiredStatus?: AppointmentStatus): Promise<void> {
    const tracked: Promise<void> = this.run(resolveControl(element), desiredStatus).finally(() => {
      this.inFlight.delete(tracked);
    });
    this.inFlight.add(tracked);
    return tracked;
  }

  isSaving(element: HTMLElement) {
    return this.states.get(resolveControl(element).element)?.saving ?? false;
  }

  /** Resolves once no request started through this synchronizer is pending. */
  async settled() {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  /** Listens for clicks on the whole document; returns the function that stops listening. */
  install() {
    const onClick = (event: MouseEvent) => this.handleClick(event);
    this.doc.addEventListener("click", onClick);
    return () => this.doc.removeEventListener("click", onClick);
  }

  private handleClick(event: MouseEvent) {
    const route = this.routeClick(event.target);
    if (!route) return;
    event.preventDefault();
    this.requestStatusChange(route.element, route.desired).catch((err: unknown) => {
      logger.error("[status-sync] unexpected failure", err);
    });
  }

  private routeClick(target: EventTarget | null): ClickRoute | null {
    if (!(target instanceof Element)) return null;

    const choice = target.closest<HTMLElement>(CHOICE_SELECTOR);
    if (choice) {
      const toggle = choice.closest<HTMLElement>(TOGGLE_SELECTOR);
      if (!toggle) return null;
      const desired = parseStatus(choice.dataset.statusChoice);
      if (!desired) {
        this.ignore(toggle.dataset.apptId ?? "unknown", "unknown_status");
        return null;
      }
      return { element: toggle, desired };
    }

    const chip = target.closest<HTMLElement>(CHIP_SELECTOR);
    if (!chip || chip.closest(TOGGLE_SELECTOR)) return null;
    return { element: chip };
  }

  private stateOf(element: HTMLElement) {
    let state = this.states.get(element);
    if (!state) {
      state = { saving: false };
      this.states.set(element, state);
    }
    return state;
  }

  private ignore(controlId: string, reason: IgnoreReason) {
    this.onEvent({ name: "ignored", controlId, reason });
  }

  private async run(control: StatusControl, desired?: AppointmentStatus) {
    const endpoint = resolveEndpoint(control);
    const controlId = control.appointmentId ?? endpoint ?? "unknown";
    if (!endpoint) return this.ignore(controlId, "no_endpoint");

    const current = readStatus(control);
    if (!current) return this.ignore(controlId, "unknown_status");
    if (desired && desired === current) return this.ignore(controlId, "unchanged");

    const state = this.stateOf(control.element);
    if (state.saving) return this.ignore(controlId, "in_flight");

    const next = desired ?? oppositeStatus(current);
    state.saving = true;
    control.element.classList.add("saving");
    applyStatus(control, next);
    this.onEvent({ name: "optimistic", controlId, from: current, to: next });

    try {
      const confirmed = await this.send(control, endpoint, next);
      const final = confirmed ?? next;
      applyStatus(control, final);
      this.onEvent({ name: "confirmed", controlId, status: final, serverConfirmed: confirmed !== null });
    } catch (err) {
      applyStatus(control, current);
      this.flashError(control.element, state);
      this.onEvent({ name: "failed", controlId, reason: failureReason(err), revertedTo: current });

      const form = findFallbackForm(control);
      if (form) {
        submitFallbackForm(form, next);
        this.onEvent({ name: "fallback_submitted", controlId, status: next });
        return;
      }
    } finally {
      state.saving = false;
      control.element.classList.remove("saving");
    }
  }

  /** Returns the server-confirmed status, or null when the answer confirmed none. */
  private async send(control: StatusControl, endpoint: string, status: AppointmentStatus) {
    const csrfToken = readCsrfToken(this.doc);
    const res = await this.http.post<unknown>(
      endpoint,
      encodeStatusChange({ status, csrfToken, next: readRedirectHint(control) }),
      {
        headers: {
          "Content-Type": STATUS_REQUEST_CONTENT_TYPE,
          "X-CSRFToken": csrfToken,
          Accept: "application/json",
        },
        responseType: "text",
        transformResponse: (data: unknown) => data,
        validateStatus: () => true,
      }
    );

    const payload = readStatusChangePayload(res.data);
    if (res.status < 200 || res.status >= 300) {
      throw new StatusChangeFailure(errorCode(payload) ?? `http_${res.status}`);
    }
    // A 2xx body that is not JSON leaves the optimistic value in place.
    if (payload === null) return null;
    if (!payload.ok) throw new StatusChangeFailure(errorCode(payload) ?? "save_failed");
    if (!payload.status) return null;

    const confirmed = typeof payload.status === "string" ? parseStatus(payload.status) : null;
    if (!confirmed) throw new StatusChangeFailure("unknown_status");
    return confirmed;
  }

  private flashError(element: HTMLElement, state: ControlState) {
    clearTimeout(state.flashTimer);
    element.classList.add("error");
    state.flashTimer = setTimeout(() => {
      element.classList.remove("error");
      state.flashTimer = undefined;
    }, this.errorFlashMs);
  }
}
