import type { AppointmentStatus } from "../appointments/status";
import type { AppointmentRecord, AppointmentStore, DayRange } from "../appointments/store";

export function appointment(overrides: Partial<AppointmentRecord> & Pick<AppointmentRecord, "id">): AppointmentRecord {
  return {
    title: "Check-up",
    patientName: "Test Patient",
    doctorLabel: "Dr. Test",
    startsAt: new Date("2026-10-19T09:00:00Z"),
    endsAt: new Date("2026-10-19T09:30:00Z"),
    status: "scheduled",
    updatedAt: null,
    ...overrides,
  };
}

/** Stands in for the pg-backed store in route tests. */
export class InMemoryAppointmentStore implements AppointmentStore {
  private readonly rows = new Map<string, AppointmentRecord>();

  constructor(seed: AppointmentRecord[] = []) {
    for (const row of seed) this.rows.set(row.id, { ...row });
  }

  async listBetween({ from, to }: DayRange) {
    return [...this.rows.values()]
      .filter((r) => r.startsAt >= from && r.startsAt < to)
      .sort((a, b) => a.startsAt.getTime() - b.startsAt.getTime())
      .map((r) => ({ ...r }));
  }

  async findById(id: string) {
    const row = this.rows.get(id);
    return row ? { ...row } : null;
  }

  async updateStatus(id: string, status: AppointmentStatus) {
    const row = this.rows.get(id);
    if (!row) return null;
    const updated = { ...row, status, updatedAt: new Date() };
    this.rows.set(id, updated);
    return { ...updated };
  }

  statusOf(id: string) {
    return this.rows.get(id)?.status;
  }
}
