import type { Pool } from "pg";
import { z } from "zod";
import { AppointmentStatusSchema, type AppointmentStatus } from "./status";

export type AppointmentRecord = {
  id: string;
  title: string;
  patientName: string | null;
  doctorLabel: string;
  startsAt: Date;
  endsAt: Date;
  status: AppointmentStatus;
  updatedAt: Date | null;
};

export type DayRange = {
  from: Date;
  to: Date;
};

export interface AppointmentStore {
  listBetween(range: DayRange): Promise<AppointmentRecord[]>;
  findById(id: string): Promise<AppointmentRecord | null>;
  /** Returns the updated record, or null when the appointment no longer exists. */
  updateStatus(id: string, status: AppointmentStatus): Promise<AppointmentRecord | null>;
}

const AppointmentRowSchema = z.object({
  id: z.string(),
  title: z.string(),
  patient_name: z.string().nullable(),
  doctor_label: z.string(),
  starts_at: z.coerce.date(),
  ends_at: z.coerce.date(),
  status: AppointmentStatusSchema,
  updated_at: z.coerce.date().nullable(),
});

function toRecord(row: unknown): AppointmentRecord {
  const r = AppointmentRowSchema.parse(row);
  return {
    id: r.id,
    title: r.title,
    patientName: r.patient_name,
    doctorLabel: r.doctor_label,
    startsAt: r.starts_at,
    endsAt: r.ends_at,
    status: r.status,
    updatedAt: r.updated_at,
  };
}

const COLUMNS = "id, title, patient_name, doctor_label, starts_at, ends_at, status, updated_at";

export class PgAppointmentStore implements AppointmentStore {
  constructor(private readonly pool: Pool) {}

  async listBetween(range: DayRange) {
    const { rows } = await this.pool.query(
      `SELECT ${COLUMNS}
         FROM appointments
        WHERE starts_at >= $1 AND starts_at < $2
        ORDER BY starts_at ASC`,
      [range.from, range.to]
    );
    return rows.map(toRecord);
  }

  async findById(id: string) {
    const { rows } = await this.pool.query(`SELECT ${COLUMNS} FROM appointments WHERE id = $1`, [id]);
    return rows.length > 0 ? toRecord(rows[0]) : null;
  }

  async updateStatus(id: string, status: AppointmentStatus) {
    const { rows } = await this.pool.query(
      `UPDATE appointments
          SET status = $2, updated_at = NOW()
        WHERE id = $1
        RETURNING ${COLUMNS}`,
      [id, status]
    );
    return rows.length > 0 ? toRecord(rows[0]) : null;
  }
}
