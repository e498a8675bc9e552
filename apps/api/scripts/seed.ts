import { randomUUID } from "node:crypto";
import { readFile } from "node:fs/promises";
import { DateTime } from "luxon";
import { loadConfig } from "../src/config";
import { createPool } from "../src/db/pg";

const config = loadConfig();
const pool = createPool(config.databaseUrl);

// Demo day: three doctors, a handful of visits starting at 09:00 clinic time
const demo = [
  { title: "Check-up", patientName: "Mario Rossi", doctorLabel: "Dr. Bianchi", hour: 9, minutes: 30 },
  { title: "Cleaning", patientName: "Giulia Verdi", doctorLabel: "Dr. Conti", hour: 10, minutes: 45 },
  { title: "Filling", patientName: "Paolo Ferri", doctorLabel: "Dr. Bianchi", hour: 11, minutes: 60 },
  { title: "Consultation", patientName: null, doctorLabel: "Dr. Sala", hour: 14, minutes: 30 },
];

async function main() {
  const schema = await readFile(new URL("../db/schema.sql", import.meta.url), "utf8");
  await pool.query(schema);

  const day = DateTime.now().setZone(config.clinicTimeZone).startOf("day");
  for (const d of demo) {
    const start = day.set({ hour: d.hour });
    await pool.query(
      `INSERT INTO appointments (id, title, patient_name, doctor_label, starts_at, ends_at)
       VALUES ($1, $2, $3, $4, $5, $6)`,
      [randomUUID(), d.title, d.patientName, d.doctorLabel, start.toJSDate(), start.plus({ minutes: d.minutes }).toJSDate()]
    );
  }

  console.log(`Seed completed: ${demo.length} appointments on ${day.toISODate()}.`);
}

main()
  .catch((e) => {
    console.error(e);
    process.exitCode = 1;
  })
  .finally(async () => {
    await pool.end();
  });
