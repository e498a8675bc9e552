import { buildApp } from "./app";
import { loadConfig } from "./config";
import { PgAppointmentStore } from "./appointments/store";
import { createPool } from "./db/pg";

const config = loadConfig();
const pool = createPool(config.databaseUrl);

const app = await buildApp({ config, store: new PgAppointmentStore(pool) });

app.addHook("onClose", async () => {
  await pool.end();
});

await app.listen({ port: config.port, host: config.host });
