import { Pool } from "pg";

export function createPool(connectionString: string) {
  return new Pool({ connectionString });
}
