import { promises as fs } from "fs";
import { fileURLToPath } from "url";
import type * as pg from "pg";

export const DEFAULT_SCHEMA_PATH = fileURLToPath(new URL("../../db/schema.sql", import.meta.url));

export async function applySqlFile(pool: pg.Pool, filePath: string = DEFAULT_SCHEMA_PATH): Promise<void> {
  const sql = await fs.readFile(filePath, "utf8");
  if (!sql.trim()) return;
  await pool.query(sql);
}
