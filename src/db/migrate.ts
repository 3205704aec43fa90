import { readdir, readFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import { fileURLToPath } from "node:url";
import { pool } from "./pool.js";
import { logger } from "../core/logger.js";

async function run() {
  const __filename = fileURLToPath(import.meta.url);
  const __dirname = dirname(__filename);

  await pool.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id SERIAL PRIMARY KEY,
      filename TEXT UNIQUE NOT NULL,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
    );
  `);

  const migrationsDir = join(__dirname, "migrations");
  const files = (await readdir(migrationsDir))
    .filter((f) => f.endsWith(".sql"))
    .sort((a, b) => a.localeCompare(b));

  for (const filename of files) {
    const already = await pool.query<{ filename: string }>(
      "SELECT filename FROM schema_migrations WHERE filename = $1",
      [filename]
    );
    if (already.rows[0]) continue;

    const sql = await readFile(join(migrationsDir, filename), "utf8");

    logger.info(`Running migration ${filename}...`);
    // One client for the whole migration so BEGIN/COMMIT wrap the same session.
    const client = await pool.connect();
    try {
      await client.query("BEGIN");
      await client.query(sql);
      await client.query("INSERT INTO schema_migrations (filename) VALUES ($1)", [filename]);
      await client.query("COMMIT");
    } catch (e) {
      await client.query("ROLLBACK").catch(() => undefined);
      throw e;
    } finally {
      client.release();
    }
    logger.info(`Migration OK: ${filename}`);
  }
}

await run()
  .catch((e) => {
    logger.error("Migration failed", e);
    process.exitCode = 1;
  })
  .finally(async () => {
    await pool.end();
  });
