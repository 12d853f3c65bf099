import { readFileSync, readdirSync } from "fs";
import { join } from "path";
import { createHash } from "crypto";
import { Client } from "pg";

type MigrationResult = {
  status: "applied" | "already_applied";
  migration_name: string | null;
  applied_migrations: string[];
  finished_at: string;
};

export const MIGRATIONS_DIR = join(__dirname, "../../db/migrations");

const requiredEnv = (name: string): string => {
  const value = process.env[name];
  if (!value) throw new Error(`Missing required env var ${name}`);
  return value;
};

/** Migration directory names, applied in lexical order. */
export const listLocalMigrations = (dir: string = MIGRATIONS_DIR): string[] =>
  readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort((a, b) => a.localeCompare(b));

export const readMigrationSql = (migrationName: string, dir: string = MIGRATIONS_DIR): string =>
  readFileSync(join(dir, migrationName, "migration.sql"), "utf8");

export const checksumOf = (sql: string): string => createHash("sha256").update(sql).digest("hex");

const ensureMigrationsTable = async (client: Client) => {
  await client.query(`
    CREATE TABLE IF NOT EXISTS "_schema_migrations" (
      migration_name VARCHAR(255) PRIMARY KEY NOT NULL,
      checksum VARCHAR(64) NOT NULL,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT now()
    );
  `);
};

const listAppliedMigrations = async (client: Client): Promise<Map<string, string>> => {
  const result = await client.query<{ migration_name: string; checksum: string }>(
    `SELECT migration_name, checksum FROM "_schema_migrations"`
  );

  return new Map(result.rows.map((row): [string, string] => [row.migration_name, row.checksum]));
};

const applyMigration = async (client: Client, migrationName: string, sql: string, checksum: string) => {
  await client.query("BEGIN");
  try {
    await client.query(sql);
    await client.query(`INSERT INTO "_schema_migrations" (migration_name, checksum, applied_at) VALUES ($1, $2, now())`, [
      migrationName,
      checksum
    ]);
    await client.query("COMMIT");
  } catch (error) {
    await client.query("ROLLBACK");
    throw error;
  }
};

const getClient = (): Client =>
  new Client({
    host: requiredEnv("DB_HOST"),
    port: Number(process.env.DB_PORT ?? "5432"),
    database: requiredEnv("DB_NAME"),
    user: requiredEnv("DB_USER"),
    password: requiredEnv("DB_PASSWORD"),
    ssl: {
      rejectUnauthorized: false
    },
    statement_timeout: 300_000
  });

export const main = async (): Promise<MigrationResult> => {
  const client = getClient();

  await client.connect();
  try {
    await ensureMigrationsTable(client);

    const localMigrations = listLocalMigrations();
    const applied = await listAppliedMigrations(client);

    for (const name of localMigrations) {
      const recorded = applied.get(name);
      if (recorded && recorded !== checksumOf(readMigrationSql(name))) {
        console.log(JSON.stringify({ level: "warn", message: "migration_checksum_mismatch", migration_name: name }));
      }
    }

    const pending = localMigrations.filter((name) => !applied.has(name));
    if (pending.length === 0) {
      return {
        status: "already_applied",
        migration_name: localMigrations[localMigrations.length - 1] ?? null,
        applied_migrations: [],
        finished_at: new Date().toISOString()
      };
    }

    for (const migrationName of pending) {
      const sql = readMigrationSql(migrationName);
      await applyMigration(client, migrationName, sql, checksumOf(sql));
      console.log(JSON.stringify({ level: "info", message: "migration_applied", migration_name: migrationName }));
    }

    return {
      status: "applied",
      migration_name: pending[pending.length - 1] ?? null,
      applied_migrations: pending,
      finished_at: new Date().toISOString()
    };
  } finally {
    await client.end();
  }
};
