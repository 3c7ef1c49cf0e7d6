import fs from 'fs';
import path from 'path';
import type { QueryFn } from './db';
import logger from './logger';

export interface MigrationRunner {
  query: QueryFn;
  transaction<T>(fn: (query: QueryFn) => Promise<T>): Promise<T>;
}

export interface RunMigrationsOptions {
  /** Substituted for `{{table}}` in the SQL files; must already be a validated identifier. */
  table: string;
  migrationsDir?: string;
}

interface MigrationFile {
  version: string;
  upPath: string;
}

function resolveMigrationsDir() {
  const rootPath = path.join(__dirname, '..', 'migrations');
  if (fs.existsSync(rootPath)) return rootPath;
  const distPath = path.join(__dirname, '..', '..', 'migrations');
  if (fs.existsSync(distPath)) return distPath;
  throw new Error('[migrations] migrations directory not found');
}

function loadMigrations(dir: string): MigrationFile[] {
  return fs
    .readdirSync(dir)
    .filter((f) => f.endsWith('.sql') && !f.endsWith('.down.sql'))
    .map((f) => f.replace(/\.sql$/, ''))
    .sort()
    .map((version) => ({ version, upPath: path.join(dir, `${version}.sql`) }));
}

export function renderMigration(sql: string, table: string): string {
  return sql.replace(/\{\{table\}\}/g, table);
}

export async function runMigrations(db: MigrationRunner, options: RunMigrationsOptions): Promise<string[]> {
  const migrations = loadMigrations(options.migrationsDir ?? resolveMigrationsDir());
  const applied: string[] = [];

  await db.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);

  for (const migration of migrations) {
    // One forecast table per configured name, so the version is scoped to it.
    const version = `${migration.version}:${options.table}`;
    const existing = await db.query('SELECT version FROM schema_migrations WHERE version = $1', [version]);
    if (existing.rows.length > 0) continue;

    const sql = renderMigration(fs.readFileSync(migration.upPath, 'utf-8'), options.table);
    await db.transaction(async (query) => {
      await query(sql);
      await query('INSERT INTO schema_migrations (version) VALUES ($1)', [version]);
    });
    logger.info('[migrations] applied', { migration: version });
    applied.push(version);
  }
  return applied;
}
