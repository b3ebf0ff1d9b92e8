import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import type pg from 'pg';
import type { Logger } from '../logger.js';

export const MIGRATIONS_DIR = join(process.cwd(), 'src/infra/db/migrations');

const MIGRATION_FILE = /^(\d+)_(.+)\.(up|down)\.sql$/;

export interface Migration {
  version: number;
  name: string;
  upFile: string;
  downFile?: string;
}

export type MigrationDirection = 'up' | 'down';

export interface MigrationStep {
  migration: Migration;
  direction: MigrationDirection;
}

/**
 * Pair `NNNN_name.up.sql` / `NNNN_name.down.sql` files into migrations sorted
 * by version. Non-SQL files are ignored.
 */
export function parseMigrationFiles(files: string[]): Migration[] {
  const byVersion = new Map<number, { name: string; upFile?: string; downFile?: string }>();

  for (const filename of files) {
    if (!filename.endsWith('.sql')) {
      continue;
    }

    const match = filename.match(MIGRATION_FILE);
    if (!match) {
      throw new Error(`Invalid migration filename: ${filename}`);
    }

    const version = parseInt(match[1], 10);
    const name = match[2];
    const direction = match[3];

    const entry = byVersion.get(version) ?? { name };
    if (entry.name !== name) {
      throw new Error(`Conflicting names for migration ${version}: ${entry.name}, ${name}`);
    }
    if (direction === 'up') {
      entry.upFile = filename;
    } else {
      entry.downFile = filename;
    }
    byVersion.set(version, entry);
  }

  return [...byVersion.entries()]
    .map(([version, entry]) => {
      if (!entry.upFile) {
        throw new Error(`Migration ${version} has no up file`);
      }
      return { version, name: entry.name, upFile: entry.upFile, downFile: entry.downFile };
    })
    .sort((a, b) => a.version - b.version);
}

/**
 * Decide which migrations to run. `steps` of 0 means all of them.
 * Up runs pending migrations oldest first; down reverts applied ones newest first.
 */
export function planMigrations(
  migrations: Migration[],
  applied: number[],
  direction: MigrationDirection,
  steps = 0
): MigrationStep[] {
  const appliedSet = new Set(applied);

  const candidates =
    direction === 'up'
      ? migrations.filter((m) => !appliedSet.has(m.version))
      : migrations.filter((m) => appliedSet.has(m.version)).reverse();

  const selected = steps > 0 ? candidates.slice(0, steps) : candidates;

  return selected.map((migration) => {
    if (direction === 'down' && !migration.downFile) {
      throw new Error(`Migration ${migration.version} cannot be reverted: no down file`);
    }
    return { migration, direction };
  });
}

export class Migrator {
  constructor(
    private pool: pg.Pool,
    private logger: Logger,
    private dir: string = MIGRATIONS_DIR
  ) {}

  async up(steps = 0): Promise<number> {
    return this.run('up', steps);
  }

  async down(steps = 0): Promise<number> {
    return this.run('down', steps);
  }

  /**
   * Mark every known migration up to `version` as applied and everything
   * above it as not applied, without running any SQL.
   */
  async force(version: number): Promise<void> {
    await this.ensureMigrationsTable();
    const migrations = await this.loadMigrations();

    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      await client.query('DELETE FROM schema_migrations WHERE version > $1', [version]);
      for (const migration of migrations.filter((m) => m.version <= version)) {
        await client.query(
          'INSERT INTO schema_migrations (version) VALUES ($1) ON CONFLICT (version) DO NOTHING',
          [migration.version]
        );
      }
      await client.query('COMMIT');
      this.logger.info(`Forced migration version to ${version}`);
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }

  /**
   * Highest applied version, or null on an empty database.
   */
  async version(): Promise<number | null> {
    await this.ensureMigrationsTable();
    const applied = await this.getAppliedMigrations();
    return applied.length > 0 ? applied[applied.length - 1] : null;
  }

  private async run(direction: MigrationDirection, steps: number): Promise<number> {
    await this.ensureMigrationsTable();
    const migrations = await this.loadMigrations();
    const applied = await this.getAppliedMigrations();

    const plan = planMigrations(migrations, applied, direction, steps);
    if (plan.length === 0) {
      this.logger.info('No pending migrations.');
      return 0;
    }

    this.logger.info(`Found ${plan.length} migration(s) to run ${direction}`);
    for (const step of plan) {
      await this.applyStep(step);
    }
    return plan.length;
  }

  private async loadMigrations(): Promise<Migration[]> {
    return parseMigrationFiles(await readdir(this.dir));
  }

  private async ensureMigrationsTable(): Promise<void> {
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS schema_migrations (
        version INT PRIMARY KEY,
        applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);
  }

  private async getAppliedMigrations(): Promise<number[]> {
    const result = await this.pool.query<{ version: number }>(
      'SELECT version FROM schema_migrations ORDER BY version'
    );
    return result.rows.map((row) => row.version);
  }

  private async applyStep({ migration, direction }: MigrationStep): Promise<void> {
    const filename = direction === 'up' ? migration.upFile : migration.downFile;
    if (!filename) {
      throw new Error(`Migration ${migration.version} has no ${direction} file`);
    }
    const sql = await readFile(join(this.dir, filename), 'utf-8');

    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');

      await client.query(sql);

      if (direction === 'up') {
        await client.query('INSERT INTO schema_migrations (version) VALUES ($1)', [
          migration.version,
        ]);
      } else {
        await client.query('DELETE FROM schema_migrations WHERE version = $1', [
          migration.version,
        ]);
      }

      await client.query('COMMIT');
      this.logger.info(`✓ ${direction === 'up' ? 'Applied' : 'Reverted'} migration ${migration.version}: ${filename}`);
    } catch (error) {
      await client.query('ROLLBACK');
      throw error;
    } finally {
      client.release();
    }
  }
}
