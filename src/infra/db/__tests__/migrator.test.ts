import { describe, it, expect } from 'vitest';
import { readdirSync } from 'fs';
import { MIGRATIONS_DIR, parseMigrationFiles, planMigrations } from '../migrator.js';

describe('parseMigrationFiles', () => {
  it('should pair up and down files and sort by version', () => {
    const migrations = parseMigrationFiles([
      '0002_add_index.up.sql',
      '0001_create_users.down.sql',
      'README.md',
      '0001_create_users.up.sql',
    ]);

    expect(migrations).toEqual([
      {
        version: 1,
        name: 'create_users',
        upFile: '0001_create_users.up.sql',
        downFile: '0001_create_users.down.sql',
      },
      { version: 2, name: 'add_index', upFile: '0002_add_index.up.sql', downFile: undefined },
    ]);
  });

  it('should reject a badly named file', () => {
    expect(() => parseMigrationFiles(['create_users.sql'])).toThrow(
      'Invalid migration filename: create_users.sql'
    );
  });

  it('should reject two names for one version', () => {
    expect(() => parseMigrationFiles(['0001_a.up.sql', '0001_b.down.sql'])).toThrow(
      'Conflicting names for migration 1: a, b'
    );
  });

  it('should reject a migration without an up file', () => {
    expect(() => parseMigrationFiles(['0003_orphan.down.sql'])).toThrow(
      'Migration 3 has no up file'
    );
  });

  it('should parse the shipped migrations', () => {
    const migrations = parseMigrationFiles(readdirSync(MIGRATIONS_DIR));

    expect(migrations[0]).toMatchObject({ version: 1, name: 'create_users' });
    expect(migrations.every((m) => m.downFile !== undefined)).toBe(true);
  });
});

describe('planMigrations', () => {
  const migrations = parseMigrationFiles([
    '0001_a.up.sql',
    '0001_a.down.sql',
    '0002_b.up.sql',
    '0002_b.down.sql',
    '0003_c.up.sql',
  ]);

  it('should run pending migrations oldest first', () => {
    const plan = planMigrations(migrations, [1], 'up');

    expect(plan.map((s) => s.migration.version)).toEqual([2, 3]);
    expect(plan.every((s) => s.direction === 'up')).toBe(true);
  });

  it('should limit the plan to the requested steps', () => {
    expect(planMigrations(migrations, [], 'up', 1).map((s) => s.migration.version)).toEqual([1]);
  });

  it('should revert applied migrations newest first', () => {
    expect(planMigrations(migrations, [1, 2], 'down').map((s) => s.migration.version)).toEqual([2, 1]);
  });

  it('should refuse to revert a migration with no down file', () => {
    expect(() => planMigrations(migrations, [1, 2, 3], 'down', 1)).toThrow(
      'Migration 3 cannot be reverted: no down file'
    );
  });

  it('should plan nothing when up to date', () => {
    expect(planMigrations(migrations, [1, 2, 3], 'up')).toEqual([]);
  });
});
