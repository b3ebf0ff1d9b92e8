import { parseArgs } from 'util';
import dotenv from 'dotenv';
import { loadConfig } from '../config.js';
import { createLogger, errorMeta } from '../logger.js';
import { createPool } from './pool.js';
import { Migrator } from './migrator.js';

// Usage: npm run migrate -- [up|down|force|version] [--steps N] [--version N]

dotenv.config();

async function main(): Promise<void> {
  const { positionals, values } = parseArgs({
    allowPositionals: true,
    options: {
      steps: { type: 'string', default: '0' },
      version: { type: 'string' },
    },
  });

  const command = positionals[0] ?? 'up';
  const steps = parseInt(values.steps ?? '0', 10);

  const config = loadConfig();
  const logger = createLogger({
    level: config.log.level,
    service: `${config.app.name}-migrate`,
    env: config.app.env,
  });
  const pool = createPool(config.database, logger);
  const migrator = new Migrator(pool, logger);

  try {
    switch (command) {
      case 'up':
      case 'down': {
        const count = command === 'up' ? await migrator.up(steps) : await migrator.down(steps);
        logger.info(`Migration completed successfully (${count} step(s))`);
        break;
      }
      case 'force': {
        const target = values.version === undefined ? NaN : parseInt(values.version, 10);
        if (Number.isNaN(target) || target < 0) {
          throw new Error('Please provide a version number with --version');
        }
        await migrator.force(target);
        break;
      }
      case 'version': {
        const current = await migrator.version();
        logger.info(`Current version: ${current ?? 'none'}`);
        break;
      }
      default:
        throw new Error(`Unknown command: ${command}`);
    }
  } catch (error) {
    logger.error('Migration failed', errorMeta(error));
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

main().catch((error: unknown) => {
  // Config failed to load, so there is no logger yet
  console.error('Migration failed:', error);
  process.exitCode = 1;
});
