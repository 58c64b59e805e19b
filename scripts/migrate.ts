import 'dotenv/config';
import { migrate } from 'drizzle-orm/neon-http/migrator';
import { createDatabase, getConnectionUrl } from '../src/infrastructure/db/client.js';
import { logger } from '../src/infrastructure/logger.js';

const log = logger.child({ module: 'migrate' });

async function main(): Promise<void> {
  log.info('Starting review-run store migration');

  const db = createDatabase(getConnectionUrl());

  try {
    await migrate(db, { migrationsFolder: './db/migrations' });
    log.info('Migrations applied successfully');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    log.error({ error: message, step: 'migration' }, 'Migration failed');
    process.exit(1);
  }
}

main().catch((error) => {
  log.fatal({ err: error instanceof Error ? error.message : String(error) }, 'Migration crashed');
  process.exit(1);
});
