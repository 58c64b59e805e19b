import 'dotenv/config';
import { createApp } from './app.js';
import { loadConfig } from '../infrastructure/config.js';
import { getFieldCatalog } from '../infrastructure/field-catalog.js';
import { createDatabaseWithRetry, type Database } from '../infrastructure/db/client.js';
import { logger } from '../infrastructure/logger.js';

async function main(): Promise<void> {
  const config = loadConfig();

  // Fail at startup rather than on the first request.
  getFieldCatalog();

  let db: Database | null = null;
  const url = process.env.DATABASE_URL;
  if (url) {
    const connected = await createDatabaseWithRetry(url);
    if (!connected.ok) {
      throw new Error(`[${connected.error.code}] ${connected.error.message}`);
    }
    db = connected.value;
  } else {
    logger.warn('DATABASE_URL not set; review runs are disabled');
  }

  const app = createApp({ db, review: config.review });

  app.listen(config.port, () => {
    logger.info({ port: config.port, persistence: db !== null }, 'Extraction review API started');
  });
}

main().catch((err) => {
  logger.fatal({ err: err instanceof Error ? err.message : String(err) }, 'Failed to start server');
  process.exit(1);
});
