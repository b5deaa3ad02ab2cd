import { loadConfig } from '../../utils/config.js';
import { createLogger } from '../../utils/logger.js';
import { createDatabaseClient } from '../client.js';
import { ensureSchema } from '../bootstrap.js';
import { DrizzleThreatStore } from '../../core/store/ThreatStore.js';
import { ThreatService } from '../../services/ThreatService.js';
import { seedThreats } from './index.js';

async function seed(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.LOG_LEVEL, config.NODE_ENV === 'development');
  const database = createDatabaseClient(config.DATABASE_URL, {
    connectTimeout: config.DATABASE_CONNECT_TIMEOUT,
  });

  try {
    await ensureSchema(database.db);
    const service = new ThreatService(new DrizzleThreatStore(database.db), logger);
    const result = await seedThreats(service, logger);
    logger.info(result, 'Seed complete');
  } finally {
    await database.close();
  }
}

seed().catch((err) => {
  process.stderr.write(`Seed failed: ${String(err)}\n`);
  process.exit(1);
});
