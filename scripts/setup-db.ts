import { closeDatabase, get, initDb, openDatabase } from '../src/database';
import { config } from '../src/config';
import { seedConfiguredRoles } from '../src/services/userService';
import { logger } from '../src/utils/logger';

/**
 * Creates the schema at DATABASE_PATH and writes the configured roles.
 * Safe to run repeatedly.
 */
function setupDatabase(): void {
  try {
    logger.info('Setting up database...', { path: config.databasePath });
    openDatabase(config.databasePath);
    initDb();
    seedConfiguredRoles(config);

    const counts = get<{ users: number; infractions: number }>(
      'SELECT (SELECT COUNT(*) FROM users) AS users, (SELECT COUNT(*) FROM infractions) AS infractions'
    );
    logger.info('Database setup complete', counts ?? {});
    closeDatabase();
  } catch (error) {
    logger.error('Database setup failed', { error });
    closeDatabase();
    process.exit(1);
  }
}

setupDatabase();
