/**
 * SQLite Database Connection
 */

import Database from 'better-sqlite3';
import { config } from '../config/index.js';
import { logger } from '../utils/logger.js';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { SCHEMA, MIGRATIONS } from './schema.js';

let db: Database.Database | null = null;

/**
 * Get the open database
 */
export function getDatabase(): Database.Database {
  if (!db) {
    throw new Error('Database not initialized. Call initDatabase() first.');
  }
  return db;
}

/**
 * Open the database and apply the schema
 *
 * Pass ':memory:' for a throwaway database.
 */
export function initDatabase(path: string = config.database.path): Database.Database {
  if (db) {
    logger.debug('Database already initialized');
    return db;
  }

  if (path !== ':memory:') {
    mkdirSync(dirname(path), { recursive: true });
  }

  const connection = new Database(path);
  connection.pragma('journal_mode = WAL');
  connection.pragma('foreign_keys = ON');

  try {
    connection.exec(SCHEMA);
    for (const migration of MIGRATIONS) {
      connection.exec(migration);
    }
  } catch (error) {
    logger.fatal({ error, path }, 'Failed to initialize schema');
    connection.close();
    throw error;
  }

  db = connection;
  logger.info({ path }, 'Database ready');
  return db;
}

/**
 * Close the database
 */
export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
    logger.info('Database closed');
  }
}

/**
 * Check if database is initialized
 */
export function isDatabaseInitialized(): boolean {
  return db !== null;
}
