/**
 * @fileoverview Store factory.
 *
 * Singleton pattern - returns the same instance on repeated calls.
 */

import config from '../../config.js';
import { SqliteStore } from './sqlite.js';

export { SqliteStore } from './sqlite.js';
export type * from './types.js';

let instance: SqliteStore | null = null;

export function getStore(): SqliteStore {
  if (instance) {
    return instance;
  }

  instance = new SqliteStore(config.database.sqlitePath);
  return instance;
}

/**
 * Close the store.
 * Call this during graceful shutdown.
 */
export function closeStore(): void {
  if (instance) {
    instance.close();
    instance = null;
  }
}
