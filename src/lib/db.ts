import { openDB, type DBSchema, type IDBPDatabase } from 'idb';

import type { LauncherSettings } from '../types/settings';

const DB_NAME = 'springboard-db';
const DB_VERSION = 1;

type SettingsRow = {
  key: 'launcher';
  value: Partial<LauncherSettings>;
};

interface SpringboardDB extends DBSchema {
  settings: {
    key: 'launcher';
    value: SettingsRow;
  };
}

let dbPromise: Promise<IDBPDatabase<SpringboardDB>> | null = null;

export function getDb() {
  if (!dbPromise) {
    dbPromise = openDB<SpringboardDB>(DB_NAME, DB_VERSION, {
      upgrade(db) {
        if (!db.objectStoreNames.contains('settings')) {
          db.createObjectStore('settings', { keyPath: 'key' });
        }
      },
    });
  }

  return dbPromise;
}
