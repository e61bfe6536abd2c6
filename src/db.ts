import { LowSync, MemorySync } from 'lowdb';
import { JSONFileSync } from 'lowdb/node';
import { dirname, resolve } from 'path';
import { existsSync, mkdirSync } from 'fs';
import type { DBSchema } from './models';

export type Database = LowSync<DBSchema>;

export function emptySchema(): DBSchema {
  return {
    projects: [],
    monitoredAccounts: [],
    reels: [],
    reelSnapshots: [],
    sentReels: [],
    deliverySettings: [],
    notificationAccounts: []
  };
}

// Reads the document and backfills collections added after the file was created.
export function loadDb(db: Database): void {
  db.read();
  db.data = { ...emptySchema(), ...db.data };
}

// store JSON in ./data/db.json unless DB_FILE says otherwise
export function openDb(file: string): Database {
  const path = resolve(process.cwd(), file);
  const dir = dirname(path);
  if (!existsSync(dir)) mkdirSync(dir, { recursive: true });

  const db = new LowSync<DBSchema>(new JSONFileSync<DBSchema>(path), emptySchema());
  loadDb(db);
  db.write();
  return db;
}

export function memoryDb(seed: Partial<DBSchema> = {}): Database {
  const db = new LowSync<DBSchema>(new MemorySync<DBSchema>(), { ...emptySchema(), ...seed });
  db.write();
  return db;
}
