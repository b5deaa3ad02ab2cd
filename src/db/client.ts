// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import { PGlite } from '@electric-sql/pglite';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import { drizzle as drizzlePglite } from 'drizzle-orm/pglite';
import { drizzle as drizzlePostgres } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema/index.js';

export type Database = PgDatabase<PgQueryResultHKT, typeof schema>;

export type StoreLocation =
  | { engine: 'postgres'; url: string }
  | { engine: 'embedded'; dataDir: string | null };

export interface DatabaseHandle {
  db: Database;
  engine: StoreLocation['engine'];
  close(): Promise<void>;
}

export interface DatabaseClientOptions {
  poolMax?: number;
  /** Seconds to wait for a server connection before failing. */
  connectTimeout?: number;
}

/**
 * Maps DATABASE_URL onto a backing engine.
 *
 * postgres:// and postgresql:// go to a PostgreSQL server, `file:<dir>` keeps
 * an embedded PGlite database in a directory and `memory://` keeps one in memory.
 */
export function resolveStoreLocation(url: string): StoreLocation {
  if (url.startsWith('postgres://') || url.startsWith('postgresql://')) {
    return { engine: 'postgres', url };
  }
  if (url === 'memory://') {
    return { engine: 'embedded', dataDir: null };
  }
  if (url.startsWith('file:')) {
    const dataDir = url.slice('file:'.length);
    if (!dataDir) {
      throw new Error('DATABASE_URL file: location needs a directory path');
    }
    return { engine: 'embedded', dataDir };
  }
  throw new Error(`Unsupported DATABASE_URL scheme: ${url.split(':')[0] ?? url}`);
}

export function createDatabaseClient(url: string, options: DatabaseClientOptions = {}): DatabaseHandle {
  const location = resolveStoreLocation(url);

  if (location.engine === 'postgres') {
    const client = postgres(location.url, {
      max: options.poolMax ?? 10,
      idle_timeout: 20,
      max_lifetime: 60 * 30,
      connect_timeout: options.connectTimeout ?? 10,
      prepare: true,
      onnotice: () => {},
    });
    const db: Database = drizzlePostgres(client, { schema });
    return {
      db,
      engine: 'postgres',
      close: () => client.end({ timeout: 5 }),
    };
  }

  const client = location.dataDir === null ? new PGlite() : new PGlite(location.dataDir);
  const db: Database = drizzlePglite(client, { schema });
  return {
    db,
    engine: 'embedded',
    close: () => client.close(),
  };
}
