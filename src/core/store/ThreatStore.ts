// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import { and, count, desc, eq, sql } from 'drizzle-orm';
import type { Database } from '../../db/client.js';
import { threats } from '../../db/schema/threats.js';
import type {
  NewThreatRecord,
  PageRequest,
  Severity,
  ThreatFilter,
  ThreatRecord,
  ThreatType,
} from '../../types/threat.types.js';
import { ConstraintViolationError, StoreUnavailableError } from '../../utils/errors.js';

// `id` is a SERIAL (int4) column.
const MAX_ID = 2_147_483_647;

const UNIQUE_VIOLATION = '23505';

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'CONNECT_TIMEOUT',
  'CONNECTION_CLOSED',
  'CONNECTION_ENDED',
  'CONNECTION_DESTROYED',
  '57P01',
  '57P02',
  '57P03',
  '53300',
]);

/**
 * Persistence contract for threat records.
 *
 * The store, not its callers, is the final arbiter of value uniqueness:
 * `insert` raises ConstraintViolationError when the unique constraint fires.
 */
export interface ThreatStore {
  insert(record: NewThreatRecord): Promise<ThreatRecord>;
  delete(id: number): Promise<boolean>;
  findById(id: number): Promise<ThreatRecord | undefined>;
  findByValue(value: string): Promise<ThreatRecord | undefined>;
  list(filter: ThreatFilter, page: PageRequest): Promise<ThreatRecord[]>;
  count(filter: ThreatFilter): Promise<number>;
  countGroupedBy(column: 'type'): Promise<Record<ThreatType, number>>;
  countGroupedBy(column: 'severity'): Promise<Record<Severity, number>>;
  ping(): Promise<void>;
}

interface DriverError {
  code?: unknown;
  constraint_name?: unknown;
  constraint?: unknown;
  cause?: unknown;
  message?: unknown;
}

function isDriverError(value: unknown): value is DriverError {
  return typeof value === 'object' && value !== null;
}

/** Walks the cause chain for the first driver error carrying a string `code`. */
function findCodedError(error: unknown): DriverError | undefined {
  let current: unknown = error;
  for (let depth = 0; depth < 5 && isDriverError(current); depth++) {
    if (typeof current.code === 'string') return current;
    current = current.cause;
  }
  return undefined;
}

/**
 * Maps a driver error onto the store's error taxonomy. Unique violations and
 * connection failures are translated; anything else is returned unchanged.
 */
export function translateError(error: unknown): unknown {
  const coded = findCodedError(error);
  if (!coded || typeof coded.code !== 'string') return error;

  if (coded.code === UNIQUE_VIOLATION) {
    const constraint =
      typeof coded.constraint_name === 'string'
        ? coded.constraint_name
        : typeof coded.constraint === 'string'
          ? coded.constraint
          : undefined;
    return new ConstraintViolationError(constraint, error);
  }

  if (CONNECTION_ERROR_CODES.has(coded.code) || coded.code.startsWith('08')) {
    const reason = typeof coded.message === 'string' && coded.message ? coded.message : coded.code;
    return new StoreUnavailableError(reason, error);
  }

  return error;
}

function filterPredicate(filter: ThreatFilter) {
  return and(
    filter.type ? eq(threats.type, filter.type) : undefined,
    filter.severity ? eq(threats.severity, filter.severity) : undefined,
  );
}

export class DrizzleThreatStore implements ThreatStore {
  constructor(private readonly db: Database) {}

  async insert(record: NewThreatRecord): Promise<ThreatRecord> {
    const [row] = await this.run(() =>
      this.db
        .insert(threats)
        .values({
          type: record.type,
          value: record.value,
          severity: record.severity,
          source: record.source,
        })
        .returning(),
    );
    if (!row) throw new Error('Insert returned no row');
    return row;
  }

  async delete(id: number): Promise<boolean> {
    if (!Number.isSafeInteger(id) || id < 1 || id > MAX_ID) return false;
    const deleted = await this.run(() =>
      this.db.delete(threats).where(eq(threats.id, id)).returning({ id: threats.id }),
    );
    return deleted.length > 0;
  }

  async findById(id: number): Promise<ThreatRecord | undefined> {
    if (!Number.isSafeInteger(id) || id < 1 || id > MAX_ID) return undefined;
    const [row] = await this.run(() =>
      this.db.select().from(threats).where(eq(threats.id, id)).limit(1),
    );
    return row;
  }

  async findByValue(value: string): Promise<ThreatRecord | undefined> {
    const [row] = await this.run(() =>
      this.db.select().from(threats).where(eq(threats.value, value)).limit(1),
    );
    return row;
  }

  async list(filter: ThreatFilter, page: PageRequest): Promise<ThreatRecord[]> {
    return this.run(() =>
      this.db
        .select()
        .from(threats)
        .where(filterPredicate(filter))
        .orderBy(desc(threats.dateDetected), desc(threats.id))
        .limit(page.limit)
        .offset(page.offset),
    );
  }

  async count(filter: ThreatFilter): Promise<number> {
    const [row] = await this.run(() =>
      this.db.select({ total: count() }).from(threats).where(filterPredicate(filter)),
    );
    return row?.total ?? 0;
  }

  countGroupedBy(column: 'type'): Promise<Record<ThreatType, number>>;
  countGroupedBy(column: 'severity'): Promise<Record<Severity, number>>;
  async countGroupedBy(
    column: 'type' | 'severity',
  ): Promise<Record<ThreatType, number> | Record<Severity, number>> {
    if (column === 'type') {
      const rows = await this.run(() =>
        this.db
          .select({ key: threats.type, total: count() })
          .from(threats)
          .groupBy(threats.type),
      );
      const counts: Record<ThreatType, number> = { IP: 0, Hash: 0, URL: 0, Domain: 0 };
      for (const row of rows) counts[row.key] = row.total;
      return counts;
    }

    const rows = await this.run(() =>
      this.db
        .select({ key: threats.severity, total: count() })
        .from(threats)
        .groupBy(threats.severity),
    );
    const counts: Record<Severity, number> = { High: 0, Medium: 0, Low: 0 };
    for (const row of rows) counts[row.key] = row.total;
    return counts;
  }

  async ping(): Promise<void> {
    await this.run(() => this.db.execute(sql`SELECT 1`));
  }

  private async run<T>(query: () => Promise<T>): Promise<T> {
    try {
      return await query();
    } catch (error) {
      throw translateError(error);
    }
  }
}
