import { sql } from 'drizzle-orm';
import { SEVERITY_LEVELS, THREAT_TYPES } from '../types/threat.types.js';
import type { Database } from './client.js';

const quoteList = (members: readonly string[]): string => members.map((m) => `'${m}'`).join(', ');

/**
 * Idempotent DDL for the threats table. Mirrors `schema/threats.ts`; the CHECK
 * constraints keep the closed sets enforced even for writes that bypass the service.
 */
export const SCHEMA_STATEMENTS: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS threats (
    id SERIAL PRIMARY KEY,
    type VARCHAR(20) NOT NULL CHECK (type IN (${quoteList(THREAT_TYPES)})),
    value VARCHAR(500) NOT NULL,
    severity VARCHAR(10) NOT NULL CHECK (severity IN (${quoteList(SEVERITY_LEVELS)})),
    source VARCHAR(100),
    date_detected TIMESTAMPTZ NOT NULL DEFAULT now(),
    CONSTRAINT uq_threats_value UNIQUE (value)
  )`,
  'CREATE INDEX IF NOT EXISTS ix_threats_type ON threats (type)',
  'CREATE INDEX IF NOT EXISTS ix_threats_severity ON threats (severity)',
  'CREATE INDEX IF NOT EXISTS ix_threats_date_detected ON threats (date_detected)',
  'CREATE INDEX IF NOT EXISTS ix_threats_type_severity ON threats (type, severity)',
];

/** Creates the table and its indexes when missing. Safe to run on every start. */
export async function ensureSchema(db: Database): Promise<void> {
  // One statement per round-trip: extended-protocol drivers reject batches.
  for (const statement of SCHEMA_STATEMENTS) {
    await db.execute(sql.raw(statement));
  }
}
