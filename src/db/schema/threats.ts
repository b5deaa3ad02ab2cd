import { pgTable, serial, varchar, timestamp, index, unique } from 'drizzle-orm/pg-core';
import {
  SEVERITY_LEVELS,
  SOURCE_MAX_LENGTH,
  THREAT_TYPES,
  VALUE_MAX_LENGTH,
} from '../../types/threat.types.js';

export const threats = pgTable(
  'threats',
  {
    id: serial('id').primaryKey(),
    type: varchar('type', { length: 20, enum: THREAT_TYPES }).notNull(),
    value: varchar('value', { length: VALUE_MAX_LENGTH }).notNull(),
    severity: varchar('severity', { length: 10, enum: SEVERITY_LEVELS }).notNull(),
    source: varchar('source', { length: SOURCE_MAX_LENGTH }),
    dateDetected: timestamp('date_detected', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    unique('uq_threats_value').on(table.value),
    index('ix_threats_type').on(table.type),
    index('ix_threats_severity').on(table.severity),
    index('ix_threats_date_detected').on(table.dateDetected),
    index('ix_threats_type_severity').on(table.type, table.severity),
  ],
);
