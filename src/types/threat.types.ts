// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import { z } from 'zod';
import { optionalQueryParam, paginationSchema, storableText } from '../utils/validators.js';

export const THREAT_TYPES = ['IP', 'Hash', 'URL', 'Domain'] as const;
export const ThreatType = z.enum(THREAT_TYPES);
export type ThreatType = z.infer<typeof ThreatType>;

export const SEVERITY_LEVELS = ['High', 'Medium', 'Low'] as const;
export const Severity = z.enum(SEVERITY_LEVELS);
export type Severity = z.infer<typeof Severity>;

export const VALUE_MAX_LENGTH = 500;
export const SOURCE_MAX_LENGTH = 100;

export interface ThreatRecord {
  id: number;
  type: ThreatType;
  value: string;
  severity: Severity;
  source: string | null;
  dateDetected: Date;
}

export interface NewThreatRecord {
  type: ThreatType;
  value: string;
  severity: Severity;
  source: string | null;
}

export interface ThreatFilter {
  type?: ThreatType;
  severity?: Severity;
}

export interface PageRequest {
  offset: number;
  limit: number;
}

export interface ThreatPage {
  items: ThreatRecord[];
  total: number;
}

export type GroupColumn = 'type' | 'severity';

export interface ThreatStatistics {
  total: number;
  by_type: Record<ThreatType, number>;
  by_severity: Record<Severity, number>;
}

export interface HealthReport {
  status: 'healthy' | 'degraded';
  database: string;
  timestamp: string;
}

export interface DeleteConfirmation {
  message: string;
  id: number;
}

export const CreateThreatSchema = z
  .object({
    type: ThreatType,
    value: z
      .string()
      .trim()
      .min(1, 'Value cannot be empty or whitespace')
      .pipe(storableText(VALUE_MAX_LENGTH, 'Value')),
    severity: Severity,
    source: storableText(SOURCE_MAX_LENGTH, 'Source').nullish(),
  })
  .strict();

export type CreateThreatInput = z.infer<typeof CreateThreatSchema>;

export const ListThreatsQuerySchema = paginationSchema.extend({
  type: optionalQueryParam(ThreatType),
  severity: optionalQueryParam(Severity),
});

export type ListThreatsQuery = z.infer<typeof ListThreatsQuerySchema>;
