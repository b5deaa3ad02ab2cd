// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import type { ThreatStore } from '../core/store/ThreatStore.js';
import { ThreatQueries } from '../core/query/ThreatQueries.js';
import {
  CreateThreatSchema,
  ListThreatsQuerySchema,
  type DeleteConfirmation,
  type HealthReport,
  type ThreatPage,
  type ThreatRecord,
  type ThreatStatistics,
} from '../types/threat.types.js';
import { ConflictError, ConstraintViolationError, NotFoundError } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';
import { idSchema, parseInput } from '../utils/validators.js';

export class ThreatService {
  private readonly queries: ThreatQueries;

  constructor(
    private readonly store: ThreatStore,
    private readonly logger: Logger,
  ) {
    this.queries = new ThreatQueries(store);
  }

  /**
   * Registers a new IOC. The value is trimmed before the duplicate check and
   * before storage. A unique-constraint failure on insert (another request
   * registered the same value first) is reported as the same conflict.
   */
  async create(body: unknown): Promise<ThreatRecord> {
    const input = parseInput(CreateThreatSchema, body, 'Request body');

    const existing = await this.store.findByValue(input.value);
    if (existing) {
      throw this.conflict(input.value, existing.id);
    }

    try {
      const created = await this.store.insert({
        type: input.type,
        value: input.value,
        severity: input.severity,
        source: input.source ?? null,
      });
      this.logger.info(
        { threatId: created.id, type: created.type, severity: created.severity, source: created.source },
        'Threat registered',
      );
      return created;
    } catch (error) {
      if (error instanceof ConstraintViolationError) {
        const winner = await this.store.findByValue(input.value);
        throw this.conflict(input.value, winner?.id ?? null);
      }
      throw error;
    }
  }

  async list(query: unknown): Promise<ThreatPage> {
    const { skip, limit, type, severity } = parseInput(ListThreatsQuerySchema, query, 'Query parameter');
    return this.queries.page({ type, severity }, { offset: skip, limit });
  }

  async get(rawId: unknown): Promise<ThreatRecord> {
    const id = parseInput(idSchema, rawId, 'Path parameter');
    const threat = await this.store.findById(id);
    if (!threat) throw new NotFoundError('Threat', id);
    return threat;
  }

  async delete(rawId: unknown): Promise<DeleteConfirmation> {
    const id = parseInput(idSchema, rawId, 'Path parameter');
    const removed = await this.store.delete(id);
    if (!removed) throw new NotFoundError('Threat', id);

    this.logger.info({ threatId: id }, 'Threat deleted');
    return { message: `Threat ${id} deleted successfully`, id };
  }

  statistics(): Promise<ThreatStatistics> {
    return this.queries.statistics();
  }

  /** Store failures come back as a degraded report; this never rejects. */
  async health(): Promise<HealthReport> {
    let database = 'connected';
    try {
      await this.store.ping();
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      database = `error: ${reason}`;
      this.logger.warn({ err: error }, 'Threat store health check failed');
    }

    return {
      status: database === 'connected' ? 'healthy' : 'degraded',
      database,
      timestamp: new Date().toISOString(),
    };
  }

  private conflict(value: string, existingId: number | null): ConflictError {
    this.logger.warn({ existingId }, 'Duplicate IOC rejected');
    const suffix = existingId === null ? '' : ` (ID: ${existingId})`;
    return new ConflictError(`IOC with value '${value}' already exists${suffix}`, existingId);
  }
}
