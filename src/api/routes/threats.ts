// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import type { FastifyInstance } from 'fastify';
import type { ThreatService } from '../../services/ThreatService.js';
import type { Severity, ThreatRecord, ThreatType } from '../../types/threat.types.js';

export interface ThreatResponse {
  id: number;
  type: ThreatType;
  value: string;
  severity: Severity;
  source: string | null;
  date_detected: string;
}

export function toThreatResponse(threat: ThreatRecord): ThreatResponse {
  return {
    id: threat.id,
    type: threat.type,
    value: threat.value,
    severity: threat.severity,
    source: threat.source,
    date_detected: threat.dateDetected.toISOString(),
  };
}

export async function threatRoutes(
  fastify: FastifyInstance,
  opts: { threatService: ThreatService },
): Promise<void> {
  const { threatService } = opts;

  // GET /api/threats - paginated, filterable listing, most recent first
  fastify.get('/api/threats', async (request, reply) => {
    const page = await threatService.list(request.query);
    return reply.header('x-total-count', String(page.total)).send(page.items.map(toThreatResponse));
  });

  // POST /api/threats
  fastify.post('/api/threats', async (request, reply) => {
    const threat = await threatService.create(request.body);
    return reply.status(201).send(toThreatResponse(threat));
  });

  // Static segment, matched ahead of /api/threats/:id
  fastify.get('/api/threats/stats/summary', async (_request, reply) => {
    const stats = await threatService.statistics();
    return reply.send(stats);
  });

  // GET /api/threats/:id
  fastify.get<{ Params: { id: string } }>('/api/threats/:id', async (request, reply) => {
    const threat = await threatService.get(request.params.id);
    return reply.send(toThreatResponse(threat));
  });

  // DELETE /api/threats/:id
  fastify.delete<{ Params: { id: string } }>('/api/threats/:id', async (request, reply) => {
    const confirmation = await threatService.delete(request.params.id);
    return reply.send(confirmation);
  });
}
