// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import type { FastifyInstance } from 'fastify';
import type { ThreatService } from '../../services/ThreatService.js';

export const API_VERSION = '1.0.0';

export async function healthRoutes(
  fastify: FastifyInstance,
  opts: { threatService: ThreatService },
): Promise<void> {
  // Always 200: a failing store shows up as status "degraded" in the body.
  fastify.get('/health', async (_request, reply) => {
    const report = await opts.threatService.health();
    return reply.send(report);
  });

  fastify.get('/api', async (_request, reply) => {
    return reply.send({
      message: `IOC Registry API v${API_VERSION}`,
      version: API_VERSION,
      health: '/health',
    });
  });
}
