// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import Fastify, { type FastifyInstance } from 'fastify';
import helmet from '@fastify/helmet';
import cors from '@fastify/cors';
import { createErrorHandler } from './middlewares/errorHandler.middleware.js';
import { healthRoutes } from './routes/health.js';
import { threatRoutes } from './routes/threats.js';
import type { ThreatService } from '../services/ThreatService.js';
import type { Logger } from '../utils/logger.js';

export interface ServerDependencies {
  threatService: ThreatService;
  logger: Logger;
}

export interface ServerConfig {
  isDev: boolean;
  /** Allowed browser origins; `*` admits any origin. */
  corsOrigins: string[];
}

export async function createServer(
  config: ServerConfig,
  deps: ServerDependencies,
): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: false,
    requestIdLogLabel: 'requestId',
    bodyLimit: 1048576,
    trustProxy: true,
  });

  // Security headers
  await fastify.register(helmet, {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        objectSrc: ["'none'"],
        frameSrc: ["'none'"],
      },
    },
    hsts: {
      maxAge: 31536000,
      includeSubDomains: true,
    },
  });

  // CORS
  const allowAnyOrigin = config.corsOrigins.includes('*');
  await fastify.register(cors, {
    origin: (origin, cb) => {
      const allowed = [
        ...config.corsOrigins,
        ...(config.isDev ? ['http://localhost:3000'] : []),
      ];
      if (!origin || allowAnyOrigin || allowed.includes(origin)) {
        cb(null, true);
      } else {
        cb(new Error('Not allowed by CORS'), false);
      }
    },
    methods: ['GET', 'POST', 'DELETE'],
    allowedHeaders: ['Content-Type'],
    exposedHeaders: ['X-Total-Count'],
    maxAge: 86400,
  });

  fastify.addHook('onResponse', async (request, reply) => {
    deps.logger.info(
      {
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        duration: Math.round(reply.elapsedTime),
        requestId: request.id,
      },
      'Request completed',
    );
  });

  // Error handler
  fastify.setErrorHandler(createErrorHandler(deps.logger, config.isDev));

  // Routes
  await fastify.register(healthRoutes, { threatService: deps.threatService });
  await fastify.register(threatRoutes, { threatService: deps.threatService });

  return fastify;
}
