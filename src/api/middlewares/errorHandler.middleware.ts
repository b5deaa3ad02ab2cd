// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { AppError } from '../../utils/errors.js';
import type { Logger } from '../../utils/logger.js';

export function createErrorHandler(logger: Logger, isDev: boolean) {
  return function errorHandler(
    error: FastifyError,
    request: FastifyRequest,
    reply: FastifyReply,
  ): void {
    const context = {
      err: error,
      requestId: request.id,
      method: request.method,
      url: request.url,
    };

    if (error instanceof AppError) {
      if (error.statusCode >= 500) {
        logger.error(context, 'Request error');
      } else {
        logger.debug(context, 'Request rejected');
      }

      reply.status(error.statusCode).send({
        error: {
          message: error.message,
          code: error.code,
          ...(error.details !== undefined && { details: error.details }),
          ...(isDev && error.statusCode >= 500 && { stack: error.stack }),
        },
        requestId: request.id,
      });
      return;
    }

    // Fastify's own client errors: malformed JSON, unsupported media type, oversized body
    const statusCode = error.statusCode ?? 500;
    if (statusCode < 500) {
      logger.debug(context, 'Request rejected');
      reply.status(statusCode).send({
        error: {
          message: error.message,
          code: error.code,
        },
        requestId: request.id,
      });
      return;
    }

    logger.error(context, 'Request error');

    // Generic error -- never leak details in production
    reply.status(statusCode).send({
      error: {
        message: isDev ? error.message : 'Internal Server Error',
        code: 'INTERNAL_ERROR',
        ...(isDev && { stack: error.stack }),
      },
      requestId: request.id,
    });
  };
}
