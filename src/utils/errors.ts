// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly code: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 422, 'VALIDATION_ERROR', details);
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id?: number) {
    super(id === undefined ? `${resource} not found` : `${resource} with ID ${id} not found`, 404, 'NOT_FOUND');
  }
}

/** Duplicate IOC value. `existingId` lets the caller fetch the registered record directly. */
export class ConflictError extends AppError {
  constructor(
    message: string,
    public readonly existingId: number | null,
  ) {
    super(message, 409, 'CONFLICT', { existingId });
  }
}

/** Raised by the store when a write breaks a unique constraint. */
export class ConstraintViolationError extends AppError {
  constructor(
    public readonly constraint: string | undefined,
    cause?: unknown,
  ) {
    super(`Unique constraint violated${constraint ? `: ${constraint}` : ''}`, 409, 'CONSTRAINT_VIOLATION');
    this.cause = cause;
  }
}

export class StoreUnavailableError extends AppError {
  constructor(reason: string, cause?: unknown) {
    super(`Threat store unavailable: ${reason}`, 503, 'STORE_UNAVAILABLE');
    this.cause = cause;
  }
}
