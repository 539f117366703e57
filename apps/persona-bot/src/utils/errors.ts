/**
 * Persona Bot Custom Error Classes
 *
 * Provides type-safe error handling across the application.
 */

/**
 * Base application error
 */
export class PersonaBotError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number = 500,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'PersonaBotError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      error: this.code,
      message: this.message,
      details: this.details,
      timestamp: Date.now(),
    };
  }
}

/**
 * Validation error (400)
 */
export class ValidationError extends PersonaBotError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400, details);
    this.name = 'ValidationError';
  }
}

/**
 * Not found error (404)
 */
export class NotFoundError extends PersonaBotError {
  constructor(resource: string, identifier?: string) {
    const message = identifier
      ? `${resource} with identifier '${identifier}' not found`
      : `${resource} not found`;
    super(message, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
  }
}

/**
 * Unknown emotion identifier (422)
 *
 * Callers acting on user input recover with the baseline definition.
 */
export class UnknownEmotionError extends PersonaBotError {
  constructor(public readonly emotionId: string) {
    super(`Unknown emotion: ${emotionId}`, 'UNKNOWN_EMOTION', 422, { emotionId });
    this.name = 'UnknownEmotionError';
  }
}

/**
 * Feature switched off in settings (403)
 */
export class FeatureDisabledError extends PersonaBotError {
  constructor(public readonly feature: string) {
    super(`Feature disabled: ${feature}`, 'FEATURE_DISABLED', 403, { feature });
    this.name = 'FeatureDisabledError';
  }
}

/**
 * Persistence error (500)
 */
export class PersistenceError extends PersonaBotError {
  constructor(message: string, details?: unknown) {
    super(message, 'PERSISTENCE_ERROR', 500, details);
    this.name = 'PersistenceError';
  }
}

/**
 * Settings error (500)
 */
export class SettingsError extends PersonaBotError {
  constructor(message: string, details?: unknown) {
    super(message, 'SETTINGS_ERROR', 500, details);
    this.name = 'SettingsError';
  }
}

/**
 * Type guard for PersonaBotError
 */
export const isPersonaBotError = (error: unknown): error is PersonaBotError => {
  return error instanceof PersonaBotError;
};

/**
 * Error handler utility
 */
export const handleError = (error: unknown): PersonaBotError => {
  if (isPersonaBotError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new PersonaBotError(
      error.message,
      'UNKNOWN_ERROR',
      500,
      { originalError: error.name }
    );
  }

  return new PersonaBotError(
    'An unknown error occurred',
    'UNKNOWN_ERROR',
    500,
    { originalError: String(error) }
  );
};
