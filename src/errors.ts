/**
 * Error types for cardpack.
 *
 * Selection itself never throws for bad data; these cover caller mistakes,
 * storage and the outer surfaces.
 */

export type ErrorCode = 'VALIDATION_ERROR' | 'NOT_FOUND' | 'PARSE_ERROR' | 'STORE_ERROR' | 'MODEL_ERROR';

export class CardPackError extends Error {
  constructor(message: string, public readonly code: ErrorCode) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Input that does not satisfy a schema
 */
export class ValidationError extends CardPackError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message, 'VALIDATION_ERROR');
  }
}

export class NotFoundError extends CardPackError {
  constructor(public readonly resourceType: string, public readonly resourceId: string) {
    super(`${resourceType} '${resourceId}' not found`, 'NOT_FOUND');
  }
}

/**
 * Model output or file content that could not be parsed
 */
export class ParseError extends CardPackError {
  constructor(message: string, public readonly rawValue?: string) {
    super(message, 'PARSE_ERROR');
  }
}

export class StoreError extends CardPackError {
  constructor(message: string) {
    super(message, 'STORE_ERROR');
  }
}

/**
 * A model provider rejected a request or answered in an unexpected shape
 */
export class ModelError extends CardPackError {
  constructor(public readonly provider: string, message: string) {
    super(`${provider} error: ${message}`, 'MODEL_ERROR');
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
