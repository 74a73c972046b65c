export class QuireError extends Error {
  constructor(message: string, public readonly code = 'INTERNAL_ERROR', public readonly details?: unknown) {
    super(message);
    this.name = 'QuireError';
  }
}

export class NotFoundError extends QuireError {
  constructor(message = 'Resource not found', details?: unknown) {
    super(message, 'NOT_FOUND', details);
    this.name = 'NotFoundError';
  }
}

export class InvalidIdError extends QuireError {
  constructor(message = 'Incorrect ID', details?: unknown) {
    super(message, 'INVALID_ID', details);
    this.name = 'InvalidIdError';
  }
}

export class InvalidCredentialsError extends QuireError {
  constructor(message = 'Invalid username or password', details?: unknown) {
    super(message, 'INVALID_CREDENTIALS', details);
    this.name = 'InvalidCredentialsError';
  }
}

export class SaltGenerationError extends QuireError {
  constructor(message = 'Error when generating salt', details?: unknown) {
    super(message, 'SALT_GENERATION_FAILED', details);
    this.name = 'SaltGenerationError';
  }
}

export class HashError extends QuireError {
  constructor(message = 'Error when hashing password', details?: unknown) {
    super(message, 'HASH_FAILED', details);
    this.name = 'HashError';
  }
}

export class NotPersistedError extends QuireError {
  constructor(message = 'Document not saved', details?: unknown) {
    super(message, 'NOT_PERSISTED', details);
    this.name = 'NotPersistedError';
  }
}

export class QueryError extends QuireError {
  constructor(message = 'Query failed', details?: unknown) {
    super(message, 'QUERY_FAILED', details);
    this.name = 'QueryError';
  }
}

export class ValidationError extends QuireError {
  constructor(message = 'Validation failed', details?: unknown) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}
