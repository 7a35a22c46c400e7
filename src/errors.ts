export class AppError extends Error {
  constructor(
    public readonly statusCode: number,
    public readonly code: string,
    message: string,
  ) {
    super(message);
    this.name = 'AppError';
  }

  static internal(message = 'Internal Server Error'): AppError {
    return new AppError(500, 'INTERNAL_ERROR', message);
  }
}

export class DuplicateEmailError extends AppError {
  constructor(message = 'Email is already registered with another account.') {
    super(409, 'DUPLICATE_EMAIL', message);
    this.name = 'DuplicateEmailError';
  }
}

export class InvalidCredentialsError extends AppError {
  constructor(message = 'Incorrect credentials') {
    super(401, 'INVALID_CREDENTIALS', message);
    this.name = 'InvalidCredentialsError';
  }
}

export class UnauthenticatedError extends AppError {
  constructor(message = 'Please log in to access this page.') {
    super(401, 'UNAUTHENTICATED', message);
    this.name = 'UnauthenticatedError';
  }
}

export class ForbiddenError extends AppError {
  constructor(message = 'Forbidden') {
    super(403, 'FORBIDDEN', message);
    this.name = 'ForbiddenError';
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Not found') {
    super(404, 'NOT_FOUND', message);
    this.name = 'NotFoundError';
  }
}

/** Form input rejected; `fields` maps each field name to its messages. */
export class ValidationError extends AppError {
  constructor(
    public readonly fields: Record<string, string[]>,
    message = 'Invalid form data',
  ) {
    super(400, 'VALIDATION_ERROR', message);
    this.name = 'ValidationError';
  }
}
