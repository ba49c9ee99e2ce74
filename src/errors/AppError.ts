export class AppError extends Error {
  constructor(
    public readonly statusCode: number,
    message: string,
    public readonly code?: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class UserNotFoundError extends AppError {
  constructor(public readonly identifier: string) {
    super(404, `User not found: ${identifier}`, 'USER_NOT_FOUND');
    this.name = 'UserNotFoundError';
  }
}

// More than one row for a key that should be unique: a data problem, not a failed login.
export class AmbiguousUserError extends AppError {
  constructor(
    public readonly identifier: string,
    public readonly matches: number,
  ) {
    super(500, `Multiple users match: ${identifier}`, 'AMBIGUOUS_USER', { matches });
    this.name = 'AmbiguousUserError';
  }
}
