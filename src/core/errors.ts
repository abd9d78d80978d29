export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
  }
}

export class InvalidFormatError extends AppError {
  constructor(public readonly payload: unknown) {
    super('Invalid message format', 'INVALID_FORMAT', { payload });
  }
}
