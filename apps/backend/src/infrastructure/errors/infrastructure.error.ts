export class InfrastructureError extends Error {
  readonly code = 'SERVICE_UNAVAILABLE';
  readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'InfrastructureError';
    this.cause = cause;
  }

  static wrap(message: string, cause: unknown): InfrastructureError {
    if (cause instanceof InfrastructureError) {
      return cause;
    }
    return new InfrastructureError(
      message,
      cause instanceof Error ? cause : new Error(String(cause)),
    );
  }
}
