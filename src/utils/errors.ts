/**
 * Errors that surface as HTTP failures. Anything that goes wrong while
 * understanding a question is not one of these: it becomes a clarification
 * answer instead.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly code: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class UploadFormatError extends AppError {
  constructor(message: string) {
    super(message, 400, 'upload_format');
  }
}

export class FileTooLargeError extends AppError {
  constructor(size: number, maxSize: number) {
    super(`File size ${size} exceeds maximum allowed size of ${maxSize} bytes`, 413, 'file_too_large');
  }
}

export class SessionNotFoundError extends AppError {
  constructor(sessionId: string) {
    super(`Sessão não encontrada: ${sessionId}`, 404, 'session_not_found');
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
