// lib/errors.ts
// Error taxonomy shared by the calendar source, the Twilio client and the routes.

export type ErrorKind = 'credential' | 'transport' | 'dispatch';

export class AppError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.kind = kind;
    this.name = new.target.name;
  }
}

/** Calendar or Twilio credentials are missing or were rejected. */
export class CredentialError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('credential', message, options);
  }
}

/** Network/API failure talking to Google or Twilio. */
export class TransportError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('transport', message, options);
  }
}

/** Twilio refused the outbound call (bad number, rate limit, ...). */
export class DispatchFailure extends AppError {
  readonly status: number | null;

  constructor(message: string, status: number | null = null, options?: { cause?: unknown }) {
    super('dispatch', message, options);
    this.status = status;
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return 'unknown error';
}
