export class StorageError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageError';
  }
}

export class LookupFailedError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LookupFailedError';
  }
}

export class UnknownEventError extends Error {
  constructor(readonly eventName: string) {
    super(`Unknown prayer: ${eventName}`);
    this.name = 'UnknownEventError';
  }
}

export class InvalidTimeFormatError extends Error {
  constructor(readonly value: string) {
    super(`Invalid time format: ${value}`);
    this.name = 'InvalidTimeFormatError';
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
