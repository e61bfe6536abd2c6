export class AppError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

// Bad or missing settings discovered at startup. Fatal for the process.
export class ConfigError extends AppError {
  constructor(message: string) {
    super(message, 'E_CONFIG');
  }
}

// The notification channel refused or never received a message.
export class DeliveryError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'E_DELIVERY', options);
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
