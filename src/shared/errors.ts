export enum ErrorCategory {
  InvalidPattern = 'INVALID_PATTERN',
  Config = 'CONFIG',
  Unknown = 'UNKNOWN',
}

export class XError extends Error {
  constructor(public category: ErrorCategory, message: string, public detail?: unknown) {
    super(message);
    this.name = `XError/${category}`;
  }
}

export function isXError(e: unknown, category?: ErrorCategory): e is XError {
  return e instanceof XError && (category === undefined || e.category === category);
}
