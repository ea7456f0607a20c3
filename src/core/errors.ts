/**
 * Error types raised outside the authentication cascade.
 * Authentication failures are returned as values (see auth/microsoft.ts).
 */

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class GraphApiError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly url: string,
    public readonly responseText?: string
  ) {
    super(message);
    this.name = 'GraphApiError';
  }
}
