/**
 * Error taxonomy shared by the HTTP routes and the chat sessions.
 * Each kind maps to one HTTP status and one WebSocket error frame.
 */
export type ErrorKind =
  | 'ConfigNotFound'
  | 'ValidationError'
  | 'StorageError'
  | 'ProviderError'
  | 'NotFound'
  | 'InternalError';

export class GatewayError extends Error {
  constructor(
    readonly kind: ErrorKind,
    readonly status: number,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = kind;
  }
}

export class ConfigNotFoundError extends GatewayError {
  constructor(clientId: string, configId: string) {
    super('ConfigNotFound', 404, `No such bot config found: ${clientId}/${configId}`);
  }
}

export class ValidationError extends GatewayError {
  constructor(message: string, status = 400) {
    super('ValidationError', status, message);
  }
}

export class StorageError extends GatewayError {
  constructor(message: string, cause?: unknown) {
    super('StorageError', 500, message, { cause });
  }
}

export class ProviderError extends GatewayError {
  constructor(message: string, cause?: unknown) {
    super('ProviderError', 502, message, { cause });
  }
}

export class RouteNotFoundError extends GatewayError {
  constructor(method: string, path: string) {
    super('NotFound', 404, `Cannot ${method} ${path}`);
  }
}

/**
 * Raised while the process is starting; never reaches a client.
 */
export class ConfigurationError extends Error {
  constructor(readonly issues: string[]) {
    super(`Configuration validation failed:\n  - ${issues.join('\n  - ')}`);
    this.name = 'ConfigurationError';
  }
}

/**
 * Normalize any thrown value into a GatewayError
 */
export function toGatewayError(error: unknown): GatewayError {
  if (error instanceof GatewayError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new GatewayError('InternalError', 500, message, { cause: error });
}

/**
 * Wire format used for both HTTP error bodies and WebSocket error frames
 */
export function toErrorPayload(error: unknown): { error: ErrorKind; message: string } {
  const gatewayError = toGatewayError(error);
  return { error: gatewayError.kind, message: gatewayError.message };
}
