/**
 * Portal SDK - Error Classes
 *
 * Typed error hierarchy for portal error handling. Every failure the client
 * raises is a PortalError subclass.
 */

export class PortalError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PortalError';
  }
}

export class ConfigurationError extends PortalError {
  public field: string;

  constructor(field: string, message: string = `${field} is required`) {
    super(message);
    this.name = 'ConfigurationError';
    this.field = field;
  }
}

export class PreconditionError extends PortalError {
  constructor(message: string = 'login must be called first') {
    super(message);
    this.name = 'PreconditionError';
  }
}

export class AuthenticationError extends PortalError {
  public statusCode: number;
  public responseBody: string;

  constructor(statusCode: number, responseBody: string) {
    super(`Error during login. Server returned ${statusCode}. ${responseBody}`);
    this.name = 'AuthenticationError';
    this.statusCode = statusCode;
    this.responseBody = responseBody;
  }
}

export class RequestError extends PortalError {
  public statusCode: number;
  public operation: string;
  public responseBody: string;

  constructor(operation: string, statusCode: number, message: string, responseBody: string) {
    super(message);
    this.name = 'RequestError';
    this.operation = operation;
    this.statusCode = statusCode;
    this.responseBody = responseBody;
  }
}

export class ProtocolError extends PortalError {
  public operation: string;
  public responseBody?: string;

  constructor(operation: string, message: string, responseBody?: string) {
    super(`Unexpected response during ${operation}: ${message}`);
    this.name = 'ProtocolError';
    this.operation = operation;
    this.responseBody = responseBody;
  }
}

export class TransportError extends PortalError {
  public operation: string;

  constructor(operation: string, cause: unknown) {
    const msg = cause instanceof Error ? cause.message : 'Network error';
    super(`Error during ${operation}. ${msg}`);
    this.name = 'TransportError';
    this.operation = operation;
    this.cause = cause;
  }
}

/**
 * Pull the `message` field out of an error body, falling back to the raw text
 * when the body is not JSON or carries no string message.
 */
export function extractErrorMessage(responseText: string): string {
  try {
    const parsed: unknown = JSON.parse(responseText);
    if (
      typeof parsed === 'object' &&
      parsed !== null &&
      'message' in parsed &&
      typeof parsed.message === 'string'
    ) {
      return parsed.message;
    }
  } catch {
    // use raw text
  }
  return responseText;
}
