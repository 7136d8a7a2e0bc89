export class StrataError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StrataError';
    Object.setPrototypeOf(this, StrataError.prototype);
  }
}

export class ConfigurationError extends StrataError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Raised by LazyPagingList when a position lies outside the remote collection.
 * Kept apart from APIError so callers can tell a bad index from a failed request.
 */
export class IndexOutOfRangeError extends StrataError {
  public readonly index: number;
  public readonly length?: number;

  constructor(index: number, length?: number) {
    super(
      length === undefined
        ? `Index ${index} is out of range`
        : `Index ${index} is out of range for a list of length ${length}`
    );
    this.name = 'IndexOutOfRangeError';
    this.index = index;
    this.length = length;
    Object.setPrototypeOf(this, IndexOutOfRangeError.prototype);
  }
}

export class APIError extends StrataError {
  public statusCode?: number;
  public response?: unknown;

  constructor(message: string, statusCode?: number, response?: unknown) {
    super(message);
    this.name = 'APIError';
    this.statusCode = statusCode;
    this.response = response;
    Object.setPrototypeOf(this, APIError.prototype);
  }
}

export class ResourceNotExistError extends APIError {
  public readonly resource: string;
  public readonly identification: string | number;

  constructor(resource: string, identification: string | number, statusCode?: number, response?: unknown) {
    super(`The ${resource} "${identification}" does not exist`, statusCode, response);
    this.name = 'ResourceNotExistError';
    this.resource = resource;
    this.identification = identification;
    Object.setPrototypeOf(this, ResourceNotExistError.prototype);
  }
}

export class AuthError extends APIError {
  constructor(message: string, statusCode?: number, response?: unknown) {
    super(message, statusCode, response);
    this.name = 'AuthError';
    Object.setPrototypeOf(this, AuthError.prototype);
  }
}

export class ValidationError extends APIError {
  constructor(message: string, statusCode?: number, response?: unknown) {
    super(message, statusCode, response);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class ServerError extends APIError {
  constructor(message: string, statusCode?: number, response?: unknown) {
    super(message, statusCode, response);
    this.name = 'ServerError';
    Object.setPrototypeOf(this, ServerError.prototype);
  }
}

export class NetworkError extends APIError {
  public readonly code?: string;

  constructor(message: string, code?: string) {
    super(message);
    this.name = 'NetworkError';
    this.code = code;
    Object.setPrototypeOf(this, NetworkError.prototype);
  }
}

export class ResponseFormatError extends APIError {
  constructor(message: string, response?: unknown) {
    super(message, undefined, response);
    this.name = 'ResponseFormatError';
    Object.setPrototypeOf(this, ResponseFormatError.prototype);
  }
}
