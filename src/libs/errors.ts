// src/libs/errors.ts
// ============================================================================
// Fehlerklassen mit HTTP-Status
// ----------------------------------------------------------------------------
// Services werfen diese Fehler, der zentrale Error-Handler in app.ts
// rendert sie als { description, status, message, details? }.
// Modul-spezifische Fehler (z. B. SmsCooldownError) erben von ApiError.
// ============================================================================

export class ApiError extends Error {
  readonly statusCode: number;
  readonly details?: unknown;

  constructor(statusCode: number, message: string, details?: unknown) {
    super(message);
    this.name = "ApiError";
    this.statusCode = statusCode;
    this.details = details;
  }
}

export class BadRequestError extends ApiError {
  constructor(message = "Bad request.", details?: unknown) {
    super(400, message, details);
    this.name = "BadRequestError";
  }
}

export class UnauthorizedError extends ApiError {
  constructor(message = "Unauthorized.") {
    super(401, message);
    this.name = "UnauthorizedError";
  }
}

export class NotFoundError extends ApiError {
  constructor(message = "Not found.") {
    super(404, message);
    this.name = "NotFoundError";
  }
}

export class InvalidPhoneError extends BadRequestError {
  constructor() {
    super("Invalid phone number");
    this.name = "InvalidPhoneError";
  }
}

export class BusinessIdRequiredError extends BadRequestError {
  constructor() {
    super("The business ID is required.");
    this.name = "BusinessIdRequiredError";
  }
}

export class BusinessNotFoundError extends BadRequestError {
  constructor() {
    super("Business does not exist");
    this.name = "BusinessNotFoundError";
  }
}

export class BusinessMismatchError extends BadRequestError {
  constructor() {
    super("Business ID mismatch");
    this.name = "BusinessMismatchError";
  }
}
