export class AppError extends Error {
  constructor(
    public statusCode: number,
    public code: string,
    message: string,
  ) {
    super(message);
    this.name = "AppError";
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Not found") {
    super(404, "NOT_FOUND", message);
    this.name = "NotFoundError";
  }
}

export class ValidationError extends AppError {
  constructor(
    message = "Validation failed",
    public details?: Record<string, string[]>,
  ) {
    super(400, "VALIDATION_ERROR", message);
    this.name = "ValidationError";
  }
}

export class PayloadTooLargeError extends AppError {
  constructor(message = "Payload too large") {
    super(413, "PAYLOAD_TOO_LARGE", message);
    this.name = "PayloadTooLargeError";
  }
}

export class UnsupportedMediaTypeError extends AppError {
  constructor(message = "Unsupported media type") {
    super(415, "UNSUPPORTED_MEDIA_TYPE", message);
    this.name = "UnsupportedMediaTypeError";
  }
}

/** Missing or invalid server configuration. Raised before any upstream call is made. */
export class ConfigurationError extends AppError {
  constructor(message: string) {
    super(500, "CONFIGURATION_ERROR", message);
    this.name = "ConfigurationError";
  }
}

/** The provider answered with a non-2xx status. */
export class UpstreamStatusError extends AppError {
  constructor(
    service: string,
    public upstreamStatus: number,
    public body: string,
  ) {
    super(502, "UPSTREAM_ERROR", `${service} error (${upstreamStatus}): ${body}`);
    this.name = "UpstreamStatusError";
  }
}

/** The provider could not be reached at all (DNS, refused connection, timeout). */
export class ConnectivityError extends AppError {
  constructor(service: string, reason: string) {
    super(502, "UPSTREAM_UNREACHABLE", `Failed to reach ${service}: ${reason}`);
    this.name = "ConnectivityError";
  }
}

/** A 2xx provider response that is missing a field the flow depends on. */
export class ProtocolError extends AppError {
  constructor(message: string) {
    super(502, "UPSTREAM_PROTOCOL_ERROR", message);
    this.name = "ProtocolError";
  }
}
