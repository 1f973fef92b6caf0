export type ConfigErrorCode = "NOT_FOUND" | "VALIDATION" | "ENCODING";

export class ConfigError extends Error {
  readonly code: ConfigErrorCode;

  constructor(message: string, code: ConfigErrorCode) {
    super(message);
    this.name = "ConfigError";
    this.code = code;
  }
}

/**
 * Raised when the live config file is missing at load/backup time,
 * or when the backup file is missing at restore time.
 */
export class NotFoundError extends ConfigError {
  readonly path: string;

  constructor(message: string, path: string) {
    super(message, "NOT_FOUND");
    this.name = "NotFoundError";
    this.path = path;
  }
}

/** Rejected edit: empty or malformed key, empty host pattern, Host line inside a block. */
export class ValidationError extends ConfigError {
  constructor(message: string) {
    super(message, "VALIDATION");
    this.name = "ValidationError";
  }
}

/** The config file holds bytes that are not valid UTF-8; loading it would corrupt them on save. */
export class EncodingError extends ConfigError {
  readonly path: string;

  constructor(message: string, path: string) {
    super(message, "ENCODING");
    this.name = "EncodingError";
    this.path = path;
  }
}
