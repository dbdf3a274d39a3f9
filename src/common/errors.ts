export type KinematicsErrorCode =
  | "invalid_argument"
  | "missing_configuration"
  | "incompatible_binning"
  | "mismatched_length";

export class KinematicsError extends Error {
  readonly code: KinematicsErrorCode;

  constructor(code: KinematicsErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidArgumentError extends KinematicsError {
  constructor(message: string) {
    super("invalid_argument", message);
  }
}

export class MissingConfigurationError extends KinematicsError {
  constructor(message: string) {
    super("missing_configuration", message);
  }
}

export class IncompatibleBinningError extends KinematicsError {
  constructor(message: string) {
    super("incompatible_binning", message);
  }
}

export class MismatchedLengthError extends KinematicsError {
  constructor(message: string) {
    super("mismatched_length", message);
  }
}

export function stringifyError(value: unknown): string {
  if (value instanceof Error) {
    return value.message;
  }
  return String(value);
}
