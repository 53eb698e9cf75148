export type ResponseQualityErrorCode = "INVALID_INPUT" | "INVALID_CONFIGURATION";

export class ResponseQualityError extends Error {
  public constructor(
    public readonly code: ResponseQualityErrorCode,
    public readonly constraint: string,
    message: string
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed vectors, out-of-range values or bad indices. Never recovered locally. */
export class InvalidInputError extends ResponseQualityError {
  public constructor(constraint: string, message: string) {
    super("INVALID_INPUT", constraint, message);
  }
}

/** Thrown at construction time for an option outside its allowed range. */
export class ConfigurationError extends ResponseQualityError {
  public constructor(option: string, message: string) {
    super("INVALID_CONFIGURATION", option, message);
  }
}

export const isResponseQualityError = (error: unknown): error is ResponseQualityError => {
  return error instanceof ResponseQualityError;
};
