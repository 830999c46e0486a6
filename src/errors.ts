/**
 * Raised at the input boundary when a protocol, corpus or finding does not
 * match its schema. Search and scoring never throw this themselves.
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly source: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = "ValidationError";
  }
}

export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly setting: string
  ) {
    super(message);
    this.name = "ConfigurationError";
  }
}
