export class ConfigTransformError extends Error {
  constructor(
    public readonly env: string,
    reason: unknown,
  ) {
    super(`Failed to transform config ${env}: ${reason}`);
    this.name = 'ConfigTransformError';
  }
}

export class ConfigValidationError extends Error {
  constructor(
    public readonly fragment: string,
    public readonly properties: string[],
  ) {
    super(`Invalid ${fragment}: check ${properties.join(', ')}`);
    this.name = 'ConfigValidationError';
  }
}
