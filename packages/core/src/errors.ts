export type ConversionErrorCode = "INVALID_METHOD" | "INVALID_IMAGE" | "INVALID_CONFIGURATION";

export class ConversionError extends Error {
  public readonly code: ConversionErrorCode;

  public constructor(code: ConversionErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidMethodError extends ConversionError {
  public constructor(public readonly method: string) {
    super("INVALID_METHOD", `Unknown conversion method: ${JSON.stringify(method)}`);
  }
}

export class InvalidImageError extends ConversionError {
  public constructor(message: string) {
    super("INVALID_IMAGE", message);
  }
}

export class InvalidConfigurationError extends ConversionError {
  public constructor(public readonly option: string, message: string) {
    super("INVALID_CONFIGURATION", `${option}: ${message}`);
  }
}

export function isConversionError(value: unknown): value is ConversionError {
  return value instanceof ConversionError;
}
