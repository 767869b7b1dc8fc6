export type ErrorCode =
  | "InvalidInput"
  | "ConfigurationError"
  | "SearchUnavailable"
  | "ModelUnavailable"
  | "MalformedModelOutput"
  | "RenderError";

export class AnalysisError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = code;
  }
}

export class InvalidInputError extends AnalysisError {
  constructor(message: string) {
    super("InvalidInput", message);
  }
}

export class ConfigurationError extends AnalysisError {
  constructor(
    message: string,
    public readonly variables: string[] = []
  ) {
    super("ConfigurationError", message);
  }
}

export class SearchUnavailableError extends AnalysisError {
  constructor(message: string, cause?: unknown) {
    super("SearchUnavailable", message, { cause });
  }
}

export class ModelUnavailableError extends AnalysisError {
  constructor(message: string, cause?: unknown) {
    super("ModelUnavailable", message, { cause });
  }
}

export class MalformedModelOutputError extends AnalysisError {
  constructor(
    message: string,
    public readonly rawOutput?: string
  ) {
    super("MalformedModelOutput", message);
  }
}

export class RenderError extends AnalysisError {
  constructor(message: string) {
    super("RenderError", message);
  }
}

export const isAnalysisError = (error: unknown): error is AnalysisError =>
  error instanceof AnalysisError;

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
