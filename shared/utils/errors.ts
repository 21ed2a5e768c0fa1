export type ErrorContext = Record<string, unknown>;

/**
 * Base class for every error raised by the pipeline and the insights API.
 */
export class AnalyticsError extends Error {
  readonly code: string;
  readonly context: ErrorContext;
  readonly statusCode: number;

  constructor(message: string, code: string, statusCode: number = 500, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.statusCode = statusCode;
    this.context = context;
  }
}

export class ConfigurationError extends AnalyticsError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, 'CONFIGURATION_ERROR', 500, context);
  }
}

/**
 * A source file or upstream table a stage reads from does not exist.
 */
export class MissingInputError extends AnalyticsError {
  readonly input: string;

  constructor(input: string, message?: string, context: ErrorContext = {}) {
    super(message ?? `Required input '${input}' does not exist`, 'MISSING_INPUT', 404, { input, ...context });
    this.input = input;
  }
}

/**
 * The engine gave up because a query exceeded the configured memory ceiling.
 */
export class ResourceLimitError extends AnalyticsError {
  constructor(message: string, context: ErrorContext = {}, cause?: unknown) {
    super(message, 'RESOURCE_LIMIT', 500, context, { cause });
  }
}

export class InvalidEventError extends AnalyticsError {
  readonly issues: string[];

  constructor(issues: string[], context: ErrorContext = {}) {
    super(`Invalid event batch: ${issues.join('; ')}`, 'INVALID_EVENT', 400, { issues, ...context });
    this.issues = issues;
  }
}

export class StageFailedError extends AnalyticsError {
  readonly stage: string;

  constructor(stage: string, cause: unknown) {
    super(`Stage '${stage}' failed: ${describeError(cause)}`, 'STAGE_FAILED', 500, { stage }, { cause });
    this.stage = stage;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

const OUT_OF_MEMORY_PATTERN = /out of memory/i;

export function isOutOfMemory(error: unknown): boolean {
  return error instanceof Error && OUT_OF_MEMORY_PATTERN.test(error.message);
}
