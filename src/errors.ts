export class StructuredOutputError extends Error {
  readonly attempts: number;

  constructor(message: string, attempts: number, cause?: unknown) {
    super(message, { cause });
    this.name = "StructuredOutputError";
    this.attempts = attempts;
  }
}

export class RunNotFoundError extends Error {
  readonly runId: string;

  constructor(runId: string) {
    super(`Run ${runId} not found`);
    this.name = "RunNotFoundError";
    this.runId = runId;
  }
}

export class RunStateError extends Error {
  readonly runId: string;
  readonly status: string;

  constructor(runId: string, status: string, operation: string) {
    super(`Cannot ${operation} run ${runId} while it is ${status}`);
    this.name = "RunStateError";
    this.runId = runId;
    this.status = status;
  }
}

export class RunTimeoutError extends Error {
  constructor(limitMinutes: number, stage: string) {
    super(`Run exceeded its ${limitMinutes} minute budget before stage ${stage}`);
    this.name = "RunTimeoutError";
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
