/** Missing or malformed configuration. Fatal at startup. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Inbound request failed signature, timestamp or token checks. */
export class AuthError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AuthError";
  }
}

export class NotFoundError extends Error {
  constructor(
    readonly resource: string,
    readonly id: string
  ) {
    super(`${resource} not found: ${id}`);
    this.name = "NotFoundError";
  }
}

export class DraftExistsError extends Error {
  constructor(readonly id: string) {
    super(`Draft already exists: ${id}`);
    this.name = "DraftExistsError";
  }
}

/**
 * A call to OpenAI, Slack, Gmail, Drive or the PDF renderer failed.
 * `step` names the operation so fan-out reports can say which one.
 */
export class ExternalServiceError extends Error {
  constructor(
    readonly step: string,
    cause: unknown
  ) {
    super(`${step} failed: ${errorMessage(cause)}`, { cause });
    this.name = "ExternalServiceError";
  }
}

/** A callback referenced state that has since changed (task index, routing record). */
export class StaleReferenceError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StaleReferenceError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
