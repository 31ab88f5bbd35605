/**
 * Error taxonomy shared by the log client, the store adapters and the relay.
 */

export class RelayError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RelayError";
  }
}

/** Transport or protocol failure on a log operation. Retried next cycle. */
export class LogUnavailableError extends RelayError {
  readonly operation: string;
  readonly topicId: string | undefined;

  constructor(operation: string, topicId: string | undefined, cause?: unknown) {
    super(
      `Log ${operation}${topicId === undefined ? "" : ` on "${topicId}"`} failed: ${describeCause(cause)}`,
      { cause }
    );
    this.name = "LogUnavailableError";
    this.operation = operation;
    this.topicId = topicId;
  }
}

/** The topic's stream or consumer group no longer exists (e.g. the log was flushed). */
export class GroupMissingError extends LogUnavailableError {
  readonly groupName: string;

  constructor(operation: string, topicId: string, groupName: string, cause?: unknown) {
    super(operation, topicId, cause);
    this.name = "GroupMissingError";
    this.groupName = groupName;
  }
}

/** Durable store failure. The entry stays un-acked and is redelivered. */
export class StoreUnavailableError extends RelayError {
  readonly operation: string;

  constructor(operation: string, cause?: unknown) {
    super(`Store ${operation} failed: ${describeCause(cause)}`, { cause });
    this.name = "StoreUnavailableError";
    this.operation = operation;
  }
}

/** An entry without both `user` and `message`. Discarded with an ack, never retried. */
export class MalformedEntryError extends RelayError {
  readonly topicId: string;
  readonly entryId: string | undefined;
  readonly missingFields: readonly string[];

  constructor(topicId: string, entryId: string | undefined, missingFields: readonly string[]) {
    super(
      `Malformed entry${entryId === undefined ? "" : ` ${entryId}`} in "${topicId}": missing ${missingFields.join(", ")}`
    );
    this.name = "MalformedEntryError";
    this.topicId = topicId;
    this.entryId = entryId;
    this.missingFields = missingFields;
  }
}

/** Invalid process configuration. Fatal at startup. */
export class ConfigError extends RelayError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid configuration:\n  - ${issues.join("\n  - ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (cause === undefined) return "unknown error";
  return String(cause);
}
