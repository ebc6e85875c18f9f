/**
 * Base class for every misuse of a behavior: calling an operation in a
 * state that does not allow it, or a handler breaking its contract.
 */
export class InvalidOperationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "InvalidOperationError";
  }
}

export class ConfigurationError extends InvalidOperationError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class ProtocolViolationError extends InvalidOperationError {
  constructor(message: string) {
    super(message);
    this.name = "ProtocolViolationError";
  }
}

export class HandlerContractError extends InvalidOperationError {
  constructor(message: string) {
    super(message);
    this.name = "HandlerContractError";
  }
}

export class ResetError extends Error {
  constructor(original: Error) {
    super(`Actor reset after error: ${original.message}`);
    this.cause = original;
    this.name = "ResetError";
  }
}

export class CommitError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "CommitError";
  }
}

export class StoppedActorError extends Error {
  constructor(actorId: string) {
    super(`Actor ${actorId} is stopped. Further messages are rejected.`);
    this.name = "StoppedActorError";
  }
}

export class HostShutdownError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "HostShutdownError";
  }
}
