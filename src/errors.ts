// src/errors.ts

/**
 * Base error class for all router errors.
 *
 * `status` is the HTTP-equivalent status a handler answers with when the
 * error reaches the edge.
 */
export class RouterError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly status: number,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "RouterError";
  }
}

/**
 * Raised by the actor runtime when a call or cast targets a stopped actor.
 */
export class ActorStoppedError extends RouterError {
  constructor(actorId: string) {
    super(`Actor stopped: ${actorId}`, "ACTOR_STOPPED", 503, { actorId });
    this.name = "ActorStoppedError";
  }
}

export class MailboxFullError extends RouterError {
  constructor(actorId: string, capacity: number) {
    super(
      `Mailbox of ${actorId} is full (capacity ${capacity})`,
      "MAILBOX_FULL",
      503,
      { actorId, capacity },
    );
    this.name = "MailboxFullError";
  }
}

export class DuplicateActorNameError extends RouterError {
  constructor(name: string) {
    super(`An actor named "${name}" is already running`, "DUPLICATE_ACTOR_NAME", 500, {
      name,
    });
    this.name = "DuplicateActorNameError";
  }
}

/**
 * Error thrown when an operation times out.
 */
export class TimeoutError extends RouterError {
  constructor(operation: string, timeoutMs: number) {
    super(`Operation timed out after ${timeoutMs}ms: ${operation}`, "TIMEOUT", 503, {
      operation,
      timeoutMs,
    });
    this.name = "TimeoutError";
  }
}

export class ShuttingDownError extends RouterError {
  constructor(operation: string) {
    super(`Cannot ${operation}: router is shutting down`, "SHUTTING_DOWN", 503, {
      operation,
    });
    this.name = "ShuttingDownError";
  }
}

/**
 * Error thrown when a transport operation fails.
 */
export class TransportError extends RouterError {
  readonly originalCause?: Error;

  constructor(message: string, routerId?: string, cause?: Error) {
    super(message, "TRANSPORT_ERROR", 502, { routerId, cause: cause?.message });
    this.name = "TransportError";
    this.originalCause = cause;
  }
}

export class PeerNotFoundError extends RouterError {
  constructor(routerId: string) {
    super(`No address known for router ${routerId}`, "PEER_NOT_FOUND", 502, {
      routerId,
    });
    this.name = "PeerNotFoundError";
  }
}

/**
 * A request or inter-router message is missing fields or carries values
 * of the wrong shape. Nothing is mutated when this is raised.
 */
export class BadRequestError extends RouterError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(message, "BAD_REQUEST", 400, { issues });
    this.name = "BadRequestError";
  }
}

export class NoInstanceAvailableError extends RouterError {
  constructor(serviceId: string) {
    super(`No instance available for ${serviceId}`, "NO_INSTANCE_AVAILABLE", 503, {
      serviceId,
    });
    this.name = "NoInstanceAvailableError";
  }
}

export class MaxQueueLengthExceededError extends RouterError {
  constructor(
    public readonly serviceId: string,
    maxQueueLength: number,
  ) {
    super("Max queue length exceeded!", "MAX_QUEUE_LENGTH_EXCEEDED", 503, {
      serviceId,
      maxQueueLength,
    });
    this.name = "MaxQueueLengthExceededError";
  }
}

/**
 * An actor answered a call with a reply of the wrong kind.
 */
export class UnexpectedReplyError extends RouterError {
  constructor(expected: string, received: string) {
    super(`Expected ${expected} reply but received ${received}`, "UNEXPECTED_REPLY", 500, {
      expected,
      received,
    });
    this.name = "UnexpectedReplyError";
  }
}

export class ConfigurationError extends RouterError {
  constructor(message: string, issues: string[] = []) {
    super(message, "CONFIGURATION_ERROR", 500, { issues });
    this.name = "ConfigurationError";
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
