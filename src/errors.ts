/**
 * Error taxonomy shared by the store, the queue and the job handlers.
 *
 * - ValidationError: rejected input, never persisted.
 * - StorageError: a durable read/write failed; surfaced, not retried.
 * - UpstreamError: an external collaborator failed or timed out; handlers
 *   fall back to a local reply.
 * - SchedulingError: a queue invariant was violated. Indicates a bug.
 * - QueueClosedError: a job arrived after shutdown began.
 */

export class ValidationError extends Error {
  override readonly name = "ValidationError";

  constructor(
    message: string,
    readonly field?: string,
  ) {
    super(message);
  }
}

export class StorageError extends Error {
  override readonly name = "StorageError";

  constructor(
    message: string,
    readonly conversationKey: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export type UpstreamService =
  | "response-generator"
  | "grammar-checker"
  | "transcriber"
  | "speech-synthesizer"
  | "reply-channel";

export class UpstreamError extends Error {
  override readonly name = "UpstreamError";

  constructor(
    readonly service: UpstreamService,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${service}: ${message}`, options);
  }
}

export class SchedulingError extends Error {
  override readonly name = "SchedulingError";
}

export class QueueClosedError extends Error {
  override readonly name = "QueueClosedError";

  constructor(readonly conversationKey: string) {
    super(`queue is shut down; rejected job for ${conversationKey}`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
