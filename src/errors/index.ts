import { describe } from "../utils/serde";

export class AcquisitionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "AcquisitionError";
  }
}

export class StreamLockedError extends Error {
  constructor(message = "Cannot tee a stream that is locked to a reader") {
    super(message);
    this.name = "StreamLockedError";
  }
}

export class TypeMismatchError extends Error {
  constructor(chunk: unknown) {
    super(`Chunk is not a Uint8Array (got ${kindOf(chunk)})`);
    this.name = "TypeMismatchError";
  }
}

export class ProducerError extends Error {
  constructor(reason: unknown) {
    super(
      reason instanceof Error
        ? reason.message
        : `Stream errored: ${describe(reason)}`,
      { cause: reason },
    );
    this.name = "ProducerError";
  }
}

export class EnqueueError extends Error {
  constructor(destinationName: string) {
    super(`Task destination "${destinationName}" is closed. Work was dropped.`);
    this.name = "EnqueueError";
  }
}

export class InvalidDestinationError extends TypeError {
  constructor() {
    super("A task destination is required");
    this.name = "InvalidDestinationError";
  }
}

/**
 * Wraps an arbitrary stream error reason. Reasons that already are a
 * `ProducerError` (e.g. forwarded through a tee branch) are kept as they are.
 */
export function toProducerError(reason: unknown): ProducerError {
  return reason instanceof ProducerError ? reason : new ProducerError(reason);
}

function kindOf(value: unknown): string {
  if (value === null) return "null";
  if (typeof value !== "object") return typeof value;
  return value.constructor?.name ?? "object";
}
