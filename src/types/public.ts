/**
 * A single notification from a stream reader. Exactly one is delivered per
 * `read()` call.
 */
export type ReadEvent =
  | { type: "chunk"; chunk: unknown }
  | { type: "end" }
  | { type: "error"; reason: unknown };

export type ReadRequest = (event: ReadEvent) => void;

export type StreamState = "readable" | "closed" | "errored";

export interface ByteStreamController {
  enqueue(chunk: unknown): void;
  close(): void;
  error(reason: unknown): void;
}

/**
 * The producer side of a `ByteStream`. `pull` is only called while a reader is
 * waiting for data, and never while a previous pull is still pending.
 */
export interface UnderlyingByteSource {
  start?(controller: ByteStreamController): void | PromiseLike<void>;
  pull?(controller: ByteStreamController): void | PromiseLike<void>;
  cancel?(reason: unknown): void | PromiseLike<void>;
}

// BODY
export type BodySource =
  | { readonly type: "empty" }
  | { readonly type: "bytes"; readonly bytes: Uint8Array }
  | { readonly type: "blob"; readonly blob: Blob };

export type ProcessBody = (bytes: Uint8Array) => void;
export type ProcessBodyError = (error: Error) => void;
export type ProcessBodyChunk = (bytes: Uint8Array) => void;
export type ProcessEndOfBody = () => void;

export type IncrementalReadState =
  | "idle"
  | "reading"
  | "delivering"
  | "ended"
  | "errored"
  | "stopped";

export interface IncrementalReadSession {
  readonly state: IncrementalReadState;
  /** Stops the loop from issuing another read once the current one has been delivered. */
  stop(): void;
}

export interface Destination {
  enqueue(work: () => void): void;
}
