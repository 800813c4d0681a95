import { toProducerError, TypeMismatchError } from "../errors";
import type { ByteStreamReader } from "../stream/ByteStream";
import type {
  Destination,
  IncrementalReadSession,
  IncrementalReadState,
  ProcessBodyChunk,
  ProcessBodyError,
  ProcessEndOfBody,
  ReadEvent,
} from "../types/public";
import { copyBytes, isByteView } from "../utils/bytes";

export interface IncrementalReadHandlers {
  processChunk: ProcessBodyChunk;
  processEnd: ProcessEndOfBody;
  processError: ProcessBodyError;
}

/**
 * Reads one chunk at a time and delivers it through `destination`. The next
 * read is only issued after the previous chunk's callback has run there, so
 * at most one event is ever outstanding and delivery order is producer order.
 *
 *   idle → reading → delivering → reading
 *                               → stopped   (stop() was called)
 *          reading → ended | errored
 */
export class IncrementalReadLoop implements IncrementalReadSession {
  private current: IncrementalReadState = "idle";
  private stopRequested = false;

  constructor(
    private readonly reader: ByteStreamReader,
    private readonly destination: Destination,
    private readonly handlers: IncrementalReadHandlers,
  ) {}

  get state(): IncrementalReadState {
    return this.current;
  }

  start(): this {
    if (this.current === "idle") this.arm();
    return this;
  }

  stop(): void {
    this.stopRequested = true;
    if (this.current === "idle") this.current = "stopped";
  }

  private arm(): void {
    this.current = "reading";
    this.reader.read(this.onEvent);
  }

  private readonly onEvent = (event: ReadEvent): void => {
    switch (event.type) {
      case "chunk": {
        if (!isByteView(event.chunk)) {
          const error = new TypeMismatchError(event.chunk);
          this.current = "errored";
          this.destination.enqueue(() => this.handlers.processError(error));
          return;
        }
        const bytes = copyBytes(event.chunk);
        this.current = "delivering";
        this.destination.enqueue(() => this.continueWith(bytes));
        return;
      }
      case "end":
        this.current = "ended";
        this.destination.enqueue(() => this.handlers.processEnd());
        return;
      case "error": {
        const error = toProducerError(event.reason);
        this.current = "errored";
        this.destination.enqueue(() => this.handlers.processError(error));
        return;
      }
    }
  };

  private continueWith(bytes: Uint8Array): void {
    try {
      this.handlers.processChunk(bytes);
    } catch (error) {
      this.current = "stopped";
      throw error;
    }
    if (this.stopRequested) {
      this.current = "stopped";
      return;
    }
    this.arm();
  }
}
