import { freeze } from "immer";
import { InvalidDestinationError, toProducerError } from "../errors";
import type { ByteStream, ByteStreamReader } from "../stream/ByteStream";
import type {
  BodySource,
  Destination,
  IncrementalReadSession,
  ProcessBody,
  ProcessBodyChunk,
  ProcessBodyError,
  ProcessEndOfBody,
} from "../types/public";
import { copyBytes } from "../utils/bytes";
import { readAllChunks } from "./fullRead";
import { IncrementalReadLoop } from "./IncrementalReadLoop";

const EMPTY_SOURCE = freeze<BodySource>({ type: "empty" });

/**
 * A payload that can be consumed once, either all at once or chunk by chunk.
 *
 * `source` and `length` describe the content and never change. The body
 * keeps its own copy of source bytes, and `source` hands out a fresh copy on
 * each access. `stream` is replaced exactly once per `clone()`, by one branch
 * of a tee.
 *
 * Every callback passed to the read methods runs later, through the given
 * destination, never on the caller's stack or the producer's.
 */
export class Body {
  readonly length: number | null;
  private readonly ownSource: BodySource;
  private currentStream: ByteStream;

  constructor(
    stream: ByteStream,
    source: BodySource = EMPTY_SOURCE,
    length: number | null = null,
  ) {
    if (length !== null && !(Number.isSafeInteger(length) && length >= 0)) {
      throw new RangeError(
        `Body length must be a non-negative integer, got ${length}`,
      );
    }
    this.currentStream = stream;
    this.ownSource = freeze(ownCopy(source), true);
    this.length = length;
  }

  get source(): BodySource {
    return ownCopy(this.ownSource);
  }

  get stream(): ByteStream {
    return this.currentStream;
  }

  /** True when the stream can no longer be read from the start. */
  get isUnusable(): boolean {
    return this.currentStream.locked || this.currentStream.disturbed;
  }

  /**
   * Returns a body over the same bytes. This body's stream is swapped for one
   * tee branch and the clone gets the other; reading either does not affect
   * the other. Throws `StreamLockedError`, changing nothing, while a reader
   * holds the stream or once anything has been read from it.
   */
  clone(): Body {
    const [first, second] = this.currentStream.tee();
    this.currentStream = first;
    return new Body(second, this.ownSource, this.length);
  }

  fullyRead(
    processBody: ProcessBody,
    processError: ProcessBodyError,
    destination: Destination,
  ): void {
    assertDestination(destination);

    const successSteps = (bytes: Uint8Array) =>
      destination.enqueue(() => processBody(bytes));
    const errorSteps = (error: Error) =>
      destination.enqueue(() => processError(error));

    const source = this.ownSource;
    switch (source.type) {
      case "bytes":
        successSteps(copyBytes(source.bytes));
        return;
      case "blob":
        source.blob.arrayBuffer().then(
          (buffer) => successSteps(new Uint8Array(buffer)),
          (reason: unknown) => errorSteps(toProducerError(reason)),
        );
        return;
      case "empty": {
        const reader = this.acquireReader(errorSteps);
        if (reader) readAllChunks(reader, successSteps, errorSteps);
        return;
      }
    }
  }

  incrementallyRead(
    processChunk: ProcessBodyChunk,
    processEnd: ProcessEndOfBody,
    processError: ProcessBodyError,
    destination: Destination,
  ): IncrementalReadSession {
    assertDestination(destination);

    const reader = this.acquireReader((error) =>
      destination.enqueue(() => processError(error)),
    );
    if (!reader) return { state: "errored", stop() {} };

    return new IncrementalReadLoop(reader, destination, {
      processChunk,
      processEnd,
      processError,
    }).start();
  }

  private acquireReader(
    onError: (error: Error) => void,
  ): ByteStreamReader | undefined {
    try {
      return this.currentStream.getReader();
    } catch (error) {
      onError(error instanceof Error ? error : toProducerError(error));
      return undefined;
    }
  }
}

function ownCopy(source: BodySource): BodySource {
  if (source.type !== "bytes") return source;
  return freeze<BodySource>({
    type: "bytes",
    bytes: copyBytes(source.bytes),
  });
}

function assertDestination(destination: Destination | null | undefined): void {
  if (!destination || typeof destination.enqueue !== "function") {
    throw new InvalidDestinationError();
  }
}
