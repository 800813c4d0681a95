import {
  AcquisitionError,
  StreamLockedError,
  toProducerError,
  TypeMismatchError,
} from "../errors";
import type { ChunkingOptions } from "../types/config";
import { resolveChunkSize } from "../types/config";
import type {
  ByteStreamController,
  ReadEvent,
  ReadRequest,
  StreamState,
  UnderlyingByteSource,
} from "../types/public";
import { copyBytes, isByteView } from "../utils/bytes";
import { _cancel, _read, _release } from "./internal";
import { createTeeSources } from "./tee";

/**
 * A single-reader, pull-based sequence of byte chunks that ends with exactly
 * one close or error.
 *
 * Read requests are answered from whatever call stack produces the data: a
 * queued chunk answers `read()` synchronously, and `controller.enqueue()`
 * answers a waiting request from inside the producer.
 */
export class ByteStream implements AsyncIterable<Uint8Array> {
  private state: StreamState = "readable";
  private queue: unknown[] = [];
  private pendingReads: ReadRequest[] = [];
  private closeRequested = false;
  private storedError: unknown;
  private reader?: ByteStreamReader;
  private started = false;
  private pulling = false;
  private pullAgain = false;
  private wasDisturbed = false;
  private readonly controller: ByteStreamController;

  constructor(private readonly source: UnderlyingByteSource = {}) {
    this.controller = {
      enqueue: (chunk) => this.enqueueChunk(chunk),
      close: () => this.requestClose(),
      error: (reason) => this.fail(reason),
    };

    const startResult = source.start?.(this.controller);
    Promise.resolve(startResult).then(
      () => {
        this.started = true;
        this.callPullIfNeeded();
      },
      (reason: unknown) => this.fail(reason),
    );
  }

  static fromBytes(
    bytes: Uint8Array,
    options?: ChunkingOptions,
  ): ByteStream {
    const data = copyBytes(bytes);
    const chunkSize = resolveChunkSize(options);
    let offset = 0;
    return new ByteStream({
      pull(controller) {
        if (offset >= data.byteLength) {
          controller.close();
          return;
        }
        const end = Math.min(offset + chunkSize, data.byteLength);
        controller.enqueue(data.slice(offset, end));
        offset = end;
      },
    });
  }

  static fromBlob(blob: Blob, options?: ChunkingOptions): ByteStream {
    const chunkSize = resolveChunkSize(options);
    let offset = 0;
    return new ByteStream({
      async pull(controller) {
        if (offset >= blob.size) {
          controller.close();
          return;
        }
        const end = Math.min(offset + chunkSize, blob.size);
        const buffer = await blob.slice(offset, end).arrayBuffer();
        offset = end;
        controller.enqueue(new Uint8Array(buffer));
      },
    });
  }

  /**
   * Wraps an iterable of chunks. Chunks are passed through unchecked; readers
   * decide what to do with ones that are not byte views.
   */
  static from(chunks: Iterable<unknown> | AsyncIterable<unknown>): ByteStream {
    if (Symbol.asyncIterator in chunks) {
      const iterator = chunks[Symbol.asyncIterator]();
      return new ByteStream({
        async pull(controller) {
          const result = await iterator.next();
          if (result.done) controller.close();
          else controller.enqueue(result.value);
        },
        async cancel() {
          await iterator.return?.();
        },
      });
    }
    const iterator = chunks[Symbol.iterator]();
    return new ByteStream({
      pull(controller) {
        const result = iterator.next();
        if (result.done) controller.close();
        else controller.enqueue(result.value);
      },
      cancel() {
        iterator.return?.();
      },
    });
  }

  get locked(): boolean {
    return this.reader !== undefined;
  }

  /** True once anything has been read from or cancelled on this stream. */
  get disturbed(): boolean {
    return this.wasDisturbed;
  }

  get status(): StreamState {
    return this.state;
  }

  /**
   * Locks the stream to a new reader. A closed or errored stream still hands
   * out a reader, so its end or error can be observed, until someone has read
   * from it.
   */
  getReader(): ByteStreamReader {
    if (this.reader) {
      throw new AcquisitionError("Stream is already locked to a reader");
    }
    if (this.state !== "readable" && this.wasDisturbed) {
      throw new AcquisitionError(
        `Cannot get a reader for a ${this.state} stream that was already read`,
      );
    }
    const reader = new ByteStreamReader(this);
    this.reader = reader;
    return reader;
  }

  /**
   * Splits the stream into two branches that each see every chunk. Only a
   * stream nobody has read from or cancelled can be split, and it stays
   * locked to the tee afterwards.
   */
  tee(): [ByteStream, ByteStream] {
    if (this.reader) throw new StreamLockedError();
    if (this.wasDisturbed) {
      throw new StreamLockedError("Cannot tee a stream that was already read");
    }

    const reader = this.getReader();
    if (this.state !== "readable") {
      const settle = this.settledSource();
      return [new ByteStream(settle), new ByteStream(settle)];
    }

    const [first, second] = createTeeSources(reader);
    return [new ByteStream(first), new ByteStream(second)];
  }

  cancel(reason?: unknown): Promise<void> {
    if (this.reader) {
      return Promise.reject(
        new StreamLockedError(
          "Cannot cancel a stream that is locked to a reader",
        ),
      );
    }
    return this[_cancel](reason);
  }

  async *[Symbol.asyncIterator](): AsyncIterator<Uint8Array> {
    const reader = this.getReader();
    let finished = false;
    try {
      while (true) {
        const event = await reader.next();
        switch (event.type) {
          case "chunk":
            if (!isByteView(event.chunk)) {
              throw new TypeMismatchError(event.chunk);
            }
            yield event.chunk;
            break;
          case "end":
            finished = true;
            return;
          case "error":
            finished = true;
            throw toProducerError(event.reason);
        }
      }
    } finally {
      if (!finished) await reader.cancel();
      reader.releaseLock();
    }
  }

  [_read](reader: ByteStreamReader, request: ReadRequest): void {
    if (this.reader !== reader) {
      request({
        type: "error",
        reason: new AcquisitionError("Reader has been released"),
      });
      return;
    }
    this.wasDisturbed = true;

    if (this.queue.length > 0) {
      const chunk = this.queue.shift();
      if (this.closeRequested && this.queue.length === 0) {
        this.finishClose();
      } else {
        this.callPullIfNeeded();
      }
      request({ type: "chunk", chunk });
      return;
    }

    switch (this.state) {
      case "closed":
        request({ type: "end" });
        return;
      case "errored":
        request({ type: "error", reason: this.storedError });
        return;
      case "readable":
        this.pendingReads.push(request);
        this.callPullIfNeeded();
        return;
    }
  }

  [_release](reader: ByteStreamReader): void {
    if (this.reader !== reader) return;
    this.reader = undefined;
    const reads = this.pendingReads;
    this.pendingReads = [];
    for (const request of reads) {
      request({
        type: "error",
        reason: new AcquisitionError("Reader was released with a read pending"),
      });
    }
  }

  [_cancel](reason: unknown): Promise<void> {
    this.wasDisturbed = true;
    if (this.state === "closed") return Promise.resolve();
    if (this.state === "errored") return Promise.reject(this.storedError);

    this.queue = [];
    this.finishClose();
    try {
      return Promise.resolve(this.source.cancel?.(reason)).then(
        () => undefined,
      );
    } catch (error) {
      return Promise.reject(error);
    }
  }

  private enqueueChunk(chunk: unknown): void {
    if (this.closeRequested || this.state !== "readable") {
      throw new TypeError(
        `Cannot enqueue into a ${this.describeState()} stream`,
      );
    }
    const request = this.pendingReads.shift();
    if (request) {
      request({ type: "chunk", chunk });
    } else {
      this.queue.push(chunk);
    }
    this.callPullIfNeeded();
  }

  private requestClose(): void {
    if (this.closeRequested || this.state !== "readable") {
      throw new TypeError(`Cannot close a ${this.describeState()} stream`);
    }
    this.closeRequested = true;
    if (this.queue.length === 0) this.finishClose();
  }

  private finishClose(): void {
    this.state = "closed";
    const reads = this.pendingReads;
    this.pendingReads = [];
    for (const request of reads) request({ type: "end" });
  }

  private fail(reason: unknown): void {
    if (this.state !== "readable") return;
    this.state = "errored";
    this.storedError = reason;
    this.queue = [];
    const reads = this.pendingReads;
    this.pendingReads = [];
    for (const request of reads) request({ type: "error", reason });
  }

  private shouldPull(): boolean {
    return (
      this.started &&
      this.state === "readable" &&
      !this.closeRequested &&
      this.pendingReads.length > 0
    );
  }

  private callPullIfNeeded(): void {
    if (!this.shouldPull()) return;
    if (this.pulling) {
      this.pullAgain = true;
      return;
    }
    this.pulling = true;

    let pullResult: void | PromiseLike<void>;
    try {
      pullResult = this.source.pull?.(this.controller);
    } catch (reason) {
      this.fail(reason);
      return;
    }
    Promise.resolve(pullResult).then(
      () => {
        this.pulling = false;
        if (this.pullAgain) {
          this.pullAgain = false;
          this.callPullIfNeeded();
        }
      },
      (reason: unknown) => this.fail(reason),
    );
  }

  private describeState(): string {
    return this.state === "readable" ? "closing" : this.state;
  }

  private settledSource(): UnderlyingByteSource {
    const { state, storedError } = this;
    return {
      start(controller) {
        if (state === "errored") controller.error(storedError);
        else controller.close();
      },
    };
  }
}

/** Exclusive access to a `ByteStream`. */
export class ByteStreamReader {
  private stream?: ByteStream;

  constructor(stream: ByteStream) {
    this.stream = stream;
  }

  get released(): boolean {
    return this.stream === undefined;
  }

  /** Issues one read; `request` is invoked exactly once. */
  read(request: ReadRequest): void {
    if (!this.stream) {
      request({
        type: "error",
        reason: new AcquisitionError("Reader has been released"),
      });
      return;
    }
    this.stream[_read](this, request);
  }

  next(): Promise<ReadEvent> {
    return new Promise((resolve) => this.read(resolve));
  }

  cancel(reason?: unknown): Promise<void> {
    if (!this.stream) {
      return Promise.reject(new AcquisitionError("Reader has been released"));
    }
    return this.stream[_cancel](reason);
  }

  releaseLock(): void {
    this.stream?.[_release](this);
    this.stream = undefined;
  }
}
