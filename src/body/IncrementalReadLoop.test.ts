import { beforeEach, describe, expect, it, vi } from "vitest";
import { ByteStream } from "../stream/ByteStream";
import type { ByteStreamController, Destination } from "../types/public";
import { IncrementalReadLoop } from "./IncrementalReadLoop";

class ManualDestination implements Destination {
  readonly tasks: (() => void)[] = [];

  enqueue(work: () => void): void {
    this.tasks.push(work);
  }

  runNext(): void {
    const task = this.tasks.shift();
    if (!task) throw new Error("nothing queued");
    task();
  }
}

describe("IncrementalReadLoop", () => {
  let destination: ManualDestination;
  let controller: ByteStreamController;
  let stream: ByteStream;
  const handlers = {
    processChunk: vi.fn(),
    processEnd: vi.fn(),
    processError: vi.fn(),
  };

  beforeEach(() => {
    vi.clearAllMocks();
    destination = new ManualDestination();
    const captured: { controller?: ByteStreamController } = {};
    stream = new ByteStream({
      start(c) {
        captured.controller = c;
      },
    });
    if (!captured.controller) throw new Error("start did not run");
    controller = captured.controller;
  });

  it("should keep one read outstanding and re-arm only after delivery", () => {
    const loop = new IncrementalReadLoop(
      stream.getReader(),
      destination,
      handlers,
    ).start();
    expect(loop.state).toBe("reading");

    controller.enqueue(new Uint8Array([1]));
    expect(loop.state).toBe("delivering");
    expect(destination.tasks).toHaveLength(1);

    controller.enqueue(new Uint8Array([2]));
    expect(destination.tasks).toHaveLength(1);

    destination.runNext();
    expect(handlers.processChunk).toHaveBeenCalledWith(new Uint8Array([1]));
    expect(loop.state).toBe("delivering");
    expect(destination.tasks).toHaveLength(1);

    controller.close();
    destination.runNext();
    expect(handlers.processChunk).toHaveBeenLastCalledWith(
      new Uint8Array([2]),
    );
    expect(loop.state).toBe("ended");

    destination.runNext();
    expect(handlers.processEnd).toHaveBeenCalledTimes(1);
    expect(handlers.processError).not.toHaveBeenCalled();
    expect(destination.tasks).toHaveLength(0);
  });

  it("should not read at all when stopped before it starts", () => {
    const loop = new IncrementalReadLoop(
      stream.getReader(),
      destination,
      handlers,
    );
    loop.stop();
    loop.start();

    controller.enqueue(new Uint8Array([1]));
    expect(loop.state).toBe("stopped");
    expect(destination.tasks).toHaveLength(0);
  });

  it("should queue the error once and stop reading", () => {
    const loop = new IncrementalReadLoop(
      stream.getReader(),
      destination,
      handlers,
    ).start();

    controller.error("gone");
    expect(loop.state).toBe("errored");
    destination.runNext();

    expect(handlers.processError).toHaveBeenCalledTimes(1);
    expect(destination.tasks).toHaveLength(0);
  });
});
