import type {
  ByteStreamController,
  ReadEvent,
  UnderlyingByteSource,
} from "../types/public";
import { copyBytes, isByteView } from "../utils/bytes";
import type { ByteStreamReader } from "./ByteStream";

type Branch = 0 | 1;

/**
 * Builds the producers for the two branches of a tee over `reader`.
 *
 * Either branch pulling issues one upstream read; the chunk goes to every
 * branch that has not been cancelled, so the branch that reads less buffers.
 * The second branch receives its own copy of each byte chunk.
 */
export function createTeeSources(
  reader: ByteStreamReader,
): [UnderlyingByteSource, UnderlyingByteSource] {
  const controllers: (ByteStreamController | undefined)[] = [
    undefined,
    undefined,
  ];
  const cancelled = [false, false];
  const reasons: unknown[] = [undefined, undefined];
  let reading = false;
  let readAgain = false;
  let done = false;

  const forEachLive = (
    fn: (controller: ByteStreamController, branch: Branch) => void,
  ) => {
    for (const branch of [0, 1] as const) {
      const controller = controllers[branch];
      if (controller && !cancelled[branch]) fn(controller, branch);
    }
  };

  const onEvent = (event: ReadEvent) => {
    switch (event.type) {
      case "chunk": {
        const { chunk } = event;
        forEachLive((controller, branch) =>
          controller.enqueue(
            branch === 1 && isByteView(chunk) ? copyBytes(chunk) : chunk,
          ),
        );
        reading = false;
        if (readAgain) {
          readAgain = false;
          pull();
        }
        return;
      }
      case "end":
        done = true;
        reading = false;
        forEachLive((controller) => controller.close());
        return;
      case "error": {
        const { reason } = event;
        done = true;
        reading = false;
        forEachLive((controller) => controller.error(reason));
        return;
      }
    }
  };

  const pull = () => {
    if (done) return;
    // `reading` stays set until both branches have the chunk, so a branch
    // pulling from inside the delivery cannot overtake it.
    if (reading) {
      readAgain = true;
      return;
    }
    reading = true;
    reader.read(onEvent);
  };

  const cancel = (branch: Branch, reason: unknown): Promise<void> => {
    cancelled[branch] = true;
    reasons[branch] = reason;
    if (cancelled[0] && cancelled[1] && !done) {
      done = true;
      return reader.cancel(
        new AggregateError(reasons, "Both tee branches were cancelled"),
      );
    }
    return Promise.resolve();
  };

  const branchSource = (branch: Branch): UnderlyingByteSource => ({
    start(controller) {
      controllers[branch] = controller;
    },
    pull,
    cancel: (reason) => cancel(branch, reason),
  });

  return [branchSource(0), branchSource(1)];
}
