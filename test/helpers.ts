import type { Body } from "@/body/Body";
import { ByteStream } from "@/stream/ByteStream";
import type { ByteStreamController, Destination } from "@/types/public";

export type Recorded =
  | { kind: "chunk"; bytes: number[] }
  | { kind: "end" }
  | { kind: "error"; error: Error };

export const bytes = (...values: number[]) => new Uint8Array(values);

export const tick = (ms = 0) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * A producer that hands out one chunk per pull, then closes or errors.
 * With `delayMs` each pull waits on a timer first.
 */
export function streamOf(
  chunks: readonly unknown[],
  options: { errorWith?: unknown; delayMs?: number } = {},
): ByteStream {
  let index = 0;
  const emit = (controller: ByteStreamController) => {
    if (index < chunks.length) {
      controller.enqueue(chunks[index++]);
    } else if ("errorWith" in options) {
      controller.error(options.errorWith);
    } else {
      controller.close();
    }
  };
  const { delayMs } = options;
  if (delayMs === undefined) return new ByteStream({ pull: emit });
  return new ByteStream({
    async pull(controller) {
      await tick(delayMs);
      emit(controller);
    },
  });
}

export function fullyReadAsPromise(
  body: Body,
  destination: Destination,
): Promise<number[]> {
  return new Promise((resolve, reject) =>
    body.fullyRead((out) => resolve(Array.from(out)), reject, destination),
  );
}

export function recordIncrementalRead(body: Body, destination: Destination) {
  const events: Recorded[] = [];
  let finish: (events: Recorded[]) => void = () => {};
  const finished = new Promise<Recorded[]>((resolve) => {
    finish = resolve;
  });
  const session = body.incrementallyRead(
    (chunk) => {
      events.push({ kind: "chunk", bytes: Array.from(chunk) });
    },
    () => {
      events.push({ kind: "end" });
      finish(events);
    },
    (error) => {
      events.push({ kind: "error", error });
      finish(events);
    },
    destination,
  );
  return { events, session, finished };
}
