import { toProducerError, TypeMismatchError } from "../errors";
import type { ByteStreamReader } from "../stream/ByteStream";
import type { ReadRequest } from "../types/public";
import { concatBytes, copyBytes, isByteView } from "../utils/bytes";

/**
 * Reads `reader` to the end and hands the concatenated bytes to
 * `successSteps`, or the failure to `errorSteps`. Exactly one of them runs,
 * from whichever call stack the stream finishes on; nothing is delivered
 * partially.
 */
export function readAllChunks(
  reader: ByteStreamReader,
  successSteps: (bytes: Uint8Array) => void,
  errorSteps: (error: Error) => void,
): void {
  const chunks: Uint8Array[] = [];
  let pumping = false;
  let rearm = false;

  const request: ReadRequest = (event) => {
    switch (event.type) {
      case "chunk":
        if (!isByteView(event.chunk)) {
          errorSteps(new TypeMismatchError(event.chunk));
          return;
        }
        // the producer may reuse the chunk's buffer once this returns
        chunks.push(copyBytes(event.chunk));
        if (pumping) rearm = true;
        else pump();
        return;
      case "end":
        successSteps(concatBytes(chunks));
        return;
      case "error":
        errorSteps(toProducerError(event.reason));
        return;
    }
  };

  // Chunks answered synchronously are looped over instead of recursed into.
  const pump = () => {
    pumping = true;
    do {
      rearm = false;
      reader.read(request);
    } while (rearm);
    pumping = false;
  };

  pump();
}
