import { StreamLockedError } from "../errors";
import { ByteStream } from "../stream/ByteStream";
import type { ChunkingOptions } from "../types/config";
import { toUint8Array } from "../utils/bytes";
import { Body } from "./Body";

export type BodyInit =
  | string
  | ArrayBuffer
  | ArrayBufferView
  | Blob
  | ByteStream;

export interface BodyWithType {
  body: Body;
  /** Media type implied by the input, if any. */
  type: string | null;
}

const encoder = new TextEncoder();

export function extractBody(
  init: BodyInit,
  options: ChunkingOptions = {},
): BodyWithType {
  if (init instanceof ByteStream) {
    if (init.locked || init.disturbed) {
      throw new StreamLockedError(
        "Cannot make a body from a stream that is locked or already read",
      );
    }
    return { body: new Body(init), type: null };
  }

  if (typeof init === "string") {
    return {
      body: bytesBody(encoder.encode(init), options),
      type: "text/plain;charset=UTF-8",
    };
  }

  if (init instanceof Blob) {
    return {
      body: new Body(
        ByteStream.fromBlob(init, options),
        { type: "blob", blob: init },
        init.size,
      ),
      type: init.type === "" ? null : init.type,
    };
  }

  return {
    body: bytesBody(toUint8Array(init), options),
    type: null,
  };
}

/**
 * Turns static bytes into a body. Its stream yields the bytes once, and its
 * source holds them too, so a full read never touches the stream.
 */
export function byteSequenceAsBody(
  bytes: Uint8Array,
  options?: ChunkingOptions,
): Body {
  return extractBody(bytes, options).body;
}

function bytesBody(bytes: Uint8Array, options: ChunkingOptions): Body {
  return new Body(
    ByteStream.fromBytes(bytes, options),
    { type: "bytes", bytes },
    bytes.byteLength,
  );
}
