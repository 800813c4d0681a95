import type { Destination } from "../types/public";
import type { Body } from "./Body";

const decoder = new TextDecoder();

export function readAllBytes(
  body: Body,
  destination: Destination,
): Promise<Uint8Array> {
  return new Promise((resolve, reject) =>
    body.fullyRead(resolve, reject, destination),
  );
}

export async function readText(
  body: Body,
  destination: Destination,
): Promise<string> {
  return decoder.decode(await readAllBytes(body, destination));
}
