export { Body } from "./Body";
export { readAllBytes, readText } from "./consume";
export type { BodyInit, BodyWithType } from "./extract";
export { byteSequenceAsBody, extractBody } from "./extract";
export type { IncrementalReadHandlers } from "./IncrementalReadLoop";
export { IncrementalReadLoop } from "./IncrementalReadLoop";
