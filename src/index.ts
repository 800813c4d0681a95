export * from "./body/index";
export * from "./errors/index";
export {
  createTaskDestination,
  TaskDestination,
} from "./runtime/TaskDestination";
export { ByteStream, ByteStreamReader } from "./stream/index";
export type {
  ChunkingOptions,
  TaskDestinationConfig,
  TaskMetrics,
} from "./types/config";
export type * from "./types/public";
