import type { EnqueueError } from "../errors";

/**
 * Callbacks for integrating task delivery with logging and monitoring.
 */
export interface TaskMetrics {
  onEnqueue?: (destination: string) => void;
  onTaskError?: (destination: string, error: unknown) => void;
  onDropped?: (destination: string, error: EnqueueError) => void;
}

export interface TaskDestinationConfig {
  name?: string;
  metrics?: TaskMetrics;
}

export interface ChunkingOptions {
  /** Largest chunk a stream built from static content emits. Default 65_536. */
  chunkSize?: number;
}

export const DEFAULT_CHUNK_SIZE = 65_536;

export function resolveChunkSize(options: ChunkingOptions = {}): number {
  const chunkSize = options.chunkSize ?? DEFAULT_CHUNK_SIZE;
  if (!Number.isSafeInteger(chunkSize) || chunkSize <= 0) {
    throw new RangeError(
      `chunkSize must be a positive integer, got ${chunkSize}`,
    );
  }
  return chunkSize;
}
