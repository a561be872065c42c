// src/store/chunk.store.ts

/**
 * One stored write of a chunk. Every upload attempt gets its own
 * `writeId`, so a re-upload never touches bytes another reader may be
 * using; the session records which write of an index counts.
 */
export interface ChunkRef {
  index: number;
  writeId: string;
}

/**
 * Byte storage for individual chunk writes, keyed by
 * (uploadId, index, writeId). Readers never observe a partially written
 * chunk.
 */
export interface ChunkStore {
  writeChunk(uploadId: string, chunk: ChunkRef, bytes: Uint8Array): Promise<void>;

  /** Throws `ChunkNotFoundError` when nothing is stored under the key. */
  readChunk(uploadId: string, chunk: ChunkRef): Promise<Buffer>;

  /** Missing data is not an error. */
  deleteChunk(uploadId: string, chunk: ChunkRef): Promise<void>;

  /** Sorted by index, then writeId. */
  listChunks(uploadId: string): Promise<ChunkRef[]>;

  /** Upload ids that currently own chunk data. */
  listUploads(): Promise<string[]>;

  /** Releases every chunk of the upload. Missing data is not an error. */
  cleanup(uploadId: string): Promise<void>;
}

export function compareChunkRefs(a: ChunkRef, b: ChunkRef): number {
  if (a.index !== b.index) return a.index - b.index;
  return a.writeId < b.writeId ? -1 : a.writeId > b.writeId ? 1 : 0;
}
