// src/store/memory.chunk.store.ts

import { compareChunkRefs, type ChunkRef, type ChunkStore } from "./chunk.store.js";
import { ChunkNotFoundError } from "../services/upload/upload.errors.js";

interface StoredChunk {
  ref: ChunkRef;
  bytes: Buffer;
}

const keyOf = (chunk: ChunkRef) => `${chunk.index}.${chunk.writeId}`;

export class MemoryChunkStore implements ChunkStore {
  private readonly uploads = new Map<string, Map<string, StoredChunk>>();

  async writeChunk(uploadId: string, chunk: ChunkRef, bytes: Uint8Array): Promise<void> {
    let chunks = this.uploads.get(uploadId);
    if (!chunks) {
      chunks = new Map();
      this.uploads.set(uploadId, chunks);
    }
    // Copy so later mutation of the caller's buffer cannot leak in.
    chunks.set(keyOf(chunk), {
      ref: { index: chunk.index, writeId: chunk.writeId },
      bytes: Buffer.from(bytes),
    });
  }

  async readChunk(uploadId: string, chunk: ChunkRef): Promise<Buffer> {
    const stored = this.uploads.get(uploadId)?.get(keyOf(chunk));
    if (!stored) throw new ChunkNotFoundError(uploadId, chunk.index);
    return stored.bytes;
  }

  async deleteChunk(uploadId: string, chunk: ChunkRef): Promise<void> {
    const chunks = this.uploads.get(uploadId);
    if (!chunks) return;
    chunks.delete(keyOf(chunk));
    if (chunks.size === 0) this.uploads.delete(uploadId);
  }

  async listChunks(uploadId: string): Promise<ChunkRef[]> {
    const chunks = this.uploads.get(uploadId);
    if (!chunks) return [];
    return [...chunks.values()]
      .map(({ ref }) => ({ index: ref.index, writeId: ref.writeId }))
      .sort(compareChunkRefs);
  }

  async listUploads(): Promise<string[]> {
    return [...this.uploads.keys()];
  }

  async cleanup(uploadId: string): Promise<void> {
    this.uploads.delete(uploadId);
  }
}
