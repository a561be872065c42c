// src/store/memory.artifact.store.ts

import type { ArtifactStore, StoreArtifactInput } from "./artifact.store.js";

export class MemoryArtifactStore implements ArtifactStore {
  private readonly artifacts = new Map<string, Buffer>();

  async store(input: StoreArtifactInput): Promise<string> {
    const parts: Buffer[] = [];
    for await (const chunk of input.chunks) {
      parts.push(Buffer.from(chunk));
    }

    const reference = `memory:${input.uploadId}`;
    this.artifacts.set(reference, Buffer.concat(parts));
    return reference;
  }

  async discard(reference: string): Promise<void> {
    this.artifacts.delete(reference);
  }

  get(reference: string): Buffer | undefined {
    return this.artifacts.get(reference);
  }

  get size(): number {
    return this.artifacts.size;
  }
}
