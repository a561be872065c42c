// src/store/artifact.store.ts

export interface StoreArtifactInput {
  uploadId: string;
  filename: string;
  contentType: string;
  sizeBytes: number;
  /** Chunk payloads in ascending index order. */
  chunks: AsyncIterable<Uint8Array>;
}

export interface ArtifactStore {
  /** Persists the concatenated chunks and returns a stable reference. */
  store(input: StoreArtifactInput): Promise<string>;

  /**
   * Removes an artifact that no session will claim. Backends that cannot
   * delete (content-addressed blob stores) resolve without doing anything.
   */
  discard(reference: string): Promise<void>;
}
