// src/store/walrus.artifact.store.ts

import { Readable } from "stream";
import type PQueue from "p-queue";
import type { FastifyBaseLogger } from "fastify";

import type { ArtifactStore, StoreArtifactInput } from "./artifact.store.js";
import type { WalrusConfig } from "../config/walrus.config.js";
import { createWalrusQueue } from "../services/upload/walrus.limiter.js";
import { uploadToWalrusWithMetrics } from "../services/upload/walrus.metrics.js";
import { toStorageError } from "../services/upload/upload.errors.js";

const REFERENCE_PREFIX = "walrus:";

/**
 * Publishes merged uploads as Walrus blobs. Each retry re-iterates
 * `input.chunks`, which re-reads the chunk store from index 0.
 */
export class WalrusArtifactStore implements ArtifactStore {
  private readonly queue: PQueue;

  constructor(
    private readonly config: WalrusConfig,
    private readonly log: FastifyBaseLogger
  ) {
    this.queue = createWalrusQueue(config.queue);
  }

  async store(input: StoreArtifactInput): Promise<string> {
    try {
      const result = await uploadToWalrusWithMetrics(
        {
          uploadId: input.uploadId,
          sizeBytes: input.sizeBytes,
          streamFactory: () => Readable.from(input.chunks),
        },
        { config: this.config, queue: this.queue, log: this.log }
      );

      this.log.info(
        { uploadId: input.uploadId, blobId: result.blobId, endEpoch: result.endEpoch },
        "Walrus blob published"
      );

      return `${REFERENCE_PREFIX}${result.blobId}`;
    } catch (err) {
      throw toStorageError(err, `WALRUS_PUBLISH_FAILED ${input.uploadId}`);
    }
  }

  async discard(reference: string): Promise<void> {
    // Blobs published without a wallet are not deletable; they lapse
    // when their storage epochs run out.
    this.log.warn({ reference }, "Walrus blob left to expire with its epochs");
  }
}
