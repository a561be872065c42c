// src/store/disk.artifact.store.ts

import fs from "fs/promises";
import path from "path";
import crypto from "crypto";
import { createWriteStream } from "fs";
import { Readable } from "stream";
import { pipeline } from "stream/promises";

import type { ArtifactStore, StoreArtifactInput } from "./artifact.store.js";
import { toStorageError } from "../services/upload/upload.errors.js";

const REFERENCE_PREFIX = "disk:";

/**
 * Merged files land in `<artifactDir>/<uploadId>.bin`. The bytes are
 * written to a temp file first so a crash never leaves a truncated
 * artifact under the final name.
 */
export class DiskArtifactStore implements ArtifactStore {
  constructor(private readonly artifactDir: string) {}

  resolvePath(reference: string): string {
    if (!reference.startsWith(REFERENCE_PREFIX)) {
      throw new Error(`NOT_A_DISK_REFERENCE: ${reference}`);
    }
    const name = path.basename(reference.slice(REFERENCE_PREFIX.length));
    return path.join(this.artifactDir, name);
  }

  async store(input: StoreArtifactInput): Promise<string> {
    const name = `${input.uploadId}.bin`;
    const finalPath = path.join(this.artifactDir, name);
    const tempPath = `${finalPath}.${crypto.randomUUID()}.tmp`;

    try {
      await fs.mkdir(this.artifactDir, { recursive: true });
      await pipeline(
        Readable.from(input.chunks),
        createWriteStream(tempPath, { flags: "wx" })
      );
      await fs.rename(tempPath, finalPath);
    } catch (err) {
      await fs.rm(tempPath, { force: true }).catch(() => undefined);
      throw toStorageError(err, `ARTIFACT_WRITE_FAILED ${input.uploadId}`);
    }

    return `${REFERENCE_PREFIX}${name}`;
  }

  async discard(reference: string): Promise<void> {
    try {
      await fs.rm(this.resolvePath(reference), { force: true });
    } catch (err) {
      throw toStorageError(err, `ARTIFACT_DISCARD_FAILED ${reference}`);
    }
  }
}
