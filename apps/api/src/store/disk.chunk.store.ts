// src/store/disk.chunk.store.ts

import fs from "fs/promises";
import path from "path";
import crypto from "crypto";

import { compareChunkRefs, type ChunkRef, type ChunkStore } from "./chunk.store.js";
import {
  ChunkNotFoundError,
  toStorageError,
} from "../services/upload/upload.errors.js";

const UPLOAD_DIR_PATTERN =
  /^[0-9a-f]{8}-[0-9a-f]{4}-[1-5][0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

const CHUNK_FILE_PATTERN = /^(\d+)\.([\w-]+)$/;
const WRITE_ID_PATTERN = /^[\w-]+$/;

function isErrnoCode(err: unknown, code: string): boolean {
  return err instanceof Error && "code" in err && err.code === code;
}

/**
 * One directory per upload under `baseDir`, one file per chunk write
 * named `<index>.<writeId>`. Writes land in a temp file that is renamed
 * into place, so a reader sees either nothing or the whole chunk.
 */
export class DiskChunkStore implements ChunkStore {
  constructor(private readonly baseDir: string) {}

  private dir(uploadId: string) {
    return path.join(this.baseDir, uploadId);
  }

  private chunkPath(uploadId: string, chunk: ChunkRef) {
    if (!WRITE_ID_PATTERN.test(chunk.writeId)) {
      throw new Error(`INVALID_WRITE_ID ${chunk.writeId}`);
    }
    return path.join(this.dir(uploadId), `${chunk.index}.${chunk.writeId}`);
  }

  async writeChunk(uploadId: string, chunk: ChunkRef, bytes: Uint8Array): Promise<void> {
    const finalPath = this.chunkPath(uploadId, chunk);
    const tempPath = `${finalPath}.${crypto.randomUUID()}.tmp`;

    try {
      await fs.mkdir(this.dir(uploadId), { recursive: true });
      await fs.writeFile(tempPath, bytes, { flag: "wx" });
      await fs.rename(tempPath, finalPath);
    } catch (err) {
      await fs.rm(tempPath, { force: true }).catch(() => undefined);
      throw toStorageError(err, `CHUNK_WRITE_FAILED ${uploadId}/${chunk.index}`);
    }
  }

  async readChunk(uploadId: string, chunk: ChunkRef): Promise<Buffer> {
    try {
      return await fs.readFile(this.chunkPath(uploadId, chunk));
    } catch (err) {
      if (isErrnoCode(err, "ENOENT")) {
        throw new ChunkNotFoundError(uploadId, chunk.index);
      }
      throw toStorageError(err, `CHUNK_READ_FAILED ${uploadId}/${chunk.index}`);
    }
  }

  async deleteChunk(uploadId: string, chunk: ChunkRef): Promise<void> {
    try {
      await fs.rm(this.chunkPath(uploadId, chunk), { force: true });
    } catch (err) {
      throw toStorageError(err, `CHUNK_DELETE_FAILED ${uploadId}/${chunk.index}`);
    }
  }

  async listChunks(uploadId: string): Promise<ChunkRef[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.dir(uploadId));
    } catch (err) {
      if (isErrnoCode(err, "ENOENT")) return [];
      throw toStorageError(err, `CHUNK_LIST_FAILED ${uploadId}`);
    }

    const chunks: ChunkRef[] = [];
    for (const name of names) {
      const match = CHUNK_FILE_PATTERN.exec(name);
      if (match) chunks.push({ index: Number(match[1]), writeId: match[2] });
    }
    return chunks.sort(compareChunkRefs);
  }

  async listUploads(): Promise<string[]> {
    let entries;
    try {
      entries = await fs.readdir(this.baseDir, { withFileTypes: true });
    } catch (err) {
      if (isErrnoCode(err, "ENOENT")) return [];
      throw toStorageError(err, "CHUNK_STORE_LIST_FAILED");
    }

    return entries
      .filter((entry) => entry.isDirectory() && UPLOAD_DIR_PATTERN.test(entry.name))
      .map((entry) => entry.name);
  }

  async cleanup(uploadId: string): Promise<void> {
    try {
      await fs.rm(this.dir(uploadId), { recursive: true, force: true });
    } catch (err) {
      throw toStorageError(err, `CHUNK_CLEANUP_FAILED ${uploadId}`);
    }
  }
}
