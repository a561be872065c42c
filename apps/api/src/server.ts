// src/server.ts

import fs from "fs/promises";
import os from "os";
import path from "path";

import { createApp, registerUploadApi } from "./app.js";
import { initRedis } from "./state/client.js";
import { startUploadGc, stopUploadGc } from "./state/gc/upload.gc.scheduler.js";
import { reconcileOrphanUploads } from "./state/gc/upload.gc.reconcile.js";
import { loadConfig, type AppConfig } from "./config/uploads.config.js";
import { loadWalrusConfig } from "./config/walrus.config.js";
import { ChunkUploadEngine } from "./services/upload/upload.engine.js";
import type { SessionRepository } from "./state/session.repository.js";
import { RedisSessionRepository } from "./state/redis.session.repository.js";
import { MemorySessionRepository } from "./state/memory.session.repository.js";
import type { ChunkStore } from "./store/chunk.store.js";
import type { ArtifactStore } from "./store/artifact.store.js";
import { DiskChunkStore } from "./store/disk.chunk.store.js";
import { MemoryChunkStore } from "./store/memory.chunk.store.js";
import { DiskArtifactStore } from "./store/disk.artifact.store.js";
import { MemoryArtifactStore } from "./store/memory.artifact.store.js";
import { WalrusArtifactStore } from "./store/walrus.artifact.store.js";

let config: AppConfig;
try {
  config = loadConfig();
} catch (err) {
  console.error("Invalid configuration:", err);
  process.exit(1);
}

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled promise rejection:", reason);
});

process.on("uncaughtException", (err) => {
  console.error("Uncaught exception:", err);
  process.exit(1);
});

const app = createApp({
  chunk: config.chunk,
  logger: {
    level: config.production ? "info" : "debug",
    redact: {
      paths: ["req.headers.authorization"],
      remove: true,
    },
  },
});

async function validateWritableDir(name: string, dir: string) {
  const home = os.homedir();

  if (!path.isAbsolute(dir)) {
    throw new Error(`${name} must be an absolute path`);
  }
  if (dir === "/" || dir === "/home" || dir === home) {
    throw new Error(`${name} is unsafe: ${dir}`);
  }

  await fs.mkdir(dir, { recursive: true });

  // Fail at start-up rather than on the first chunk or merge.
  const testFile = path.join(dir, `.chunkup_write_test_${process.pid}_${Date.now()}`);
  await fs.writeFile(testFile, "ok");
  await fs.unlink(testFile);
}

function requireDir(name: string, dir: string | null): string {
  if (!dir) throw new Error(`Missing required env: ${name}`);
  return dir;
}

async function createRepository(): Promise<SessionRepository> {
  if (config.backends.sessions === "memory") {
    app.log.warn("Using in-memory session repository; sessions are lost on restart");
    return new MemorySessionRepository();
  }

  const redis = await initRedis();
  app.log.info("Redis initialized");
  return new RedisSessionRepository(redis, app.log);
}

async function createChunkStore(): Promise<ChunkStore> {
  if (config.backends.chunks === "memory") return new MemoryChunkStore();

  const dir = requireDir("UPLOAD_TMP_DIR", config.upload.tmpDir);
  await validateWritableDir("UPLOAD_TMP_DIR", dir);
  return new DiskChunkStore(dir);
}

async function createArtifactStore(): Promise<ArtifactStore> {
  switch (config.backends.artifacts) {
    case "memory":
      return new MemoryArtifactStore();
    case "walrus":
      return new WalrusArtifactStore(loadWalrusConfig(), app.log);
    case "disk": {
      const dir = requireDir("UPLOAD_ARTIFACT_DIR", config.upload.artifactDir);
      await validateWritableDir("UPLOAD_ARTIFACT_DIR", dir);
      return new DiskArtifactStore(dir);
    }
  }
}

let repository: SessionRepository;
let chunkStore: ChunkStore;
let artifactStore: ArtifactStore;

try {
  repository = await createRepository();
  chunkStore = await createChunkStore();
  artifactStore = await createArtifactStore();
} catch (err) {
  app.log.error(err, "Failed to initialize storage backends");
  process.exit(1);
}

const engine = new ChunkUploadEngine({
  repository,
  chunkStore,
  artifactStore,
  log: app.log,
  sessionTtlMs: config.upload.sessionTtlMs,
  maxFileSizeBytes: config.upload.maxFileSizeBytes,
  maxTotalChunks: config.upload.maxTotalChunks,
  maxCasAttempts: config.upload.maxCasAttempts,
});

await reconcileOrphanUploads(app.log, repository, chunkStore);
startUploadGc(engine, app.log, {
  intervalMs: config.gc.gcIntervalMs,
  sessionTtlMs: config.upload.sessionTtlMs,
  retentionMs: config.upload.retentionMs,
});

await registerUploadApi(app, { engine, repository, chunk: config.chunk });

try {
  await app.listen({
    port: config.port,
    host: "0.0.0.0",
  });

  app.log.info(
    {
      port: config.port,
      env: process.env.NODE_ENV ?? "development",
      backends: config.backends,
    },
    "API server started"
  );
} catch (err) {
  app.log.error(err, "Failed to start server");
  process.exit(1);
}

async function shutdown(signal: string) {
  app.log.info({ signal }, "Shutting down server");

  try {
    await stopUploadGc();
    await app.close();
    process.exit(0);
  } catch (err) {
    app.log.error(err, "Shutdown failed");
    process.exit(1);
  }
}

process.on("SIGTERM", () => void shutdown("SIGTERM"));
process.on("SIGINT", () => void shutdown("SIGINT"));
