// src/config/uploads.config.ts
import path from "path";

export type Env = Record<string, string | undefined>;

export function parsePositiveIntEnv(
  env: Env,
  name: string,
  fallback: number,
  min = 1
): number {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min) {
    throw new Error(`${name} must be an integer >= ${min}`);
  }
  return n;
}

export function parseChoiceEnv<T extends string>(
  env: Env,
  name: string,
  choices: readonly T[],
  fallback: T
): T {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const match = choices.find((choice) => choice === raw);
  if (!match) {
    throw new Error(`${name} must be one of ${choices.join(", ")}`);
  }
  return match;
}

export type SessionBackend = "redis" | "memory";
export type ChunkBackend = "disk" | "memory";
export type ArtifactBackend = "disk" | "walrus" | "memory";

export interface UploadSettings {
  tmpDir: string | null;
  artifactDir: string | null;
  maxFileSizeBytes: number;
  maxTotalChunks: number;
  sessionTtlMs: number;
  retentionMs: number;
  maxCasAttempts: number;
}

export interface ChunkSettings {
  minBytes: number;
  maxBytes: number;
  defaultBytes: number;
}

export interface GcSettings {
  gcIntervalMs: number;
}

export interface BackendSettings {
  sessions: SessionBackend;
  chunks: ChunkBackend;
  artifacts: ArtifactBackend;
}

export interface AppConfig {
  upload: UploadSettings;
  chunk: ChunkSettings;
  gc: GcSettings;
  backends: BackendSettings;
  port: number;
  production: boolean;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const backends: BackendSettings = {
    sessions: parseChoiceEnv(env, "SESSION_BACKEND", ["redis", "memory"], "redis"),
    chunks: parseChoiceEnv(env, "CHUNK_BACKEND", ["disk", "memory"], "disk"),
    artifacts: parseChoiceEnv(env, "ARTIFACT_BACKEND", ["disk", "walrus", "memory"], "disk"),
  };

  const needsDisk = backends.chunks === "disk" || backends.artifacts === "disk";
  const rawTmpDir = env.UPLOAD_TMP_DIR?.trim();
  if (needsDisk && !rawTmpDir) {
    throw new Error("Missing required env: UPLOAD_TMP_DIR");
  }

  const tmpDir = rawTmpDir ? path.resolve(rawTmpDir) : null;
  const rawArtifactDir = env.UPLOAD_ARTIFACT_DIR?.trim();
  const artifactDir = rawArtifactDir
    ? path.resolve(rawArtifactDir)
    : tmpDir && path.join(tmpDir, "artifacts");

  const chunk: ChunkSettings = {
    minBytes: parsePositiveIntEnv(env, "UPLOAD_CHUNK_MIN_BYTES", 256 * 1024), // 256 KB
    maxBytes: parsePositiveIntEnv(env, "UPLOAD_CHUNK_MAX_BYTES", 20 * 1024 * 1024), // 20 MB
    defaultBytes: parsePositiveIntEnv(env, "UPLOAD_CHUNK_DEFAULT_BYTES", 2 * 1024 * 1024), // 2 MB
  };

  if (chunk.minBytes > chunk.maxBytes) {
    throw new Error("UPLOAD_CHUNK_MIN_BYTES must not exceed UPLOAD_CHUNK_MAX_BYTES");
  }

  return {
    upload: {
      tmpDir,
      artifactDir,
      maxFileSizeBytes: parsePositiveIntEnv(
        env,
        "UPLOAD_MAX_FILE_SIZE_BYTES",
        15 * 1024 * 1024 * 1024 // 15 GB
      ),
      maxTotalChunks: parsePositiveIntEnv(env, "UPLOAD_MAX_TOTAL_CHUNKS", 100_000),
      sessionTtlMs: parsePositiveIntEnv(env, "UPLOAD_SESSION_TTL_MS", 6 * 60 * 60 * 1000), // 6 hours
      retentionMs: parsePositiveIntEnv(env, "UPLOAD_RETENTION_MS", 24 * 60 * 60 * 1000), // 24 hours
      maxCasAttempts: parsePositiveIntEnv(env, "UPLOAD_CAS_MAX_ATTEMPTS", 8),
    },
    chunk,
    gc: {
      gcIntervalMs: parsePositiveIntEnv(env, "UPLOAD_GC_INTERVAL_MS", 5 * 60 * 1000), // 5 minutes
    },
    backends,
    port: parsePositiveIntEnv(env, "PORT", 3000),
    production: env.NODE_ENV === "production",
  };
}
