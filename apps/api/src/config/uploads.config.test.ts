import { describe, expect, it } from "vitest";
import path from "path";

import { loadConfig, parseChoiceEnv, parsePositiveIntEnv } from "./uploads.config.js";
import { loadWalrusConfig } from "./walrus.config.js";

describe("parsePositiveIntEnv", () => {
  it("falls back when unset or empty", () => {
    expect(parsePositiveIntEnv({}, "X", 7)).toBe(7);
    expect(parsePositiveIntEnv({ X: "" }, "X", 7)).toBe(7);
  });

  it("rejects malformed values", () => {
    expect(() => parsePositiveIntEnv({ X: "1.5" }, "X", 7)).toThrow("X must be an integer >= 1");
    expect(() => parsePositiveIntEnv({ X: "0" }, "X", 7)).toThrow("X must be an integer >= 1");
    expect(parsePositiveIntEnv({ X: "42" }, "X", 7)).toBe(42);
  });
});

describe("parseChoiceEnv", () => {
  it("accepts only listed values", () => {
    expect(parseChoiceEnv({ B: "memory" }, "B", ["redis", "memory"], "redis")).toBe("memory");
    expect(() => parseChoiceEnv({ B: "sqlite" }, "B", ["redis", "memory"], "redis")).toThrow(
      "B must be one of redis, memory"
    );
  });
});

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({ UPLOAD_TMP_DIR: "/var/tmp/chunkup" });

    expect(config.backends).toEqual({ sessions: "redis", chunks: "disk", artifacts: "disk" });
    expect(config.upload).toEqual({
      tmpDir: path.resolve("/var/tmp/chunkup"),
      artifactDir: path.join(path.resolve("/var/tmp/chunkup"), "artifacts"),
      maxFileSizeBytes: 15 * 1024 * 1024 * 1024,
      maxTotalChunks: 100_000,
      sessionTtlMs: 6 * 60 * 60 * 1000,
      retentionMs: 24 * 60 * 60 * 1000,
      maxCasAttempts: 8,
    });
    expect(config.chunk).toEqual({
      minBytes: 256 * 1024,
      maxBytes: 20 * 1024 * 1024,
      defaultBytes: 2 * 1024 * 1024,
    });
    expect(config.gc.gcIntervalMs).toBe(5 * 60 * 1000);
    expect(config.port).toBe(3000);
    expect(config.production).toBe(false);
  });

  it("requires a temp dir only for disk backends", () => {
    expect(() => loadConfig({})).toThrow("Missing required env: UPLOAD_TMP_DIR");

    const config = loadConfig({
      SESSION_BACKEND: "memory",
      CHUNK_BACKEND: "memory",
      ARTIFACT_BACKEND: "memory",
    });
    expect(config.upload.tmpDir).toBeNull();
    expect(config.upload.artifactDir).toBeNull();
  });

  it("rejects an inverted chunk range", () => {
    expect(() =>
      loadConfig({
        UPLOAD_TMP_DIR: "/var/tmp/chunkup",
        UPLOAD_CHUNK_MIN_BYTES: "2048",
        UPLOAD_CHUNK_MAX_BYTES: "1024",
      })
    ).toThrow("UPLOAD_CHUNK_MIN_BYTES must not exceed UPLOAD_CHUNK_MAX_BYTES");
  });
});

describe("loadWalrusConfig", () => {
  it("requires an http publisher url", () => {
    expect(() => loadWalrusConfig({})).toThrow("Missing required env: WALRUS_PUBLISHER_URL");
    expect(() => loadWalrusConfig({ WALRUS_PUBLISHER_URL: "ftp://x" })).toThrow(
      "WALRUS_PUBLISHER_URL must start with http:// or https://"
    );
  });

  it("trims the trailing slash and caps epochs", () => {
    const config = loadWalrusConfig({ WALRUS_PUBLISHER_URL: "https://publisher.test/" });
    expect(config.publisherUrl).toBe("https://publisher.test");
    expect(config.epochs).toBe(3);

    expect(() =>
      loadWalrusConfig({ WALRUS_PUBLISHER_URL: "https://publisher.test", WALRUS_EPOCHS: "91" })
    ).toThrow("WALRUS_EPOCHS must be <= 90");
  });
});
