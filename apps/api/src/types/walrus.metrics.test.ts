import { describe, expect, it } from "vitest";

import { classifyWalrusError, extractWalrusHttpStatus } from "./walrus.metrics.js";

describe("classifyWalrusError", () => {
  it("maps publisher status codes", () => {
    expect(classifyWalrusError(new Error("WALRUS_UPLOAD_FAILED:429:slow down"))).toBe("rate_limited");
    expect(classifyWalrusError(new Error("WALRUS_UPLOAD_FAILED:403:nope"))).toBe("auth_failed");
    expect(classifyWalrusError(new Error("WALRUS_UPLOAD_FAILED:413:big"))).toBe("client_error");
    expect(classifyWalrusError(new Error("WALRUS_UPLOAD_FAILED:503:busy"))).toBe("server_error");
  });

  it("recognizes timeouts and network failures", () => {
    const abort = new Error("This operation was aborted");
    abort.name = "AbortError";

    expect(classifyWalrusError(abort)).toBe("timeout");
    expect(classifyWalrusError(new Error("connect ECONNREFUSED 127.0.0.1:9"))).toBe("network_error");
    expect(classifyWalrusError(new Error("WALRUS_MISSING_BLOB_ID"))).toBe("invalid_response");
    expect(classifyWalrusError("???")).toBe("unknown_error");
  });
});

describe("extractWalrusHttpStatus", () => {
  it("pulls the status out of a publish failure", () => {
    expect(extractWalrusHttpStatus(new Error("WALRUS_UPLOAD_FAILED:502:bad gateway"))).toBe(502);
    expect(extractWalrusHttpStatus(new Error("other"))).toBeUndefined();
  });
});
