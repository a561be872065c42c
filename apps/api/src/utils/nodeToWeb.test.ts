import { describe, expect, it } from "vitest";
import { Readable } from "stream";

import { nodeToWeb } from "./nodeToWeb.js";

const sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

async function readAll(stream: ReturnType<typeof nodeToWeb>): Promise<Buffer[]> {
  const reader = stream.getReader();
  const parts: Buffer[] = [];
  for (;;) {
    const { value, done } = await reader.read();
    if (done) return parts;
    parts.push(Buffer.from(value));
  }
}

describe("nodeToWeb", () => {
  it("passes every chunk through in order", async () => {
    const web = nodeToWeb(Readable.from([Buffer.from("ab"), Buffer.from("cd"), "ef"]));

    const parts = await readAll(web);

    expect(Buffer.concat(parts).toString()).toBe("abcdef");
  });

  it("does not drain the source while nobody reads", async () => {
    let pulled = 0;
    async function* source() {
      for (let i = 0; i < 1000; i++) {
        pulled++;
        yield Buffer.alloc(16, i % 256);
      }
    }

    const web = nodeToWeb(Readable.from(source()));
    await sleep(50);

    expect(pulled).toBeLessThanOrEqual(32);

    const parts = await readAll(web);
    expect(parts).toHaveLength(1000);
    expect(pulled).toBe(1000);
  });

  it("surfaces source errors to the reader", async () => {
    async function* source() {
      yield Buffer.from("a");
      throw new Error("disk gone");
    }

    await expect(readAll(nodeToWeb(Readable.from(source())))).rejects.toThrow("disk gone");
  });
});
