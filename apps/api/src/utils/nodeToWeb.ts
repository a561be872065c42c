// src/utils/nodeToWeb.ts

import { Readable } from "stream";
import { ReadableStream } from "stream/web";

/**
 * Pull-based bridge: the source is only read when the consumer asks for
 * more, so a slow consumer holds back the source instead of queueing it.
 */
export function nodeToWeb(stream: Readable): ReadableStream<Uint8Array> {
  const iterator = stream[Symbol.asyncIterator]();

  return new ReadableStream<Uint8Array>({
    async pull(controller) {
      const { value, done } = await iterator.next();
      if (done) {
        controller.close();
      } else if (value instanceof Uint8Array) {
        controller.enqueue(value);
      } else if (typeof value === "string") {
        controller.enqueue(Buffer.from(value));
      } else {
        throw new TypeError("Stream produced a non-binary chunk");
      }
    },
    cancel(reason) {
      stream.destroy(reason instanceof Error ? reason : undefined);
    },
  });
}
