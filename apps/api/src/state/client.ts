import { Redis } from "@upstash/redis";

let redis: Redis | null = null;

export async function initRedis(env: Record<string, string | undefined> = process.env): Promise<Redis> {
  if (redis) return redis;

  const url = env.UPSTASH_REDIS_REST_URL;
  const token = env.UPSTASH_REDIS_REST_TOKEN;

  if (!url || !token) {
    throw new Error(
      "Upstash Redis env vars missing (UPSTASH_REDIS_REST_URL / UPSTASH_REDIS_REST_TOKEN)"
    );
  }

  const client = new Redis({
    url,
    token,
    // Session records are decoded explicitly; keep raw strings.
    automaticDeserialization: false,
    retry: {
      retries: 3,
      backoff: (attempt) => Math.min(100 * 2 ** attempt, 1000),
    },
  });

  await client.ping();

  redis = client;
  return redis;
}
