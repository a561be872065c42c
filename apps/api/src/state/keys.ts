// src/state/keys.ts

const PREFIX = "chunkup:v1";

const key = (suffix: string) => `${PREFIX}:${suffix}`;

export const uploadKeys = {
  // Hash: { version, data } where data is the JSON-encoded session.
  session: (uploadId: string) => key(`upload:${uploadId}:session`),

  // Every upload id with a stored record; the Reaper walks this set.
  index: () => key("upload:index"),
};
