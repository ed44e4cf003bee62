import * as dotenv from "dotenv";
import { z } from "zod";

import { ConfigError } from "./errors.js";

const HEADER_PREFIX = "SRC_HEADER_";

// `NAME=` in .env counts as unset
const blankAsUnset = (v: unknown) => (v === "" ? undefined : v);

export const Env = z.object({
  SRC_ENDPOINT: z.preprocess(
    blankAsUnset,
    z
      .string()
      .url()
      .default("https://sourcegraph.com")
      .transform((u) => u.replace(/\/+$/, ""))
  ),
  SRC_ACCESS_TOKEN: z.string().optional().default(""),

  REPOCTL_SNAPSHOT_DIR: z.preprocess(blankAsUnset, z.string().default("./src-snapshot")),
  REPOCTL_HTTP_TIMEOUT_MS: z.preprocess(blankAsUnset, z.coerce.number().int().positive().default(30_000)),
});
export type Env = z.infer<typeof Env>;

/** The part of the environment `snapshot databases` reads; it never talks to the API. */
export const SnapshotEnv = Env.pick({ REPOCTL_SNAPSHOT_DIR: true });
export type SnapshotEnv = z.infer<typeof SnapshotEnv>;

// .env from the working directory; real environment wins
export function loadDotenv(): void {
  dotenv.config();
}

function parseEnv<S extends z.ZodTypeAny>(schema: S, raw: NodeJS.ProcessEnv): z.infer<S> {
  const parsed = schema.safeParse(raw);
  if (parsed.success) return parsed.data;
  throw new ConfigError(parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`));
}

export function loadEnv(raw: NodeJS.ProcessEnv = process.env): Env {
  return parseEnv(Env, raw);
}

export function loadSnapshotEnv(raw: NodeJS.ProcessEnv = process.env): SnapshotEnv {
  return parseEnv(SnapshotEnv, raw);
}

/**
 * Extra request headers taken from SRC_HEADER_<NAME> variables.
 * Underscores in the name become dashes: SRC_HEADER_X_FORWARDED_USER=alice
 * yields `X-FORWARDED-USER: alice`.
 */
export function extraHeaders(raw: NodeJS.ProcessEnv = process.env): Record<string, string> {
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(raw)) {
    if (!name.startsWith(HEADER_PREFIX) || value === undefined) continue;
    const header = name.slice(HEADER_PREFIX.length).replace(/_/g, "-");
    if (header) headers[header] = value;
  }
  return headers;
}
