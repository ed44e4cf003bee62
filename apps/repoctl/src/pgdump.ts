import path from "path";
import { z } from "zod";

import { shellArg } from "./shell.js";

// ---------- types ----------
export type Target = {
  /** container name, statefulset, or host; empty means local/default */
  target: string;
  dbName: string;
  username: string;
  /** only non-sensitive passwords belong here, they end up in the printed command */
  password: string;
};

export type Targets = {
  primary: Target;
  codeIntel: Target;
  codeInsights: Target;
};

export type CommandBuilder = (t: Target) => string;

// ---------- targets file ----------
// Files are read with the failsafe schema, so every scalar is its source text.
const NULL_SCALARS = new Set(["", "~", "null", "Null", "NULL"]);

const field = z.preprocess(
  (v) => v ?? "",
  z.string().transform((s) => (NULL_SCALARS.has(s) ? "" : s))
);

const TargetEntry = z
  .preprocess((v) => v ?? {}, z.object({ target: field, dbname: field, username: field, password: field }))
  .transform((e): Target => ({ target: e.target, dbName: e.dbname, username: e.username, password: e.password }));

/** YAML shape: `primary`, `codeintel`, `codeinsights`, each with target/dbname/username/password. */
export const TargetsFile = z
  .object({ primary: TargetEntry, codeintel: TargetEntry, codeinsights: TargetEntry })
  .transform((f): Targets => ({ primary: f.primary, codeIntel: f.codeintel, codeInsights: f.codeinsights }));

// ---------- presets ----------
export type PresetName = "local" | "docker" | "k8s";

const sg = { dbName: "sg", username: "sg", password: "sg" };
const insights = { dbName: "postgres", username: "postgres", password: "password" };

// Default credentials of stock deployments.
export const PRESET_TARGETS: Record<PresetName, Targets> = {
  local: {
    primary: { target: "", ...sg },
    codeIntel: { target: "", ...sg },
    codeInsights: { target: "", ...insights },
  },
  docker: {
    primary: { target: "pgsql", ...sg },
    codeIntel: { target: "codeintel-db", ...sg },
    codeInsights: { target: "codeinsights-db", ...insights },
  },
  k8s: {
    primary: { target: "statefulset/pgsql", ...sg },
    codeIntel: { target: "statefulset/codeintel-db", ...sg },
    codeInsights: { target: "statefulset/codeinsights-db", ...insights },
  },
};

export function isPresetName(name: string): name is PresetName {
  return Object.hasOwn(PRESET_TARGETS, name);
}

// ---------- commands ----------
export function pgDumpCommand(t: Target): string {
  const dump = `pg_dump --no-owner --format=p --no-acl --clean --if-exists --username=${t.username} --dbname=${t.dbName}`;
  if (!t.password) return dump;
  return `PGPASSWORD=${t.password} ${dump}`;
}

/**
 * One command per database, in the order primary, codeintel, codeinsights.
 * Output paths are shell-quoted when they need it.
 */
export function buildCommands(outDir: string, builder: CommandBuilder, targets: Targets): string[] {
  const outputs: Array<{ file: string; target: Target }> = [
    { file: "primary.sql", target: targets.primary },
    { file: "codeintel.sql", target: targets.codeIntel },
    { file: "codeinsights.sql", target: targets.codeInsights },
  ];
  return outputs.map(({ file, target }) => `${builder(target)} > ${shellArg(path.join(outDir, file))}`);
}
