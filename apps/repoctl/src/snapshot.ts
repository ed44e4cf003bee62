import { mkdirSync, readFileSync } from "fs";
import yaml from "js-yaml";

import { TargetsFileError, UnknownStyleError, errorMessage } from "./errors.js";
import type { Output } from "./output.js";
import {
  PRESET_TARGETS,
  TargetsFile,
  buildCommands,
  isPresetName,
  pgDumpCommand,
  type PresetName,
  type Target,
  type Targets,
} from "./pgdump.js";
import { shellArg } from "./shell.js";

// ---------- templates ----------
export type BuilderStyle = "direct" | "container-exec" | "orchestrator-exec";

type Template<S extends BuilderStyle, P extends PresetName> = {
  style: S;
  /** preset used when --targets=auto */
  preset: P;
  render: (t: Target) => string;
};

export type CommandTemplate =
  | Template<"direct", "local">
  | Template<"container-exec", "docker">
  | Template<"orchestrator-exec", "k8s">;

const TEMPLATES: { [S in BuilderStyle]: Extract<CommandTemplate, { style: S }> } = {
  direct: {
    style: "direct",
    preset: "local",
    render: (t) => (t.target ? `${pgDumpCommand(t)} --host=${shellArg(t.target)}` : pgDumpCommand(t)),
  },
  "container-exec": {
    style: "container-exec",
    preset: "docker",
    render: (t) => `docker exec -it ${shellArg(t.target)} sh -c '${pgDumpCommand(t)}'`,
  },
  "orchestrator-exec": {
    style: "orchestrator-exec",
    preset: "k8s",
    render: (t) => `kubectl exec -it ${shellArg(t.target)} -- bash -c '${pgDumpCommand(t)}'`,
  },
};

export function parseBuilderStyle(builder: string): BuilderStyle {
  switch (builder) {
    case "":
    case "pg_dump":
      return "direct";
    case "docker":
      return "container-exec";
    case "kubectl":
      return "orchestrator-exec";
    default:
      throw new UnknownStyleError(builder);
  }
}

export function selectTemplate(builder: string): CommandTemplate {
  return TEMPLATES[parseBuilderStyle(builder)];
}

// ---------- targets ----------
export type TargetsSource = { kind: "preset"; name: PresetName } | { kind: "file"; path: string };

export function targetsSource(selector: string, template: CommandTemplate): TargetsSource {
  const key = selector === "auto" ? template.preset : selector;
  if (isPresetName(key)) return { kind: "preset", name: key };
  return { kind: "file", path: key };
}

export function loadTargets(source: TargetsSource): Targets {
  if (source.kind === "preset") return PRESET_TARGETS[source.name];

  let raw: string;
  try {
    raw = readFileSync(source.path, "utf-8");
  } catch (e) {
    throw new TargetsFileError(source.path, e);
  }

  let doc: unknown;
  try {
    doc = yaml.load(raw, { schema: yaml.FAILSAFE_SCHEMA });
  } catch (e) {
    throw new TargetsFileError(source.path, e);
  }

  const parsed = TargetsFile.safeParse(doc);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length ? `${issue.path.join(".")}: ` : "";
    throw new TargetsFileError(source.path, new Error(`${where}${issue?.message ?? "invalid document"}`));
  }
  return parsed.data;
}

// ---------- command ----------
/** Creates the snapshot directory; a failure is reported and does not stop rendering. */
export function ensureSnapshotDir(dir: string, out: Output): boolean {
  try {
    mkdirSync(dir, { recursive: true });
    return true;
  } catch (e) {
    out.warn(`Could not create snapshot directory ${JSON.stringify(dir)}: ${errorMessage(e)}`);
    return false;
  }
}

export type SnapshotOptions = {
  builder: string;
  targets: string;
  outDir: string;
  out: Output;
};

/**
 * Resolves style and targets, renders the three dump commands and prints them.
 * Nothing is executed; the same inputs always render the same commands.
 */
export function snapshotDatabases({ builder, targets: selector, outDir, out }: SnapshotOptions): string[] {
  const template = selectTemplate(builder);
  out.debug(`Template: ${template.style}`);

  const source = targetsSource(selector, template);
  if (source.kind === "file") {
    out.info(`Using targets defined in targets file ${JSON.stringify(source.path)}`);
  } else {
    out.info(`Using predefined targets for ${source.name} environments`);
  }

  const commands = buildCommands(outDir, template.render, loadTargets(source));

  ensureSnapshotDir(outDir, out);

  out.block("Run these commands to generate the required database dumps:", ["", ...commands]);
  out.suggestion("Note that you may need to do some additional setup, such as authentication, beforehand.");

  return commands;
}
