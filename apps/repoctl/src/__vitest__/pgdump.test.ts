import { describe, it, expect } from "vitest";

import { PRESET_TARGETS, TargetsFile, buildCommands, isPresetName, pgDumpCommand } from "../pgdump.js";

describe("pgDumpCommand", () => {
  it("passes the password through PGPASSWORD", () => {
    expect(pgDumpCommand({ target: "", dbName: "sg", username: "sg", password: "sg" })).toBe(
      "PGPASSWORD=sg pg_dump --no-owner --format=p --no-acl --clean --if-exists --username=sg --dbname=sg"
    );
  });

  it("leaves PGPASSWORD out when there is no password", () => {
    expect(pgDumpCommand({ target: "", dbName: "main", username: "admin", password: "" })).toBe(
      "pg_dump --no-owner --format=p --no-acl --clean --if-exists --username=admin --dbname=main"
    );
  });
});

describe("buildCommands", () => {
  it("renders primary, codeintel and codeinsights in order, each into its own file", () => {
    const commands = buildCommands("snap", (t) => `dump ${t.target}`, PRESET_TARGETS.docker);

    expect(commands).toEqual([
      "dump pgsql > snap/primary.sql",
      "dump codeintel-db > snap/codeintel.sql",
      "dump codeinsights-db > snap/codeinsights.sql",
    ]);
  });

  it("quotes output paths containing spaces", () => {
    const [primary] = buildCommands("my snaps", (t) => `dump ${t.target}`, PRESET_TARGETS.docker);

    expect(primary).toBe("dump pgsql > 'my snaps/primary.sql'");
  });
});

describe("presets", () => {
  it("knows local, docker and k8s only", () => {
    expect(isPresetName("local")).toBe(true);
    expect(isPresetName("docker")).toBe(true);
    expect(isPresetName("k8s")).toBe(true);
    expect(isPresetName("auto")).toBe(false);
    expect(isPresetName("toString")).toBe(false);
  });

  it("uses the stock credentials", () => {
    expect(PRESET_TARGETS.k8s.primary).toEqual({
      target: "statefulset/pgsql",
      dbName: "sg",
      username: "sg",
      password: "sg",
    });
    expect(PRESET_TARGETS.local.codeInsights).toEqual({
      target: "",
      dbName: "postgres",
      username: "postgres",
      password: "password",
    });
  });
});

describe("TargetsFile", () => {
  it("maps file keys onto targets and fills missing fields with empty strings", () => {
    const parsed = TargetsFile.parse({
      primary: { target: "db.internal", dbname: "main", username: "admin", password: "pw" },
      codeintel: { dbname: "codeintel", username: "admin", password: null },
      codeinsights: { dbname: "insights", username: "ins", password: "0123" },
    });

    expect(parsed).toEqual({
      primary: { target: "db.internal", dbName: "main", username: "admin", password: "pw" },
      codeIntel: { target: "", dbName: "codeintel", username: "admin", password: "" },
      codeInsights: { target: "", dbName: "insights", username: "ins", password: "0123" },
    });
  });

  it("treats a missing entry as all-empty", () => {
    const parsed = TargetsFile.parse({ primary: { dbname: "main" }, codeintel: null });

    expect(parsed.codeIntel).toEqual({ target: "", dbName: "", username: "", password: "" });
    expect(parsed.codeInsights).toEqual({ target: "", dbName: "", username: "", password: "" });
  });

  it("reads YAML null spellings as empty", () => {
    const parsed = TargetsFile.parse({
      primary: { target: "~", dbname: "null", username: "NULL", password: "" },
    });

    expect(parsed.primary).toEqual({ target: "", dbName: "", username: "", password: "" });
  });

  it("rejects entries that are not mappings", () => {
    expect(TargetsFile.safeParse({ primary: "pgsql" }).success).toBe(false);
  });
});
