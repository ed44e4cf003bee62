import { describe, it, expect } from "vitest";

import { ConfigError } from "../errors.js";
import { extraHeaders, loadEnv, loadSnapshotEnv } from "../env.js";

describe("loadEnv", () => {
  it("applies defaults", () => {
    expect(loadEnv({})).toEqual({
      SRC_ENDPOINT: "https://sourcegraph.com",
      SRC_ACCESS_TOKEN: "",
      REPOCTL_SNAPSHOT_DIR: "./src-snapshot",
      REPOCTL_HTTP_TIMEOUT_MS: 30000,
    });
  });

  it("strips trailing slashes from the endpoint and coerces the timeout", () => {
    const env = loadEnv({ SRC_ENDPOINT: "https://code.example.test//", REPOCTL_HTTP_TIMEOUT_MS: "5000" });
    expect(env.SRC_ENDPOINT).toBe("https://code.example.test");
    expect(env.REPOCTL_HTTP_TIMEOUT_MS).toBe(5000);
  });

  it("treats blank values as unset", () => {
    const env = loadEnv({ SRC_ENDPOINT: "", REPOCTL_SNAPSHOT_DIR: "", REPOCTL_HTTP_TIMEOUT_MS: "" });
    expect(env.SRC_ENDPOINT).toBe("https://sourcegraph.com");
    expect(env.REPOCTL_SNAPSHOT_DIR).toBe("./src-snapshot");
    expect(env.REPOCTL_HTTP_TIMEOUT_MS).toBe(30000);
  });

  it("names each bad variable on its own line", () => {
    const load = () => loadEnv({ SRC_ENDPOINT: "not a url", REPOCTL_HTTP_TIMEOUT_MS: "soon" });
    expect(load).toThrow(ConfigError);
    expect(load).toThrow("SRC_ENDPOINT: Invalid url\nREPOCTL_HTTP_TIMEOUT_MS: Expected number, received nan");
  });
});

describe("loadSnapshotEnv", () => {
  it("reads only the snapshot directory", () => {
    expect(loadSnapshotEnv({ SRC_ENDPOINT: "not a url", REPOCTL_SNAPSHOT_DIR: "/tmp/snaps" })).toEqual({
      REPOCTL_SNAPSHOT_DIR: "/tmp/snaps",
    });
  });
});

describe("extraHeaders", () => {
  it("turns SRC_HEADER_ variables into headers", () => {
    expect(
      extraHeaders({ SRC_HEADER_X_FORWARDED_USER: "alice", SRC_HEADER_: "ignored", PATH: "/usr/bin" })
    ).toEqual({ "X-FORWARDED-USER": "alice" });
  });
});
