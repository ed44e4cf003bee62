import { Command } from "commander";

import { GraphQLClient, addApiOptions, apiFlagsFrom, type ApiFlags, type GraphQLRequester } from "./api.js";
import { extraHeaders, loadEnv, loadSnapshotEnv, type Env } from "./env.js";
import { errorMessage } from "./errors.js";
import { addKeyValuePair, unset, type Flag } from "./kvp.js";
import { Output } from "./output.js";
import { snapshotDatabases } from "./snapshot.js";

const ADD_KVP_USAGE = `
Examples:

  Add a key-value pair to a repository:

    $ repoctl repos add-kvp --repo=repoID --key=mykey --value=myvalue

  Omitting --value will create a tag (a key with a null value).
`;

const SNAPSHOT_USAGE = `
'repoctl snapshot databases' generates commands to export database dumps.
Note that these commands are intended for use as reference - you may need to
adjust the commands for your deployment.

TARGETS FILES
  Predefined targets are available based on default configurations ('local', 'docker', 'k8s').
  Custom targets configuration can be provided in YAML format with '--targets=targets.yaml', e.g.

    primary:
      target: ...   # the DSN of the database deployment, e.g. in docker, the name of the database container
      dbname: ...   # name of database
      username: ... # username for database access
      password: ... # password for database access - only include password if it is non-sensitive
    codeintel:
      # same as above
    codeinsights:
      # same as above
`;

export type ProgramDeps = {
  out: Output;
  /** raw variables; each command validates only what it reads */
  env: () => NodeJS.ProcessEnv;
  makeClient: (flags: ApiFlags, env: Env, out: Output) => GraphQLRequester;
  setExitCode: (code: number) => void;
};

type GlobalOptions = { verbose: boolean };
type AddKvpOptions = Partial<ApiFlags> & { repo: string; key: string; value?: string };
type DatabasesOptions = { targets: string };

export const defaultDeps = (): ProgramDeps => ({
  out: new Output(),
  env: () => process.env,
  makeClient: (flags, env, out) =>
    new GraphQLClient({
      endpoint: env.SRC_ENDPOINT,
      accessToken: env.SRC_ACCESS_TOKEN,
      headers: extraHeaders(),
      timeoutMs: env.REPOCTL_HTTP_TIMEOUT_MS,
      flags,
      out,
    }),
  setExitCode: (code) => {
    process.exitCode = code;
  },
});

/** Reads a string option only when it was given on the command line, not from its default. */
function cliFlag(cmd: Command, name: string): Flag<string> {
  const value: unknown = cmd.getOptionValue(name);
  if (cmd.getOptionValueSource(name) !== "cli" || typeof value !== "string") return unset;
  return { set: true, value };
}

export function createProgram(deps: ProgramDeps = defaultDeps()): Command {
  const { out } = deps;

  const fail = (e: unknown) => {
    out.error(errorMessage(e));
    if (out.isVerbose && e instanceof Error && e.stack) out.debug(e.stack);
    deps.setExitCode(1);
  };

  const program = new Command();
  program
    .name("repoctl")
    .description("repository metadata and database snapshot helper")
    .version("0.1.0")
    .option("-v, --verbose", "print debug output", false)
    .hook("preAction", (thisCommand) => {
      out.setVerbose(thisCommand.opts<GlobalOptions>().verbose);
    });

  // ---------- repos ----------
  const repos = program.command("repos").description("manage repositories");

  addApiOptions(
    repos
      .command("add-kvp")
      .description("add a key-value pair to a repository")
      .option("--repo <id>", "The ID of the repo to add the key-value pair to (required)", "")
      .option("--key <key>", "The name of the key to add (required)", "")
      .option("--value <value>", "The value associated with the key. Defaults to null.")
  )
    .addHelpText("after", ADD_KVP_USAGE)
    .action(async (opts: AddKvpOptions, cmd: Command) => {
      try {
        const flags = apiFlagsFrom(opts);
        const confirmation = await addKeyValuePair(
          { repo: opts.repo, key: cliFlag(cmd, "key"), value: cliFlag(cmd, "value") },
          () => deps.makeClient(flags, loadEnv(deps.env()), out)
        );
        if (confirmation !== null) out.writeLine(confirmation);
      } catch (e) {
        fail(e);
      }
    });

  // ---------- snapshot ----------
  const snapshot = program.command("snapshot").description("generate commands for snapshotting deployments");

  snapshot
    .command("databases")
    .description("generate commands to export database dumps")
    .argument("[builder]", "pg_dump | docker | kubectl", "")
    .option("--targets <targets>", "predefined targets ('local', 'docker' or 'k8s'), or a custom targets.yaml file", "auto")
    .addHelpText("after", SNAPSHOT_USAGE)
    .action((builder: string, opts: DatabasesOptions) => {
      try {
        const { REPOCTL_SNAPSHOT_DIR: outDir } = loadSnapshotEnv(deps.env());
        snapshotDatabases({ builder, targets: opts.targets, outDir, out });
      } catch (e) {
        fail(e);
      }
    });

  return program;
}
