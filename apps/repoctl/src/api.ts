import axios, { type AxiosInstance } from "axios";
import https from "https";
import type { Command } from "commander";
import { z } from "zod";

import { GraphQLRequestError, errorMessage } from "./errors.js";
import type { Output } from "./output.js";
import { shellQuote } from "./shell.js";

// ---------- flags ----------
export type ApiFlags = {
  dumpRequests: boolean;
  getCurl: boolean;
  insecureSkipVerify: boolean;
  trace: boolean;
};

export const defaultApiFlags: ApiFlags = {
  dumpRequests: false,
  getCurl: false,
  insecureSkipVerify: false,
  trace: false,
};

/** Registers the flags shared by every command that talks to the API. */
export function addApiOptions(cmd: Command): Command {
  return cmd
    .option("--dump-requests", "log GraphQL requests and variables before sending", false)
    .option("--get-curl", "print the curl command for the request instead of sending it", false)
    .option("--insecure-skip-verify", "skip validation of TLS certificates", false)
    .option("--trace", "ask the server for a request trace and log its URL", false);
}

export function apiFlagsFrom(opts: Partial<ApiFlags>): ApiFlags {
  return {
    dumpRequests: opts.dumpRequests ?? false,
    getCurl: opts.getCurl ?? false,
    insecureSkipVerify: opts.insecureSkipVerify ?? false,
    trace: opts.trace ?? false,
  };
}

// ---------- client ----------
export type GraphQLVariables = Record<string, unknown>;

export type RequestResult<T> = { sent: false } | { sent: true; data: T };

export interface GraphQLRequester {
  request<S extends z.ZodTypeAny>(
    query: string,
    variables: GraphQLVariables,
    schema: S
  ): Promise<RequestResult<z.infer<S>>>;
}

export type ClientOptions = {
  endpoint: string;
  accessToken?: string;
  headers?: Record<string, string>;
  timeoutMs?: number;
  flags: ApiFlags;
  out: Output;
  http?: AxiosInstance;
};

const GraphQLResponse = z.object({
  data: z.unknown().optional(),
  errors: z.array(z.object({ message: z.string() }).passthrough()).optional().nullable(),
});

export class GraphQLClient implements GraphQLRequester {
  private readonly http: AxiosInstance;

  constructor(private readonly opts: ClientOptions) {
    this.http =
      opts.http ??
      axios.create({
        timeout: opts.timeoutMs ?? 30_000,
        httpsAgent: opts.flags.insecureSkipVerify ? new https.Agent({ rejectUnauthorized: false }) : undefined,
      });
  }

  get url(): string {
    return `${this.opts.endpoint.replace(/\/+$/, "")}/.api/graphql`;
  }

  headers(): Record<string, string> {
    const headers: Record<string, string> = {
      "content-type": "application/json",
      "user-agent": "repoctl/0.1",
      ...this.opts.headers,
    };
    if (this.opts.accessToken) headers["authorization"] = `token ${this.opts.accessToken}`;
    if (this.opts.flags.trace) headers["x-sourcegraph-should-trace"] = "true";
    return headers;
  }

  /** Shell command reproducing the request; the token stays an env reference. */
  curl(query: string, variables: GraphQLVariables): string {
    const parts = ["curl"];
    if (this.opts.accessToken) parts.push(`-H 'Authorization: token $SRC_ACCESS_TOKEN'`);
    for (const [name, value] of Object.entries(this.opts.headers ?? {})) {
      parts.push(`-H ${shellQuote(`${name}: ${value}`)}`);
    }
    parts.push(`-d ${shellQuote(JSON.stringify({ query, variables }))}`);
    parts.push(this.url);
    return parts.join(" \\\n   ");
  }

  async request<S extends z.ZodTypeAny>(
    query: string,
    variables: GraphQLVariables,
    schema: S
  ): Promise<RequestResult<z.infer<S>>> {
    const { out, flags } = this.opts;

    if (flags.getCurl) {
      out.writeLine(this.curl(query, variables));
      return { sent: false };
    }
    if (flags.dumpRequests) {
      out.writeLine(`--- GraphQL request ---\n${query}\n--- variables ---\n${JSON.stringify(variables, null, 2)}`);
    }

    out.debug(`POST ${this.url}`);
    const res = await this.http.post<string>(
      this.url,
      { query, variables },
      { headers: this.headers(), responseType: "text", validateStatus: () => true }
    );

    const trace = res.headers["x-trace"];
    if (flags.trace && typeof trace === "string") out.info(`Trace: ${trace}`);

    if (res.status < 200 || res.status >= 300) {
      throw new GraphQLRequestError(`error: ${res.status} ${res.statusText}\n\n${res.data}`, { status: res.status });
    }

    let body: unknown;
    try {
      body = JSON.parse(res.data);
    } catch (e) {
      throw new GraphQLRequestError(`error: invalid JSON response: ${errorMessage(e)}`, { status: res.status, cause: e });
    }

    const parsed = GraphQLResponse.safeParse(body);
    if (!parsed.success) {
      throw new GraphQLRequestError("error: malformed GraphQL response", { status: res.status, cause: parsed.error });
    }
    const errors = parsed.data.errors ?? [];
    if (errors.length) {
      throw new GraphQLRequestError(errors.map((e) => e.message).join("\n"), { status: res.status, errors });
    }

    const data = schema.safeParse(parsed.data.data);
    if (!data.success) {
      throw new GraphQLRequestError("error: unexpected GraphQL response data", { status: res.status, cause: data.error });
    }
    return { sent: true, data: data.data };
  }
}
