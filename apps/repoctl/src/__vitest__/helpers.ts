import axios, { type AxiosAdapter, type RawAxiosResponseHeaders } from "axios";
import { vi } from "vitest";

import { Output } from "../output.js";

export function captureOutput(verbose = false) {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const out = new Output({
    verbose,
    color: false,
    stdout: (s) => stdout.push(s),
    stderr: (s) => stderr.push(s),
  });
  return { out, stdout, stderr };
}

export type StubResponse = {
  status?: number;
  statusText?: string;
  body: string;
  headers?: RawAxiosResponseHeaders;
};

/** axios instance whose adapter answers every request with `response`. */
export function stubHttp(response: StubResponse) {
  const adapter = vi.fn<AxiosAdapter>(async (config) => ({
    data: response.body,
    status: response.status ?? 200,
    statusText: response.statusText ?? "OK",
    headers: response.headers ?? {},
    config,
  }));
  return { adapter, http: axios.create({ adapter }) };
}
