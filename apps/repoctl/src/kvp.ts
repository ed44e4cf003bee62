import { z } from "zod";

import type { GraphQLRequester } from "./api.js";
import { ValidationError } from "./errors.js";

/**
 * A command-line flag whose presence is tracked separately from its value.
 * `--value ""` is `{ set: true, value: "" }`; omitting the flag is `{ set: false }`.
 */
export type Flag<T> = { set: false } | { set: true; value: T };

export const unset: Flag<never> = { set: false };

export function flag<T>(value: T): Flag<T> {
  return { set: true, value };
}

export type AddKvpInput = {
  repo: string;
  key: Flag<string>;
  value: Flag<string>;
};

export type KeyValuePair = {
  repoID: string;
  key: string;
  value: string | null;
};

export const ADD_KVP_MUTATION = `mutation addKVP(
  $repo: ID!,
  $key: String!,
  $value: String,
) {
  addRepoKeyValuePair(
    repo: $repo,
    key: $key,
    value: $value,
  ) {
    alwaysNil
  }
}`;

const AddKvpResponse = z.object({
  addRepoKeyValuePair: z.object({ alwaysNil: z.string().nullable().optional() }).nullable(),
});

export function validateAddKvp(input: AddKvpInput): KeyValuePair {
  if (input.repo === "") throw new ValidationError("error: repo is required");
  if (!input.key.set) throw new ValidationError("error: key is required");
  return {
    repoID: input.repo,
    key: input.key.value,
    value: input.value.set ? input.value.value : null,
  };
}

export function kvpVariables(kvp: KeyValuePair): { repo: string; key: string; value: string | null } {
  return { repo: kvp.repoID, key: kvp.key, value: kvp.value };
}

export function kvpConfirmation(kvp: KeyValuePair): string {
  const shown = kvp.value === null ? "<nil>" : kvp.value;
  return `Key-value pair '${kvp.key}:${shown}' created.`;
}

/**
 * Validates the flags, then sends one addRepoKeyValuePair mutation.
 * The client is only created once validation passed. Returns the
 * confirmation line, or null when the request was not sent (--get-curl).
 */
export async function addKeyValuePair(
  input: AddKvpInput,
  makeClient: () => GraphQLRequester
): Promise<string | null> {
  const kvp = validateAddKvp(input);
  const client = makeClient();

  const res = await client.request(ADD_KVP_MUTATION, kvpVariables(kvp), AddKvpResponse);
  if (!res.sent) return null;

  return kvpConfirmation(kvp);
}
