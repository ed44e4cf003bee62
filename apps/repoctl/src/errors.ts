export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/** Environment configuration that failed validation; one `<VAR>: <message>` line per problem. */
export class ConfigError extends Error {
  constructor(public readonly problems: string[]) {
    super(problems.join("\n"));
    this.name = "ConfigError";
  }
}

export class UnknownStyleError extends Error {
  constructor(public readonly style: string) {
    super(`unknown or invalid template type ${JSON.stringify(style)}`);
    this.name = "UnknownStyleError";
  }
}

export class TargetsFileError extends Error {
  constructor(
    public readonly path: string,
    cause: unknown
  ) {
    super(`invalid targets file ${JSON.stringify(path)}: ${errorMessage(cause)}`, { cause });
    this.name = "TargetsFileError";
  }
}

export type GraphQLErrorEntry = { message: string };

export class GraphQLRequestError extends Error {
  public status?: number;
  public errors?: GraphQLErrorEntry[];

  constructor(message: string, details: { status?: number; errors?: GraphQLErrorEntry[]; cause?: unknown } = {}) {
    super(message, { cause: details.cause });
    this.name = "GraphQLRequestError";
    this.status = details.status;
    this.errors = details.errors;
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
