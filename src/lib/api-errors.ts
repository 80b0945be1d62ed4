import { DurationParseError } from "./duration.ts";

export type RemoteOperation = "get" | "set" | "delete";

export class InvalidInputError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = "InvalidInputError";
    this.issues = issues;
  }
}

export class RemoteStoreError extends Error {
  readonly operation: RemoteOperation;
  readonly key: string;

  constructor(operation: RemoteOperation, key: string, cause?: unknown) {
    const detail = cause instanceof Error ? `: ${cause.message}` : "";
    super(`Remote store ${operation} failed for key '${key}'${detail}`, {
      cause,
    });
    this.name = "RemoteStoreError";
    this.operation = operation;
    this.key = key;
  }
}

type CacheApiError = {
  message: string;
  status: number;
  issues?: string[];
};

export function formatCacheApiError(error: unknown): CacheApiError {
  if (error instanceof DurationParseError) {
    return { message: "Invalid TTL format.", status: 400 };
  }

  if (error instanceof InvalidInputError) {
    return {
      message: error.message,
      status: 400,
      ...(error.issues.length > 0 ? { issues: error.issues } : {}),
    };
  }

  if (error instanceof RemoteStoreError) {
    return { message: "Remote cache store request failed.", status: 502 };
  }

  return { message: "Cache request failed.", status: 500 };
}
