export type FailureCode =
  | "invalid_input"
  | "not_found"
  | "conflict"
  | "not_implemented"
  | "upstream"
  | "persistence";

export interface Failure {
  success: false;
  code: FailureCode;
  error: string;
}

export type ServiceResult<T> = ({ success: true } & T) | Failure;

export function failure(code: FailureCode, error: string): Failure {
  return { success: false, code, error };
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function describeNetworkMeta(error: Record<string, unknown>): string {
  const segments: string[] = [];

  for (const key of ["code", "syscall", "address"] as const) {
    const value = error[key];
    if (typeof value === "string") {
      segments.push(`${key}=${value}`);
    }
  }

  const port = error.port;
  if (typeof port === "number" || typeof port === "string") {
    segments.push(`port=${String(port)}`);
  }

  const status = error.status;
  if (typeof status === "number") {
    segments.push(`status=${String(status)}`);
  }

  return segments.join(", ");
}

export function normalizeError(error: unknown): string {
  if (error === undefined || error === null) {
    return "unknown error";
  }

  if (error instanceof AggregateError) {
    const inner = Array.from(error.errors ?? []);
    if (inner.length === 0) {
      return "AggregateError: no inner errors";
    }
    return `AggregateError: ${inner
      .map((item, index) => `#${index + 1} ${normalizeError(item)}`)
      .join(" | ")}`;
  }

  if (error instanceof Error) {
    const message = error.message.trim();
    const meta = isObject(error) ? describeNetworkMeta(error) : "";

    if (message && meta) {
      return `${message} (${meta})`;
    }
    if (message) {
      return message;
    }

    if (error.cause !== undefined && error.cause !== null) {
      const fromCause = normalizeError(error.cause);
      if (fromCause !== "unknown error") {
        return fromCause;
      }
    }

    return meta ? `${error.name || "Error"} (${meta})` : error.name || "UnknownError";
  }

  if (typeof error === "string") {
    return error;
  }

  if (isObject(error)) {
    const meta = describeNetworkMeta(error);
    if (meta) {
      return meta;
    }
    try {
      return JSON.stringify(error);
    } catch {
      return "UnknownObjectError";
    }
  }

  return String(error);
}
