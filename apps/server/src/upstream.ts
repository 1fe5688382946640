import { UpstreamUnavailableError } from "./errors.js";

/**
 * Reads an HTTP status from a gaxios/fetch style error, if it carries one.
 */
export function upstreamStatusOf(error: unknown): number | undefined {
  if (!error || typeof error !== "object") {
    return undefined;
  }

  if ("response" in error) {
    const response = error.response;
    if (response && typeof response === "object" && "status" in response && typeof response.status === "number") {
      return response.status;
    }
  }

  if ("status" in error && typeof error.status === "number") {
    return error.status;
  }

  return undefined;
}

export async function withTimeout<T>(operation: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(new UpstreamUnavailableError(`${label} timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([operation, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export function toUpstreamError(error: unknown, label: string): UpstreamUnavailableError {
  if (error instanceof UpstreamUnavailableError) {
    return error;
  }

  const status = upstreamStatusOf(error);
  const message = error instanceof Error ? error.message : "unknown error";
  const prefix = status ? `${label} failed (${status})` : `${label} failed`;
  return new UpstreamUnavailableError(`${prefix}: ${message}`, status, error);
}
