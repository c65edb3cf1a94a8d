/**
 * fetch() with a per-attempt timeout and a bounded retry on transient failures
 * (network error, timeout, 429, 5xx). Non-transient HTTP errors and
 * unparseable bodies are thrown on the first attempt.
 */

import type { CallPolicy } from "../config";

export class HttpStatusError extends Error {
  readonly status: number;

  constructor(status: number, body: string) {
    super(`HTTP ${status}${body ? ` - ${body.slice(0, 200)}` : ""}`);
    this.name = "HttpStatusError";
    this.status = status;
  }
}

function isTransientStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError");
}

export async function fetchJsonWithPolicy(
  url: string,
  init: RequestInit,
  policy: CallPolicy,
  label: string,
): Promise<unknown> {
  const attempts = policy.retries + 1;
  let lastError: unknown = null;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    let response: Response;
    let body: string;
    try {
      response = await fetch(url, {
        ...init,
        signal: AbortSignal.timeout(policy.timeoutMs),
      });
      body = await response.text();
    } catch (error) {
      lastError = isTimeout(error) ? new Error(`timed out after ${policy.timeoutMs}ms`) : error;
      if (attempt < attempts) {
        console.warn(`[${label}] attempt ${attempt}/${attempts} failed, retrying: ${String(lastError)}`);
      }
      continue;
    }

    // Parse errors are not retried.
    if (response.ok) {
      return JSON.parse(body);
    }

    const error = new HttpStatusError(response.status, body);
    if (!isTransientStatus(response.status)) {
      throw error;
    }
    lastError = error;
    if (attempt < attempts) {
      console.warn(`[${label}] attempt ${attempt}/${attempts} failed, retrying: ${String(lastError)}`);
    }
  }

  throw lastError instanceof Error ? lastError : new Error(String(lastError));
}
