// =============================================================================
// HTTP helpers
// =============================================================================
// Bounded retries around a pluggable fetch. Business code decides what a
// usable response is through the `read` callback; anything it throws counts
// as a failed attempt.

import type { Logger } from "./logger";

export type HttpTransport = (url: string, init: RequestInit) => Promise<Response>;
export type Sleep = (ms: number) => Promise<void>;
export type Clock = () => number;

export type RetryPolicy = {
  /** Attempts after the first one */
  maxRetries: number;
  /** Delay in ms before retry number `attempt` (0-based) */
  backoff: (attempt: number) => number;
};

export type RequestOptions = {
  transport: HttpTransport;
  policy: RetryPolicy;
  timeoutMs: number;
  sleep?: Sleep;
  /** Absolute deadline; no attempt starts after it and none runs past it */
  deadline?: Deadline;
  logger?: Logger;
};

export const defaultTransport: HttpTransport = (url, init) => fetch(url, init);

export const defaultSleep: Sleep = (ms) =>
  new Promise((resolve) => {
    setTimeout(resolve, ms);
  });

export const exponentialBackoff =
  (baseMs: number) =>
  (attempt: number): number =>
    baseMs * 2 ** attempt;

export class Deadline {
  private readonly expiresAt: number;

  constructor(
    budgetMs: number,
    private readonly clock: Clock = Date.now
  ) {
    this.expiresAt = clock() + budgetMs;
  }

  remaining(): number {
    return Math.max(0, this.expiresAt - this.clock());
  }

  expired(): boolean {
    return this.clock() >= this.expiresAt;
  }
}

export class HttpStatusError extends Error {
  constructor(
    public readonly url: string,
    public readonly status: number
  ) {
    super(`Request to ${url} failed with status ${status}`);
    this.name = "HttpStatusError";
  }
}

/**
 * Run a GET with retries. Returns null when every attempt failed or the
 * deadline ran out first.
 */
export async function requestWithRetry<T>(
  url: string,
  headers: Record<string, string>,
  options: RequestOptions,
  read: (response: Response) => Promise<T>
): Promise<T | null> {
  const { transport, policy, deadline, logger } = options;
  const sleep = options.sleep ?? defaultSleep;

  for (let attempt = 0; attempt <= policy.maxRetries; attempt += 1) {
    if (deadline?.expired()) {
      logger?.warn("Deadline reached, giving up", { url, attempt });
      return null;
    }

    const timeoutMs = deadline ? Math.min(options.timeoutMs, deadline.remaining()) : options.timeoutMs;

    try {
      const response = await transport(url, {
        method: "GET",
        headers,
        signal: AbortSignal.timeout(timeoutMs),
      });
      if (!response.ok) {
        // release the connection before retrying
        await response.body?.cancel();
        throw new HttpStatusError(url, response.status);
      }
      return await read(response);
    } catch (error) {
      logger?.warn(`Attempt ${attempt + 1}/${policy.maxRetries + 1} failed`, {
        url,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    if (attempt < policy.maxRetries) {
      const delay = policy.backoff(attempt);
      await sleep(deadline ? Math.min(delay, deadline.remaining()) : delay);
    }
  }

  return null;
}
