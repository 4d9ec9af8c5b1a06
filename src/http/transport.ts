import { NetworkError } from "../errors.js";

export interface HttpResponse {
  status: number;
  statusText: string;
  body: string;
}

export interface HttpGetOptions {
  timeoutMs?: number;
}

/**
 * The single network seam of the client: perform a GET and hand back the raw body.
 * Implementations reject with NetworkError when no response could be obtained.
 */
export interface HttpTransport {
  get(url: string, options?: HttpGetOptions): Promise<HttpResponse>;
}

function isTimeout(err: unknown): boolean {
  return err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError");
}

export const fetchTransport: HttpTransport = {
  async get(url, options = {}) {
    const signal =
      options.timeoutMs !== undefined ? AbortSignal.timeout(options.timeoutMs) : undefined;

    let response: Response;
    try {
      response = await fetch(url, { method: "GET", signal });
    } catch (err) {
      if (isTimeout(err)) {
        throw new NetworkError(
          `Request to ${url} timed out after ${options.timeoutMs}ms`,
          url,
          { cause: err }
        );
      }
      const reason = err instanceof Error ? err.message : String(err);
      throw new NetworkError(`Request to ${url} failed: ${reason}`, url, { cause: err });
    }

    let body: string;
    try {
      body = await response.text();
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new NetworkError(`Failed reading response from ${url}: ${reason}`, url, {
        cause: err,
      });
    }

    return { status: response.status, statusText: response.statusText, body };
  },
};
