import axios, { type AxiosInstance } from "axios";

export const USER_AGENT = "relic-ev/1.0";

export const parseRetryAfter = (header?: string): number | undefined => {
  if (!header) return undefined;
  const secs = Number(header);
  if (!Number.isNaN(secs)) return secs * 1000;
  const when = Date.parse(header);
  return Number.isNaN(when) ? undefined : Math.max(0, when - Date.now());
};

export class RateLimitError extends Error {
  retryAfterMs?: number;
  constructor(message: string, retryAfterMs?: number) {
    super(message);
    this.name = "RateLimitError";
    this.retryAfterMs = retryAfterMs;
  }
}

/**
 * Axios instance with a hard timeout; 429 responses are rethrown as RateLimitError
 * so callers can tell throttling apart from every other failure.
 */
export const createHttpClient = (timeoutMs = 20_000): AxiosInstance => {
  const http = axios.create({
    timeout: timeoutMs,
    headers: { "User-Agent": USER_AGENT },
  });

  http.interceptors.response.use(
    (r) => r,
    (err: unknown) => {
      if (axios.isAxiosError(err) && err.response?.status === 429) {
        const header = err.response.headers["retry-after"];
        throw new RateLimitError(
          "Rate limited",
          parseRetryAfter(typeof header === "string" ? header : undefined),
        );
      }
      throw err;
    },
  );

  return http;
};

/** HTTP status of a failed axios call, if the server answered at all. */
export const statusOf = (error: unknown): number | undefined =>
  axios.isAxiosError(error) ? error.response?.status : undefined;
