import axios, { AxiosError } from "axios";
import type { AxiosAdapter, AxiosInstance } from "axios";
import { USER_AGENT } from "../config";

/**
 * Create a configured axios instance with browser-like headers.
 * @param timeout - Request timeout in milliseconds
 * @param adapter - Optional transport replacing the built-in http adapter
 */
export function createHttpClient(
  timeout: number,
  adapter?: AxiosAdapter
): AxiosInstance {
  return axios.create({
    timeout,
    headers: {
      Accept:
        "text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,*/*;q=0.8",
      "Accept-Language": "en-US,en;q=0.9",
      "Accept-Encoding": "gzip, deflate, br",
      "User-Agent": USER_AGENT,
    },
    maxRedirects: 5,
    ...(adapter ? { adapter } : {}),
  });
}

/**
 * Sleep for the given number of milliseconds.
 * @param ms - Milliseconds to wait
 */
export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve();
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Extract a human-readable error message from an unknown error.
 * @param err - The caught error
 */
export function getErrorMessage(err: unknown): string {
  if (err instanceof AxiosError) {
    if (err.code === "ECONNABORTED") return "Request timed out";
    if (err.code === "ENOTFOUND")
      return `DNS lookup failed: ${err.config?.url ?? "unknown host"}`;
    if (err.code === "ERR_TLS_CERT_ALTNAME_INVALID")
      return "SSL certificate error";
    if (err.code === "ECONNRESET") return "Connection reset by server";
    if (err.code === "ECONNREFUSED") return "Connection refused";
    if (err.response)
      return `HTTP ${err.response.status}: ${err.response.statusText}`;
    return err.message;
  }
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Extract the HTTP status code from an error, if available.
 * @param err - The caught error
 */
export function getErrorStatus(err: unknown): number | null {
  if (err instanceof AxiosError && err.response) {
    return err.response.status;
  }
  return null;
}

/**
 * Format a duration in milliseconds to a human-readable string like "2m 30s".
 * @param ms - Duration in milliseconds
 */
export function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  if (minutes === 0) return `${seconds}s`;
  return `${minutes}m ${seconds}s`;
}
