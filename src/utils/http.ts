// CHANGE: Provide retrying HTTP utilities with concurrency limits.
// WHY: Transient 5xx and connection failures are retried; total parallel requests stay bounded.

import axios, { AxiosInstance, AxiosRequestConfig, AxiosResponse } from "axios";
import pLimit from "p-limit";
import { GITHUB, NET } from "../config.js";
import { debug } from "../logger.js";

const RETRY_ATTEMPTS = 3;
const RETRY_BASE_DELAY_MS = 500;

const concurrencyLimit = pLimit(Math.max(1, NET.CONCURRENCY));

/**
 * Options for a GitHub-bound axios instance.
 *
 * @property signal - Aborts every request made through the instance once fired.
 */
export interface HttpClientOptions {
  readonly baseURL: string;
  readonly token: string;
  readonly signal?: AbortSignal;
}

export interface HttpResponse<T> {
  readonly data: T;
  readonly headers: Record<string, string>;
  readonly status: number;
}

/**
 * Build an axios instance carrying GitHub authentication headers.
 */
export function createHttpClient(options: HttpClientOptions): AxiosInstance {
  return axios.create({
    baseURL: options.baseURL,
    timeout: NET.TIMEOUT,
    maxRedirects: 5,
    signal: options.signal,
    headers: {
      "User-Agent": GITHUB.USER_AGENT,
      Accept: "application/vnd.github+json",
      "X-GitHub-Api-Version": "2022-11-28",
      Authorization: `Bearer ${options.token}`
    }
  });
}

function sleep(delayMs: number): Promise<void> {
  return new Promise(resolve => {
    setTimeout(resolve, delayMs);
  });
}

export function normaliseHeaders(headers: AxiosResponse["headers"]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (Array.isArray(value)) {
      out[key.toLowerCase()] = value.join(", ");
    } else if (typeof value === "string") {
      out[key.toLowerCase()] = value;
    } else if (typeof value === "number") {
      out[key.toLowerCase()] = String(value);
    }
  }
  return out;
}

async function executeWithRetry<T>(operation: () => Promise<AxiosResponse<T>>, attempt: number): Promise<AxiosResponse<T>> {
  try {
    return await operation();
  } catch (error) {
    const nextAttempt = attempt + 1;
    if (!axios.isAxiosError(error) || nextAttempt >= RETRY_ATTEMPTS) {
      throw error;
    }
    const status = error.response?.status;
    const isNetworkIssue = error.code === "ECONNRESET" || error.code === "ETIMEDOUT" || error.code === "ECONNABORTED";
    const isRetryableStatus = typeof status === "number" && status >= 500 && status < 600;
    if (!isNetworkIssue && !isRetryableStatus) {
      throw error;
    }
    const backoff = RETRY_BASE_DELAY_MS * 2 ** attempt;
    debug(`HTTP retry (${nextAttempt}/${RETRY_ATTEMPTS}) after ${backoff}ms for ${error.config?.url ?? "unknown-url"}`);
    await sleep(backoff);
    return executeWithRetry(operation, nextAttempt);
  }
}

/**
 * Perform a request through the shared concurrency limit with retries.
 *
 * @param client - Instance from `createHttpClient`.
 * @param config - Request description; `url` is relative to the instance base URL.
 * @returns Response data, lower-cased headers and status.
 */
export async function send<T>(client: AxiosInstance, config: AxiosRequestConfig): Promise<HttpResponse<T>> {
  const response = await concurrencyLimit(() => executeWithRetry(() => client.request<T>(config), 0));
  return {
    data: response.data,
    headers: normaliseHeaders(response.headers),
    status: response.status
  };
}
