// CHANGE: Implement the GitHub REST client consumed by the browser.
// WHY: Centralises network logic, payload validation and error classification.

import axios, { AxiosInstance, AxiosRequestConfig } from "axios";
import { GITHUB, NET } from "./config.js";
import { ApiError, AuthenticationError, RateLimitError } from "./errors.js";
import { debug } from "./logger.js";
import type { ForgeClient, JsonValue, RepositoryData, RepositoryLicense, RepositoryOwner } from "./types.js";
import { createHttpClient, send } from "./utils/http.js";
import type { HttpResponse } from "./utils/http.js";
import { nextPageUrl, repoPath } from "./utils/url.js";

type JsonRecord = { readonly [key: string]: JsonValue };

function isRecord(value: JsonValue): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringOr<T>(value: JsonValue, fallback: T): string | T {
  return typeof value === "string" ? value : fallback;
}

function numberOr(value: JsonValue, fallback: number): number {
  return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

function toOwner(value: JsonValue): RepositoryOwner | undefined {
  if (!isRecord(value) || typeof value.login !== "string") {
    return undefined;
  }
  return {
    login: value.login,
    avatar_url: stringOr(value.avatar_url, ""),
    html_url: stringOr(value.html_url, `https://github.com/${value.login}`)
  };
}

function toLicense(value: JsonValue): RepositoryLicense | null {
  if (!isRecord(value) || typeof value.name !== "string") {
    return null;
  }
  return { key: stringOr(value.key, ""), name: value.name };
}

/**
 * Validate one repository payload.
 *
 * @param raw - Decoded JSON value.
 * @returns Repository data with defaults for optional fields.
 * @throws ApiError when identity fields or the owner are missing.
 */
export function toRepositoryData(raw: JsonValue): RepositoryData {
  if (!isRecord(raw) || typeof raw.name !== "string" || typeof raw.full_name !== "string") {
    throw new ApiError("Malformed repository payload");
  }
  const owner = toOwner(raw.owner);
  if (!owner) {
    throw new ApiError(`Malformed repository payload for ${raw.full_name}: missing owner`);
  }
  const htmlUrl = stringOr(raw.html_url, `https://github.com/${raw.full_name}`);
  return {
    id: numberOr(raw.id, 0),
    name: raw.name,
    full_name: raw.full_name,
    description: stringOr(raw.description, null),
    private: raw.private === true,
    fork: raw.fork === true,
    language: stringOr(raw.language, null),
    stargazers_count: numberOr(raw.stargazers_count, 0),
    watchers_count: numberOr(raw.watchers_count, 0),
    forks_count: numberOr(raw.forks_count, 0),
    open_issues_count: numberOr(raw.open_issues_count, 0),
    size: numberOr(raw.size, 0),
    default_branch: stringOr(raw.default_branch, "main"),
    homepage: stringOr(raw.homepage, null) || null,
    topics: Array.isArray(raw.topics) ? raw.topics.filter((topic): topic is string => typeof topic === "string") : [],
    license: toLicense(raw.license),
    created_at: stringOr(raw.created_at, null),
    updated_at: stringOr(raw.updated_at, null),
    pushed_at: stringOr(raw.pushed_at, null),
    html_url: htmlUrl,
    clone_url: stringOr(raw.clone_url, `${htmlUrl}.git`),
    ssh_url: stringOr(raw.ssh_url, `git@github.com:${raw.full_name}.git`),
    owner
  };
}

function responseMessage(data: unknown): string | undefined {
  if (typeof data === "string") {
    return data;
  }
  if (typeof data === "object" && data !== null && "message" in data && typeof data.message === "string") {
    return data.message;
  }
  return undefined;
}

/**
 * Map a transport or status failure onto the error taxonomy.
 *
 * @param cause - Value rejected by axios.
 * @returns Classified error; non-axios errors pass through unchanged.
 */
export function classifyError(cause: unknown): Error {
  if (!axios.isAxiosError(cause)) {
    return cause instanceof Error ? cause : new ApiError(String(cause));
  }
  if (cause.code === "ERR_CANCELED") {
    return new ApiError("Request cancelled");
  }
  const response = cause.response;
  if (!response) {
    return new ApiError(`Request failed: ${cause.message}`);
  }
  const status = response.status;
  const message = responseMessage(response.data) ?? cause.message;
  if (status === 401) {
    return new AuthenticationError("Invalid or expired GitHub token");
  }
  const remaining = response.headers["x-ratelimit-remaining"];
  const exhausted = remaining === "0" || remaining === 0 || /rate limit/i.test(message);
  if ((status === 403 || status === 429) && exhausted) {
    return new RateLimitError("GitHub API rate limit exceeded", status);
  }
  if (status === 403) {
    return new ApiError(`Forbidden: ${message}`, status);
  }
  return new ApiError(`API error (${status}): ${message}`, status);
}

/**
 * GitHub REST client with a single abortable transport.
 *
 * Invariant: after `close()` every pending and future request rejects.
 */
export class GitHubClient implements ForgeClient {
  private readonly controller = new AbortController();
  private readonly http: AxiosInstance;
  private readonly perPage: number;
  private viewerLogin: string | undefined;

  constructor(options: { readonly token: string; readonly baseURL?: string; readonly perPage?: number }) {
    this.http = createHttpClient({
      baseURL: options.baseURL ?? GITHUB.API_URL,
      token: options.token,
      signal: this.controller.signal
    });
    this.perPage = Math.min(Math.max(options.perPage ?? NET.PER_PAGE, 1), 100);
  }

  get closed(): boolean {
    return this.controller.signal.aborted;
  }

  private async request<T>(config: AxiosRequestConfig): Promise<HttpResponse<T>> {
    if (this.closed) {
      throw new ApiError("Client is closed");
    }
    try {
      return await send<T>(this.http, config);
    } catch (cause) {
      throw classifyError(cause);
    }
  }

  private async listAll(url: string, params: Record<string, string | number>): Promise<RepositoryData[]> {
    const items: RepositoryData[] = [];
    let next: string | undefined = url;
    let first = true;
    for (let page = 0; next && page < NET.MAX_PAGES; page += 1) {
      const response: HttpResponse<JsonValue> = await this.request<JsonValue>({
        method: "GET",
        url: next,
        params: first ? { ...params, per_page: this.perPage } : undefined
      });
      if (!Array.isArray(response.data)) {
        throw new ApiError(`Malformed listing from ${url}`);
      }
      for (const raw of response.data) {
        items.push(toRepositoryData(raw));
      }
      first = false;
      next = nextPageUrl(response.headers.link);
    }
    if (next) {
      debug(`Listing ${url} truncated after ${NET.MAX_PAGES} pages`);
    }
    debug(`Fetched ${items.length} repositories from ${url}`);
    return items;
  }

  async resolveAuthenticatedLogin(): Promise<string> {
    if (this.viewerLogin) {
      return this.viewerLogin;
    }
    const response = await this.request<JsonValue>({ method: "GET", url: "/user" });
    if (!isRecord(response.data) || typeof response.data.login !== "string") {
      throw new ApiError("Malformed user payload");
    }
    this.viewerLogin = response.data.login;
    return this.viewerLogin;
  }

  /**
   * List repositories owned by `account`; private ones are included when it is the viewer.
   */
  async listRepositories(account: string): Promise<RepositoryData[]> {
    if (this.viewerLogin && this.viewerLogin.toLowerCase() === account.toLowerCase()) {
      return this.listAll("/user/repos", { affiliation: "owner", sort: "updated" });
    }
    return this.listAll(`${repoPath("users", account)}/repos`, { type: "owner", sort: "updated" });
  }

  async listStarred(account: string): Promise<RepositoryData[]> {
    return this.listAll(`${repoPath("users", account)}/starred`, {});
  }

  async star(owner: string, name: string): Promise<void> {
    await this.request<JsonValue>({
      method: "PUT",
      url: repoPath("user", "starred", owner, name),
      headers: { "Content-Length": "0" }
    });
  }

  async unstar(owner: string, name: string): Promise<void> {
    await this.request<JsonValue>({ method: "DELETE", url: repoPath("user", "starred", owner, name) });
  }

  async fork(owner: string, name: string): Promise<RepositoryData> {
    const response = await this.request<JsonValue>({
      method: "POST",
      url: `${repoPath("repos", owner, name)}/forks`,
      data: {}
    });
    return toRepositoryData(response.data);
  }

  /**
   * Abort the transport. Safe to call more than once.
   */
  close(): void {
    if (!this.closed) {
      this.controller.abort();
      debug("GitHub client closed");
    }
  }
}
