// CHANGE: Define strongly typed domain models for the repository browser.
// WHY: Records, filter state and action messages flow between session, table, presenter and dispatcher.

/**
 * JSON-like value type used for untrusted API payloads without `any` usage.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | undefined
  | JsonValue[]
  | readonly JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Minimal owner reference embedded in a repository by value.
 */
export interface RepositoryOwner {
  readonly login: string;
  readonly avatar_url: string;
  readonly html_url: string;
}

export interface RepositoryLicense {
  readonly key: string;
  readonly name: string;
}

/**
 * Repository as returned by the API client, before annotation.
 *
 * Timestamps are ISO-8601 strings; `null` when GitHub omits them.
 */
export interface RepositoryData {
  readonly id: number;
  readonly name: string;
  readonly full_name: string;
  readonly description: string | null;
  readonly private: boolean;
  readonly fork: boolean;
  readonly language: string | null;
  readonly stargazers_count: number;
  readonly watchers_count: number;
  readonly forks_count: number;
  readonly open_issues_count: number;
  readonly size: number;
  readonly default_branch: string;
  readonly homepage: string | null;
  readonly topics: readonly string[];
  readonly license: RepositoryLicense | null;
  readonly created_at: string | null;
  readonly updated_at: string | null;
  readonly pushed_at: string | null;
  readonly html_url: string;
  readonly clone_url: string;
  readonly ssh_url: string;
  readonly owner: RepositoryOwner;
}

/**
 * Repository Record held by the browser.
 *
 * Invariant: `starred` is set by the loader before the record enters any
 * collection; afterwards only the session writes it, after a successful
 * star/unstar call.
 */
export interface Repository extends RepositoryData {
  starred: boolean;
}

export const FILTER_CATEGORIES = ["all", "starred", "owned", "forked", "has_issues"] as const;

export type FilterCategory = (typeof FILTER_CATEGORIES)[number];

export interface FilterState {
  readonly query: string;
  readonly category: FilterCategory;
}

export const ACTION_KINDS = ["star", "fork", "clone", "open_browser", "issues", "prs", "watch"] as const;

export type ActionKind = (typeof ACTION_KINDS)[number];

/**
 * Request to perform one side-effecting operation on one record.
 */
export interface ActionMessage {
  readonly kind: ActionKind;
  readonly target: Repository;
}

export type NotificationSeverity = "information" | "warning" | "error";

export interface Notification {
  readonly id: number;
  readonly severity: NotificationSeverity;
  readonly message: string;
}

/**
 * Which listing the browser shows for the target account.
 */
export type RepositorySource = "repositories" | "starred";

/**
 * Remote forge operations consumed by the browser.
 *
 * Every method may reject with `AuthenticationError`, `RateLimitError` or `ApiError`.
 */
export interface ForgeClient {
  resolveAuthenticatedLogin(): Promise<string>;
  listRepositories(account: string): Promise<RepositoryData[]>;
  listStarred(account: string): Promise<RepositoryData[]>;
  star(owner: string, name: string): Promise<void>;
  unstar(owner: string, name: string): Promise<void>;
  fork(owner: string, name: string): Promise<RepositoryData>;
  close(): void;
}
