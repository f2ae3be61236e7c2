import { vi } from "vitest";
import type { ForgeClient, Repository } from "../src/types.js";

/**
 * Repository fixture; identity fields derive from `name` and `owner.login`.
 */
export function makeRepository(overrides: Partial<Repository> = {}): Repository {
  const name = overrides.name ?? "repo";
  const login = overrides.owner?.login ?? "octo";
  return {
    id: 1,
    name,
    full_name: `${login}/${name}`,
    description: null,
    private: false,
    fork: false,
    language: null,
    stargazers_count: 0,
    watchers_count: 0,
    forks_count: 0,
    open_issues_count: 0,
    size: 0,
    default_branch: "main",
    homepage: null,
    topics: [],
    license: null,
    created_at: null,
    updated_at: null,
    pushed_at: null,
    html_url: `https://github.com/${login}/${name}`,
    clone_url: `https://github.com/${login}/${name}.git`,
    ssh_url: `git@github.com:${login}/${name}.git`,
    owner: { login, avatar_url: "", html_url: `https://github.com/${login}` },
    starred: false,
    ...overrides
  };
}

/**
 * In-process forge client; the authenticated login is "me" and every listing is empty.
 */
export function createFakeClient() {
  return {
    resolveAuthenticatedLogin: vi.fn<ForgeClient["resolveAuthenticatedLogin"]>().mockResolvedValue("me"),
    listRepositories: vi.fn<ForgeClient["listRepositories"]>().mockResolvedValue([]),
    listStarred: vi.fn<ForgeClient["listStarred"]>().mockResolvedValue([]),
    star: vi.fn<ForgeClient["star"]>().mockResolvedValue(undefined),
    unstar: vi.fn<ForgeClient["unstar"]>().mockResolvedValue(undefined),
    fork: vi.fn<ForgeClient["fork"]>().mockResolvedValue(makeRepository({ owner: { login: "me", avatar_url: "", html_url: "" } })),
    close: vi.fn<ForgeClient["close"]>()
  } satisfies ForgeClient;
}

export interface Deferred<T> {
  readonly promise: Promise<T>;
  readonly resolve: (value: T) => void;
}

export function deferred<T>(): Deferred<T> {
  let settle: (value: T) => void = () => undefined;
  const promise = new Promise<T>(resolve => {
    settle = resolve;
  });
  return { promise, resolve: value => settle(value) };
}
