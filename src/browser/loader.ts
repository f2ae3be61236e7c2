// CHANGE: Fetch and annotate the repository collection for one session load.
// WHY: Annotation starts only after both listings resolve; failures never yield a partial collection.

import { describeError } from "../errors.js";
import { debug, error as logError } from "../logger.js";
import type { ForgeClient, Repository, RepositoryData, RepositorySource } from "../types.js";

export interface LoadRequest {
  readonly account?: string;
  readonly source: RepositorySource;
}

export type LoadResult =
  | { readonly ok: true; readonly account: string; readonly repositories: Repository[] }
  | { readonly ok: false; readonly error: string };

export type Loader = (client: ForgeClient, request: LoadRequest) => Promise<LoadResult>;

/**
 * Mark each record starred when its full name is in `starred`.
 *
 * @returns New records; the inputs are not modified.
 */
export function annotateStarred(
  repositories: readonly RepositoryData[],
  starred: readonly RepositoryData[]
): Repository[] {
  const starredNames = new Set(starred.map(repository => repository.full_name));
  return repositories.map(repository => ({ ...repository, starred: starredNames.has(repository.full_name) }));
}

/**
 * Load the listing for the requested account.
 *
 * Records are starred from the account's own starred list. Browsing stars
 * needs one call, since every record in that listing is starred.
 *
 * @param client - Forge API client.
 * @param request - Target account (authenticated user when absent) and listing kind.
 * @returns Annotated collection, or the failure cause. Never rejects.
 */
export const loadRepositories: Loader = async (client, request) => {
  try {
    const account = request.account ?? (await client.resolveAuthenticatedLogin());
    debug(`Loading ${request.source} for ${account}`);

    if (request.source === "starred") {
      const listing = await client.listStarred(account);
      return { ok: true, account, repositories: annotateStarred(listing, listing) };
    }

    const [listing, starred] = await Promise.all([client.listRepositories(account), client.listStarred(account)]);
    const repositories = annotateStarred(listing, starred);
    debug(`Loaded ${repositories.length} repositories, ${starred.length} starred by ${account}`);
    return { ok: true, account, repositories };
  } catch (cause) {
    const message = describeError(cause);
    logError(`Repository load failed: ${message}`);
    return { ok: false, error: message };
  }
};
