// CHANGE: Text and category filtering of the repository collection.
// WHY: Output is a subsequence of the input holding the same record references.

import type { FilterCategory, Repository } from "../types.js";

const categoryPredicates: Record<FilterCategory, (repository: Repository) => boolean> = {
  all: () => true,
  starred: repository => repository.starred,
  owned: repository => !repository.fork,
  forked: repository => repository.fork,
  has_issues: repository => repository.open_issues_count > 0
};

export const CATEGORY_LABELS: Record<FilterCategory, string> = {
  all: "All repositories",
  starred: "Starred only",
  owned: "Owned only",
  forked: "Forked only",
  has_issues: "With issues"
};

function matchesQuery(repository: Repository, needle: string): boolean {
  return (
    repository.name.toLowerCase().includes(needle) ||
    (repository.description?.toLowerCase().includes(needle) ?? false) ||
    (repository.language?.toLowerCase().includes(needle) ?? false)
  );
}

/**
 * Apply the text query and category to a collection.
 *
 * Pure and order-preserving: the result holds the same record references, in
 * the same relative order, as `repositories`.
 *
 * @param repositories - Full collection.
 * @param query - Case-insensitive substring matched against name, description or language.
 * @param category - Category predicate AND-ed with the text match.
 */
export function filterRepositories(
  repositories: readonly Repository[],
  query: string,
  category: FilterCategory
): Repository[] {
  const needle = query.toLowerCase();
  const inCategory = categoryPredicates[category];
  return repositories.filter(
    repository => (needle.length === 0 || matchesQuery(repository, needle)) && inCategory(repository)
  );
}
