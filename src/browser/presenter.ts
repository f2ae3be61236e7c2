// CHANGE: Build the detail pane and action triggers for the selected record.
// WHY: The star label is derived from the current flag on every render, never cached.

import type { ActionKind, Repository } from "../types.js";
import { formatTimestamp } from "../utils/format.js";

export const DETAIL_PLACEHOLDER = "Select a repository to view details";

export interface DetailField {
  readonly label: string;
  readonly value: string;
}

/**
 * One action trigger; `key` is the keyboard shortcut bound to it.
 */
export interface ActionTrigger {
  readonly kind: ActionKind;
  readonly label: string;
  readonly key: string;
  readonly target: Repository;
}

export type DetailView =
  | { readonly kind: "placeholder"; readonly text: string }
  | {
      readonly kind: "record";
      readonly title: string;
      readonly description: string | undefined;
      readonly fields: readonly DetailField[];
      readonly actions: readonly ActionTrigger[];
    };

/**
 * Keyboard shortcut per action kind, in display order.
 */
export const ACTION_KEYS: ReadonlyArray<readonly [ActionKind, string]> = [
  ["star", "s"],
  ["watch", "w"],
  ["fork", "F"],
  ["clone", "c"],
  ["open_browser", "o"],
  ["issues", "i"],
  ["prs", "p"]
];

function actionLabel(kind: ActionKind, repository: Repository): string {
  switch (kind) {
    case "star":
      return repository.starred ? "Unstar" : "Star";
    case "watch":
      return "Watch/Unwatch";
    case "fork":
      return "Fork";
    case "clone":
      return "Clone URL";
    case "open_browser":
      return "Open in Browser";
    case "issues":
      return "Issues";
    case "prs":
      return "Pull Requests";
  }
}

function yesNo(flag: boolean): string {
  return flag ? "Yes" : "No";
}

/**
 * Build the detail pane for `repository`, or the placeholder when none is selected.
 *
 * Called on every render, so the star label always reflects the current flag.
 */
export function present(repository: Repository | undefined): DetailView {
  if (!repository) {
    return { kind: "placeholder", text: DETAIL_PLACEHOLDER };
  }

  const fields: DetailField[] = [
    { label: "Language", value: repository.language ?? "N/A" },
    { label: "Stars", value: String(repository.stargazers_count) },
    { label: "Forks", value: String(repository.forks_count) },
    { label: "Issues", value: String(repository.open_issues_count) },
    { label: "License", value: repository.license?.name ?? "N/A" },
    { label: "Private", value: yesNo(repository.private) },
    { label: "Fork", value: yesNo(repository.fork) }
  ];
  if (repository.homepage) {
    fields.push({ label: "Homepage", value: repository.homepage });
  }
  fields.push({ label: "Clone URL", value: repository.clone_url }, { label: "HTML URL", value: repository.html_url });

  const timestamps: ReadonlyArray<readonly [string, string | null]> = [
    ["Created", repository.created_at],
    ["Updated", repository.updated_at],
    ["Last Push", repository.pushed_at]
  ];
  for (const [label, value] of timestamps) {
    const formatted = formatTimestamp(value);
    if (formatted) {
      fields.push({ label, value: formatted });
    }
  }

  return {
    kind: "record",
    title: repository.full_name,
    description: repository.description ?? undefined,
    fields,
    actions: ACTION_KEYS.map(([kind, key]) => ({ kind, key, label: actionLabel(kind, repository), target: repository }))
  };
}
