// CHANGE: Translate key presses into browser commands.
// WHY: Key handling stays testable without a terminal; the view only forwards input.

import type { ActionKind } from "../types.js";
import { ACTION_KEYS } from "./presenter.js";
import type { BrowserSession } from "./session.js";

/**
 * Toolkit-independent key press; Ink's `Key` object satisfies it structurally.
 */
export interface KeyPress {
  readonly ctrl: boolean;
  readonly escape: boolean;
  readonly return: boolean;
  readonly tab: boolean;
  readonly upArrow: boolean;
  readonly downArrow: boolean;
}

export type BrowserCommand =
  | { readonly type: "quit" }
  | { readonly type: "refresh" }
  | { readonly type: "focus-search" }
  | { readonly type: "clear-search" }
  | { readonly type: "blur-search" }
  | { readonly type: "next-category" }
  | { readonly type: "move"; readonly delta: number }
  | { readonly type: "action"; readonly kind: ActionKind };

/**
 * Key hints shown in the footer.
 */
export const FOOTER_HINTS: ReadonlyArray<readonly [string, string]> = [
  ["q", "Quit"],
  ["r", "Refresh"],
  ["f", "Focus Search"],
  ["esc", "Clear Search"],
  ["tab", "Filter"]
];

const actionByKey = new Map<string, ActionKind>(ACTION_KEYS.map(([kind, key]) => [key, kind]));

/**
 * Map a key press to a command.
 *
 * While the search box has focus only escape, enter, ctrl+c and the arrows are
 * bindings; other keys belong to the text input.
 */
export function resolveKey(input: string, key: KeyPress, searchFocused: boolean): BrowserCommand | undefined {
  if (key.ctrl && input === "c") {
    return { type: "quit" };
  }
  if (key.escape) {
    return { type: "clear-search" };
  }
  if (key.upArrow) {
    return { type: "move", delta: -1 };
  }
  if (key.downArrow) {
    return { type: "move", delta: 1 };
  }
  if (searchFocused) {
    return key.return ? { type: "blur-search" } : undefined;
  }
  if (key.tab) {
    return { type: "next-category" };
  }
  switch (input) {
    case "q":
      return { type: "quit" };
    case "r":
      return { type: "refresh" };
    case "f":
    case "/":
      return { type: "focus-search" };
    case "j":
      return { type: "move", delta: 1 };
    case "k":
      return { type: "move", delta: -1 };
  }
  const kind = actionByKey.get(input);
  return kind ? { type: "action", kind } : undefined;
}

/**
 * Run a command against the session; each maps 1:1 to a session method.
 */
export function applyCommand(session: BrowserSession, command: BrowserCommand): Promise<void> {
  switch (command.type) {
    case "quit":
      session.quit();
      break;
    case "refresh":
      return session.refresh();
    case "focus-search":
      session.focusSearch();
      break;
    case "clear-search":
      session.clearSearch();
      break;
    case "blur-search":
      session.blurSearch();
      break;
    case "next-category":
      session.cycleCategory();
      break;
    case "move":
      session.moveSelection(command.delta);
      break;
    case "action":
      return session.trigger(command.kind);
  }
  return Promise.resolve();
}
