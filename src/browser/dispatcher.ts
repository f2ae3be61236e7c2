// CHANGE: Perform repository actions and report their outcome as notifications.
// WHY: A failed call must leave the target record untouched and never escape `dispatch`.

import { describeError } from "../errors.js";
import { debug, error as logError } from "../logger.js";
import type { Clipboard, UrlOpener } from "../system.js";
import type { ActionMessage, ForgeClient, NotificationSeverity, Repository } from "../types.js";

/**
 * Collaborators of the dispatcher.
 *
 * @property clipboard - Absent when no clipboard service exists; clone then shows the URL instead.
 * @property reconcileStarred - Session-owned write of the `starred` flag, called only after a successful call.
 */
export interface DispatcherDeps {
  readonly client: Pick<ForgeClient, "star" | "unstar" | "fork">;
  readonly clipboard?: Clipboard;
  readonly openUrl: UrlOpener;
  readonly notify: (severity: NotificationSeverity, message: string) => void;
  readonly reconcileStarred: (target: Repository, starred: boolean) => void;
}

export class ActionDispatcher {
  private readonly pending = new Map<string, Promise<void>>();

  constructor(private readonly deps: DispatcherDeps) {}

  /**
   * Run one action message.
   *
   * Messages with the same kind and target run one after another, so a second
   * star toggle observes the flag written by the first. Resolves once this
   * message has been handled; never rejects.
   */
  dispatch(message: ActionMessage): Promise<void> {
    const key = `${message.kind}:${message.target.full_name}`;
    const previous = this.pending.get(key) ?? Promise.resolve();
    const next: Promise<void> = previous
      .then(() => this.perform(message))
      .then(() => {
        if (this.pending.get(key) === next) {
          this.pending.delete(key);
        }
      });
    this.pending.set(key, next);
    return next;
  }

  /**
   * Number of action queues with work outstanding.
   */
  get inFlight(): number {
    return this.pending.size;
  }

  private async perform({ kind, target }: ActionMessage): Promise<void> {
    const { notify } = this.deps;
    debug(`Dispatching ${kind} for ${target.full_name}`);
    try {
      switch (kind) {
        case "star":
          await this.toggleStar(target);
          break;
        case "fork": {
          const fork = await this.deps.client.fork(target.owner.login, target.name);
          notify("information", `Forked ${target.full_name} to ${fork.full_name}`);
          break;
        }
        case "clone":
          await this.copyCloneUrl(target);
          break;
        case "open_browser":
          await this.deps.openUrl(target.html_url);
          notify("information", `Opened ${target.full_name} in browser`);
          break;
        case "issues":
          notify("information", `Viewing issues for ${target.full_name} (feature coming soon)`);
          break;
        case "prs":
          notify("information", `Viewing pull requests for ${target.full_name} (feature coming soon)`);
          break;
        case "watch":
          notify("information", `Watch/unwatch for ${target.full_name} (feature coming soon)`);
          break;
      }
    } catch (cause) {
      const message = `Error performing ${kind} on ${target.full_name}: ${describeError(cause)}`;
      logError(message);
      notify("error", message);
    }
  }

  private async toggleStar(target: Repository): Promise<void> {
    const { client, notify, reconcileStarred } = this.deps;
    if (target.starred) {
      await client.unstar(target.owner.login, target.name);
      reconcileStarred(target, false);
      notify("information", `Unstarred ${target.full_name}`);
    } else {
      await client.star(target.owner.login, target.name);
      reconcileStarred(target, true);
      notify("information", `Starred ${target.full_name}`);
    }
  }

  private async copyCloneUrl(target: Repository): Promise<void> {
    const url = target.clone_url;
    const clipboard = this.deps.clipboard;
    if (!clipboard) {
      this.deps.notify("information", `Clone URL: ${url}`);
      return;
    }
    try {
      await clipboard.write(url);
      this.deps.notify("information", `Copied clone URL to clipboard: ${url}`);
    } catch (error) {
      debug(`Clipboard unavailable: ${describeError(error)}`);
      this.deps.notify("information", `Clone URL: ${url}`);
    }
  }
}
