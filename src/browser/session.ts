// CHANGE: Top-level browser controller owning collection, filter and selection state.
// WHY: Every mutation path re-runs filter → table → presenter explicitly; loads are latest-wins by generation.

import { BROWSER } from "../config.js";
import { describeError } from "../errors.js";
import { debug, error as logError } from "../logger.js";
import { openInBrowser } from "../system.js";
import type { Clipboard, UrlOpener } from "../system.js";
import { FILTER_CATEGORIES } from "../types.js";
import type {
  ActionKind,
  ActionMessage,
  FilterCategory,
  FilterState,
  ForgeClient,
  Notification,
  NotificationSeverity,
  Repository,
  RepositorySource
} from "../types.js";
import { ActionDispatcher } from "./dispatcher.js";
import { filterRepositories } from "./filter.js";
import { loadRepositories } from "./loader.js";
import type { Loader } from "./loader.js";
import { present } from "./presenter.js";
import type { DetailView } from "./presenter.js";
import { TableController } from "./table.js";
import type { TableView } from "./table.js";

export type SessionPhase = "uninitialized" | "loading" | "ready" | "terminated";

/**
 * Immutable view of the session handed to renderers.
 */
export interface SessionSnapshot {
  readonly phase: SessionPhase;
  readonly title: string;
  readonly subtitle: string;
  readonly filter: FilterState;
  readonly total: number;
  readonly table: TableView;
  readonly detail: DetailView;
  readonly searchFocused: boolean;
  readonly notifications: readonly Notification[];
}

export type SessionListener = (snapshot: SessionSnapshot) => void;

/**
 * Construction options.
 *
 * @property account - Target login; the authenticated user when absent.
 * @property loader - Replaces the default loader (tests use controllable fakes).
 * @property clipboard - Clipboard for the clone action; absent means unavailable.
 */
export interface BrowserSessionOptions {
  readonly client: ForgeClient;
  readonly account?: string;
  readonly source?: RepositorySource;
  readonly loader?: Loader;
  readonly clipboard?: Clipboard;
  readonly openUrl?: UrlOpener;
}

export class BrowserSession {
  private readonly client: ForgeClient;
  private readonly account: string | undefined;
  private readonly source: RepositorySource;
  private readonly loader: Loader;
  private readonly dispatcher: ActionDispatcher;
  private readonly table = new TableController();
  private readonly listeners = new Set<SessionListener>();

  private phaseValue: SessionPhase = "uninitialized";
  private generation = 0;
  private repositories: Repository[] = [];
  private filter: FilterState = { query: "", category: "all" };
  private detail: DetailView = present(undefined);
  private searchFocused = false;
  private notifications: Notification[] = [];
  private notificationId = 0;

  constructor(options: BrowserSessionOptions) {
    this.client = options.client;
    this.account = options.account;
    this.source = options.source ?? "repositories";
    this.loader = options.loader ?? loadRepositories;
    this.dispatcher = new ActionDispatcher({
      client: options.client,
      clipboard: options.clipboard,
      openUrl: options.openUrl ?? openInBrowser,
      notify: (severity, message) => this.notify(severity, message),
      reconcileStarred: (target, starred) => this.reconcileStarred(target, starred)
    });
    this.recompute(false);
  }

  get phase(): SessionPhase {
    return this.phaseValue;
  }

  get fullCollection(): readonly Repository[] {
    return this.repositories;
  }

  get filteredCollection(): readonly Repository[] {
    return this.table.items;
  }

  get selectedIndex(): number | undefined {
    return this.table.selectedIndex;
  }

  get selected(): Repository | undefined {
    return this.table.selected;
  }

  snapshot(): SessionSnapshot {
    const starredMode = this.source === "starred";
    const subtitle = this.account
      ? `${starredMode ? "Starred by" : "User"}: ${this.account}`
      : starredMode
        ? "Your Starred Repositories"
        : "All Repositories";
    return {
      phase: this.phaseValue,
      title: starredMode ? "Starred Repositories Browser" : "Repository Browser",
      subtitle,
      filter: this.filter,
      total: this.repositories.length,
      table: this.table.view(),
      detail: this.detail,
      searchFocused: this.searchFocused,
      notifications: this.notifications
    };
  }

  /**
   * Register a listener called after every state change.
   *
   * @param options.replay - Also call the listener once with the current snapshot.
   * @returns Function removing the listener.
   */
  subscribe(listener: SessionListener, options: { readonly replay?: boolean } = {}): () => void {
    this.listeners.add(listener);
    if (options.replay === true) {
      listener(this.snapshot());
    }
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Mount: `uninitialized → loading`. Later calls are no-ops.
   */
  start(): Promise<void> {
    if (this.phaseValue !== "uninitialized") {
      return Promise.resolve();
    }
    return this.load();
  }

  /**
   * Reload the collection, superseding any load still in flight.
   */
  refresh(): Promise<void> {
    if (this.phaseValue === "terminated") {
      return Promise.resolve();
    }
    this.pushNotification("information", "Refreshing repositories...");
    return this.load();
  }

  setQuery(query: string): void {
    if (this.phaseValue === "terminated" || query === this.filter.query) {
      return;
    }
    this.filter = { ...this.filter, query };
    this.recompute();
  }

  setCategory(category: FilterCategory): void {
    if (this.phaseValue === "terminated" || category === this.filter.category) {
      return;
    }
    this.filter = { ...this.filter, category };
    this.recompute();
  }

  cycleCategory(): void {
    const index = FILTER_CATEGORIES.indexOf(this.filter.category);
    this.setCategory(FILTER_CATEGORIES[(index + 1) % FILTER_CATEGORIES.length]);
  }

  focusSearch(): void {
    this.setSearchFocus(true);
  }

  blurSearch(): void {
    this.setSearchFocus(false);
  }

  /**
   * Empty the query and leave the search box.
   */
  clearSearch(): void {
    if (this.phaseValue === "terminated") {
      return;
    }
    this.searchFocused = false;
    this.filter = { ...this.filter, query: "" };
    this.recompute();
  }

  /**
   * Select the row with the given key (a full name).
   */
  selectRow(rowKey: string): void {
    if (this.phaseValue === "terminated") {
      return;
    }
    if (this.table.select(rowKey)) {
      this.renderDetail();
    }
  }

  moveSelection(delta: number): void {
    if (this.phaseValue === "terminated") {
      return;
    }
    this.table.move(delta);
    this.renderDetail();
  }

  /**
   * Dispatch `kind` against the selected record.
   */
  trigger(kind: ActionKind): Promise<void> {
    const target = this.table.selected;
    if (!target) {
      this.notify("warning", "Select a repository first");
      return Promise.resolve();
    }
    return this.dispatch({ kind, target });
  }

  /**
   * Hand a message to the dispatcher and re-render once it completes.
   */
  async dispatch(message: ActionMessage): Promise<void> {
    if (this.phaseValue === "terminated") {
      return;
    }
    await this.dispatcher.dispatch(message);
    if (this.phase !== "terminated") {
      this.recompute();
    }
  }

  /**
   * Terminate the session and release the API client.
   *
   * In-flight loads and actions are abandoned; their results are discarded.
   */
  quit(): void {
    if (this.phaseValue === "terminated") {
      return;
    }
    this.phaseValue = "terminated";
    this.generation += 1;
    try {
      this.client.close();
    } catch (error) {
      logError(`Closing API client failed: ${describeError(error)}`);
    }
    debug(`Session terminated with ${this.dispatcher.inFlight} action queue(s) pending`);
    this.emit();
  }

  private async load(): Promise<void> {
    this.generation += 1;
    const generation = this.generation;
    this.phaseValue = "loading";
    this.emit();

    const result = await this.loader(this.client, { account: this.account, source: this.source });
    if (generation !== this.generation || this.phase === "terminated") {
      debug(`Discarding stale load (generation ${generation}, current ${this.generation})`);
      return;
    }

    this.phaseValue = "ready";
    if (result.ok) {
      this.repositories = result.repositories;
      debug(`Applied load generation ${generation}: ${result.repositories.length} repositories for ${result.account}`);
    } else {
      this.pushNotification("error", `Error loading repositories: ${result.error}`);
    }
    this.recompute();
  }

  private reconcileStarred(target: Repository, starred: boolean): void {
    if (this.phaseValue === "terminated") {
      return;
    }
    target.starred = starred;
    const current = this.repositories.find(repository => repository.full_name === target.full_name);
    if (current && current !== target) {
      current.starred = starred;
    }
    this.recompute();
  }

  private setSearchFocus(focused: boolean): void {
    if (this.phaseValue === "terminated" || this.searchFocused === focused) {
      return;
    }
    this.searchFocused = focused;
    this.emit();
  }

  private notify(severity: NotificationSeverity, message: string): void {
    if (this.phaseValue === "terminated") {
      return;
    }
    this.pushNotification(severity, message);
    this.emit();
  }

  private pushNotification(severity: NotificationSeverity, message: string): void {
    this.notificationId += 1;
    this.notifications = [...this.notifications, { id: this.notificationId, severity, message }].slice(
      -BROWSER.NOTIFICATION_LIMIT
    );
    debug(`Notification (${severity}): ${message}`);
  }

  private recompute(notify = true): void {
    this.table.sync(filterRepositories(this.repositories, this.filter.query, this.filter.category));
    this.detail = present(this.table.selected);
    if (notify) {
      this.emit();
    }
  }

  private renderDetail(): void {
    this.detail = present(this.table.selected);
    this.emit();
  }

  private emit(): void {
    if (this.listeners.size === 0) {
      return;
    }
    const snapshot = this.snapshot();
    for (const listener of this.listeners) {
      listener(snapshot);
    }
  }
}
