import { afterEach, describe, expect, it, vi } from "vitest";
import type { LoadResult, Loader } from "../src/browser/loader.js";
import { DETAIL_PLACEHOLDER } from "../src/browser/presenter.js";
import { BrowserSession } from "../src/browser/session.js";
import type { SessionPhase, SessionSnapshot } from "../src/browser/session.js";
import { ApiError } from "../src/errors.js";
import { setLogLevel } from "../src/logger.js";
import { createFakeClient, deferred, makeRepository } from "./helpers.js";

const alpha = makeRepository({ name: "alpha", language: "Python", open_issues_count: 2 });
const beta = makeRepository({ name: "beta", language: "Go", fork: true });

function loaded(...repositories: ReturnType<typeof makeRepository>[]): LoadResult {
  return { ok: true, account: "octo", repositories };
}

function starLabel(session: BrowserSession): string | undefined {
  const detail = session.snapshot().detail;
  return detail.kind === "record" ? detail.actions.find(action => action.kind === "star")?.label : undefined;
}

describe("BrowserSession lifecycle", () => {
  it("moves from uninitialized through loading to ready", async () => {
    const client = createFakeClient();
    client.listRepositories.mockResolvedValue([alpha, beta]);
    const session = new BrowserSession({ client });
    expect(session.phase).toBe("uninitialized");

    const loading = session.start();
    expect(session.phase).toBe("loading");
    await loading;

    expect(session.phase).toBe("ready");
    expect(session.fullCollection.map(repo => repo.full_name)).toEqual(["octo/alpha", "octo/beta"]);
    expect(session.filteredCollection.map(repo => repo.full_name)).toEqual(["octo/alpha", "octo/beta"]);
    expect(session.selectedIndex).toBeUndefined();
  });

  it("keeps the prior collection and notifies once when the load fails", async () => {
    const client = createFakeClient();
    client.resolveAuthenticatedLogin.mockRejectedValue(new ApiError("Request failed: getaddrinfo ENOTFOUND"));
    const session = new BrowserSession({ client });

    await session.start();

    expect(session.fullCollection).toEqual([]);
    expect(session.phase).toBe("ready");
    const notifications = session.snapshot().notifications;
    expect(notifications).toHaveLength(1);
    expect(notifications[0]).toMatchObject({
      severity: "error",
      message: "Error loading repositories: Request failed: getaddrinfo ENOTFOUND"
    });
  });

  it("applies only the latest load when an older one resolves last", async () => {
    const first = deferred<LoadResult>();
    const second = deferred<LoadResult>();
    const loader = vi.fn<Loader>().mockReturnValueOnce(first.promise).mockReturnValueOnce(second.promise);
    const session = new BrowserSession({ client: createFakeClient(), loader });

    const firstLoad = session.start();
    const secondLoad = session.refresh();
    second.resolve(loaded(beta));
    await secondLoad;
    expect(session.fullCollection.map(repo => repo.name)).toEqual(["beta"]);

    first.resolve(loaded(alpha));
    await firstLoad;
    expect(session.fullCollection.map(repo => repo.name)).toEqual(["beta"]);
    expect(session.phase).toBe("ready");
    expect(loader).toHaveBeenCalledTimes(2);
  });

  it("stays loading while only a superseded load has finished", async () => {
    const first = deferred<LoadResult>();
    const second = deferred<LoadResult>();
    const loader = vi.fn<Loader>().mockReturnValueOnce(first.promise).mockReturnValueOnce(second.promise);
    const session = new BrowserSession({ client: createFakeClient(), loader });

    const firstLoad = session.start();
    const secondLoad = session.refresh();
    first.resolve(loaded(alpha));
    await firstLoad;
    expect(session.phase).toBe("loading");
    expect(session.fullCollection).toEqual([]);

    second.resolve(loaded(beta));
    await secondLoad;
    expect(session.phase).toBe("ready");
  });

  it("closes the client on quit and discards a load finishing afterwards", async () => {
    const pending = deferred<LoadResult>();
    const client = createFakeClient();
    const session = new BrowserSession({ client, loader: () => pending.promise });

    const load = session.start();
    session.quit();
    session.quit();
    expect(client.close).toHaveBeenCalledTimes(1);
    expect(session.phase).toBe("terminated");

    pending.resolve(loaded(alpha));
    await load;
    expect(session.phase).toBe("terminated");
    expect(session.fullCollection).toEqual([]);
  });

  it("replays the current snapshot to a listener subscribing mid-load", async () => {
    const pending = deferred<LoadResult>();
    const session = new BrowserSession({ client: createFakeClient(), loader: () => pending.promise });
    const load = session.start();
    const phases: SessionPhase[] = [];

    session.subscribe(snapshot => phases.push(snapshot.phase), { replay: true });
    pending.resolve(loaded(alpha));
    await load;

    expect(phases).toEqual(["loading", "ready"]);
  });

  it("announces a refresh", async () => {
    const session = new BrowserSession({ client: createFakeClient(), loader: async () => loaded(alpha) });
    await session.start();
    await session.refresh();
    expect(session.snapshot().notifications.map(notification => notification.message)).toEqual([
      "Refreshing repositories..."
    ]);
  });
});

describe("BrowserSession filtering and selection", () => {
  async function readySession(): Promise<BrowserSession> {
    const session = new BrowserSession({
      client: createFakeClient(),
      loader: async () => loaded(makeRepository({ name: "alpha", language: "Python", open_issues_count: 2 }), beta)
    });
    await session.start();
    return session;
  }

  it("re-filters on query and category changes", async () => {
    const session = await readySession();
    session.setQuery("PYTH");
    expect(session.filteredCollection.map(repo => repo.name)).toEqual(["alpha"]);
    session.setQuery("");
    session.setCategory("forked");
    expect(session.filteredCollection.map(repo => repo.name)).toEqual(["beta"]);
    session.cycleCategory();
    expect(session.snapshot().filter.category).toBe("has_issues");
    expect(session.filteredCollection.map(repo => repo.name)).toEqual(["alpha"]);
  });

  it("clears the selection and detail when the selected record is filtered out", async () => {
    const session = await readySession();
    session.selectRow("octo/beta");
    expect(session.selected?.name).toBe("beta");
    expect(session.snapshot().detail.kind).toBe("record");

    session.setQuery("python");

    expect(session.selectedIndex).toBeUndefined();
    expect(session.snapshot().detail).toEqual({ kind: "placeholder", text: DETAIL_PLACEHOLDER });
  });

  it("clears the search and leaves the search box", async () => {
    const session = await readySession();
    session.focusSearch();
    session.setQuery("go");
    expect(session.snapshot().searchFocused).toBe(true);

    session.clearSearch();

    const snapshot = session.snapshot();
    expect(snapshot.searchFocused).toBe(false);
    expect(snapshot.filter.query).toBe("");
    expect(session.filteredCollection).toHaveLength(2);
  });

  it("shows the empty state when nothing matches", async () => {
    const session = await readySession();
    session.setQuery("nothing-matches");
    expect(session.snapshot().table.kind).toBe("empty");
  });

  it("pushes snapshots to subscribers until they unsubscribe", async () => {
    const session = await readySession();
    const seen: SessionSnapshot[] = [];
    const unsubscribe = session.subscribe(snapshot => seen.push(snapshot));

    session.moveSelection(1);
    unsubscribe();
    session.moveSelection(1);

    expect(seen).toHaveLength(1);
    expect(seen[0]?.table).toMatchObject({ kind: "rows", selectedIndex: 0 });
  });
});

describe("BrowserSession actions", () => {
  afterEach(() => {
    setLogLevel("info");
    vi.restoreAllMocks();
  });

  function starSession() {
    const client = createFakeClient();
    client.listRepositories.mockResolvedValue([makeRepository({ name: "alpha" })]);
    const session = new BrowserSession({ client });
    return { client, session };
  }

  it("flips starred once and relabels the trigger", async () => {
    const { client, session } = starSession();
    await session.start();
    session.moveSelection(1);
    expect(starLabel(session)).toBe("Star");

    await session.trigger("star");

    expect(client.star).toHaveBeenCalledWith("octo", "alpha");
    expect(session.selected?.starred).toBe(true);
    expect(starLabel(session)).toBe("Unstar");
  });

  it("returns to the original value after two quick toggles", async () => {
    const { client, session } = starSession();
    await session.start();
    session.moveSelection(1);

    await Promise.all([session.trigger("star"), session.trigger("star")]);

    expect(client.star).toHaveBeenCalledTimes(1);
    expect(client.unstar).toHaveBeenCalledTimes(1);
    expect(session.selected?.starred).toBe(false);
    expect(starLabel(session)).toBe("Star");
  });

  it("drops an unstarred record from the starred view", async () => {
    const client = createFakeClient();
    const alphaRecord = makeRepository({ name: "alpha" });
    client.listRepositories.mockResolvedValue([alphaRecord]);
    client.listStarred.mockResolvedValue([alphaRecord]);
    const session = new BrowserSession({ client });
    await session.start();
    session.setCategory("starred");
    session.selectRow("octo/alpha");

    await session.trigger("star");

    expect(client.unstar).toHaveBeenCalledTimes(1);
    expect(session.filteredCollection).toEqual([]);
    expect(session.selectedIndex).toBeUndefined();
    expect(session.snapshot().detail.kind).toBe("placeholder");
  });

  it("warns when an action is triggered without a selection", async () => {
    const { client, session } = starSession();
    await session.start();

    await session.trigger("fork");

    expect(client.fork).not.toHaveBeenCalled();
    expect(session.snapshot().notifications.at(-1)).toMatchObject({
      severity: "warning",
      message: "Select a repository first"
    });
  });

  it("ignores an action completing after quit", async () => {
    const { client, session } = starSession();
    const gate = deferred<void>();
    client.star.mockReturnValueOnce(gate.promise);
    await session.start();
    session.moveSelection(1);

    const action = session.trigger("star");
    session.quit();
    gate.resolve(undefined);
    await action;

    expect(session.fullCollection[0]?.starred).toBe(false);
    expect(session.snapshot().notifications).toEqual([]);
  });

  it("traces the action queues still pending at quit", async () => {
    const { client, session } = starSession();
    const gate = deferred<void>();
    client.star.mockReturnValueOnce(gate.promise);
    await session.start();
    session.moveSelection(1);
    setLogLevel("debug");
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);

    const action = session.trigger("star");
    session.quit();
    gate.resolve(undefined);
    await action;

    expect(logSpy).toHaveBeenCalledWith(expect.stringContaining("Session terminated with 1 action queue(s) pending"));
  });

  it("keeps only the most recent notifications", async () => {
    const { session } = starSession();
    await session.start();
    session.moveSelection(1);
    for (let index = 0; index < 7; index += 1) {
      await session.trigger("watch");
    }
    expect(session.snapshot().notifications).toHaveLength(5);
    expect(session.snapshot().notifications.at(-1)?.id).toBe(7);
  });
});
