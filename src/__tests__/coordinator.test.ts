import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { Coordinator, type CoordinatorOptions } from "../coordinator.js";
import { NotifyError } from "../errors.js";
import { logger } from "../logger.js";
import { StateStore } from "../store.js";
import type { Check, Issue, Notifier } from "../types.js";
import { RecordingNotifier, T0, deferred, makeIssue, minutesAfter } from "./helpers.js";

const DASHBOARD = "http://127.0.0.1:9845/";

function staticCheck(name: string, issues: Issue[]): Check {
  return { name, run: vi.fn(async () => issues) };
}

function failingCheck(name: string, message: string): Check {
  return {
    name,
    run: vi.fn(async () => {
      throw new Error(message);
    }),
  };
}

describe("Coordinator", () => {
  let store: StateStore;
  let notifier: RecordingNotifier;
  let clock: Date;

  function coordinator(checks: Check[], overrides: Partial<CoordinatorOptions> & { notifier?: Notifier } = {}) {
    const { notifier: n, ...opts } = overrides;
    return new Coordinator(checks, store, n ?? notifier, {
      intervalMs: 10 * 60 * 1000,
      checkTimeoutMs: 1000,
      dashboardUrl: DASHBOARD,
      now: () => clock,
      ...opts,
    });
  }

  beforeEach(() => {
    store = new StateStore(":memory:");
    notifier = new RecordingNotifier();
    clock = T0;
    vi.spyOn(logger, "info").mockImplementation(() => {});
    vi.spyOn(logger, "warn").mockImplementation(() => {});
    vi.spyOn(logger, "debug").mockImplementation(() => {});
  });

  afterEach(() => {
    store.close();
    vi.restoreAllMocks();
  });

  const pr1 = makeIssue("pr:acme/widgets#1", "PrFailingChecks");
  const pr2 = makeIssue("pr:acme/widgets#2:review", "PrAwaitingReview");
  const flag = makeIssue("flag:default/new-checkout:production", "FlagStaleRollout");

  it("starts with an empty snapshot", () => {
    expect(coordinator([]).getSnapshot()).toEqual({
      generatedAt: T0,
      nextCheckAt: null,
      needsAttention: [],
      recentlyReviewed: [],
      errors: [],
    });
  });

  it("publishes the flag issues and one error when the PR check fails", async () => {
    const c = coordinator([failingCheck("github", "gh exploded"), staticCheck("launchdarkly", [flag])]);
    const { snapshot } = await c.runCycle();

    // Listed as throttled: the notification has just gone out.
    expect(snapshot.needsAttention).toEqual([{ ...flag, classification: "Suppressed" }]);
    expect(snapshot.errors).toEqual([{ check: "github", message: "github check failed: gh exploded" }]);
    expect(notifier.calls).toEqual([{ summary: "1 flag waiting", target: DASHBOARD }]);
  });

  it("summarizes PRs and flags in one notification", async () => {
    const c = coordinator([staticCheck("github", [pr1, pr2]), staticCheck("launchdarkly", [flag])]);
    const { notified } = await c.runCycle();
    expect(notifier.calls.map((call) => call.summary)).toEqual(["2 PRs and 1 flag need attention"]);
    expect(notified.map((i) => i.identity)).toEqual([pr1.identity, pr2.identity, flag.identity]);
  });

  it("throttles repeat notifications but keeps throttled issues listed", async () => {
    const c = coordinator([staticCheck("github", [pr1])]);
    await c.runCycle();
    expect(store.getRecord(pr1.identity)?.lastNotifiedAt).toEqual(T0);

    clock = minutesAfter(18);
    const { snapshot, notified } = await c.runCycle();
    expect(notified).toEqual([]);
    expect(notifier.calls).toHaveLength(1);
    expect(snapshot.needsAttention).toEqual([{ ...pr1, classification: "Suppressed" }]);

    clock = minutesAfter(20);
    await c.runCycle();
    expect(notifier.calls).toHaveLength(2);
  });

  it("does not notify when nothing is fresh", async () => {
    store.markSeen(pr1.identity, T0);
    const c = coordinator([staticCheck("github", [pr1])]);
    const { snapshot } = await c.runCycle();
    expect(notifier.calls).toEqual([]);
    expect(snapshot.needsAttention).toEqual([]);
    expect(snapshot.recentlyReviewed).toEqual([{ ...pr1, classification: "SeenRecently" }]);
  });

  it("still publishes when the notifier fails, and does not record a notification", async () => {
    notifier.failWith = new NotifyError("failed to run terminal-notifier: spawn terminal-notifier ENOENT");
    const c = coordinator([staticCheck("github", [pr1])]);
    const { snapshot, notified } = await c.runCycle();

    expect(notified).toEqual([]);
    expect(snapshot.needsAttention).toEqual([{ ...pr1, classification: "Fresh" }]);
    expect(store.getRecord(pr1.identity)?.lastNotifiedAt).toBeUndefined();
    expect(logger.warn).toHaveBeenCalledWith(
      "Notification failed: failed to run terminal-notifier: spawn terminal-notifier ENOENT",
    );
  });

  it("treats a check that times out as failed", async () => {
    const hanging: Check = {
      name: "launchdarkly",
      run: (signal) =>
        new Promise((_, reject) => {
          signal.addEventListener("abort", () => reject(new Error("aborted")));
        }),
    };
    const c = coordinator([staticCheck("github", [pr1]), hanging], { checkTimeoutMs: 20 });
    const { snapshot } = await c.runCycle();
    expect(snapshot.needsAttention.map((i) => i.identity)).toEqual([pr1.identity]);
    expect(snapshot.errors).toEqual([{ check: "launchdarkly", message: "launchdarkly check timed out after 0s" }]);
  });

  it("can run cycles without notifying", async () => {
    const c = coordinator([staticCheck("github", [pr1])], { notify: false });
    const { snapshot } = await c.runCycle();
    expect(notifier.calls).toEqual([]);
    expect(store.getRecord(pr1.identity)?.lastNotifiedAt).toBeUndefined();
    expect(snapshot.needsAttention).toHaveLength(1);
  });

  it("moves an issue to recently reviewed when marked seen, until the window passes", async () => {
    const c = coordinator([staticCheck("github", [pr1, pr2])]);
    await c.runCycle();

    clock = minutesAfter(1);
    const afterSeen = c.markSeen(pr1.identity);
    expect(afterSeen.needsAttention.map((i) => i.identity)).toEqual([pr2.identity]);
    expect(afterSeen.recentlyReviewed.map((i) => i.identity)).toEqual([pr1.identity]);
    expect(c.getSnapshot()).toBe(afterSeen);

    clock = minutesAfter(32);
    const { snapshot, notified } = await c.runCycle();
    expect(notified.map((i) => i.identity)).toEqual([pr1.identity, pr2.identity]);
    expect(snapshot.recentlyReviewed).toEqual([]);
  });

  it("keeps both updates when the dashboard marks an issue seen mid-cycle", async () => {
    const gate = deferred<void>();
    const slowNotifier: Notifier = { notify: vi.fn(() => gate.promise) };
    const c = coordinator([staticCheck("github", [pr1])], { notifier: slowNotifier });

    const cycle = c.runCycle();
    await vi.waitFor(() => expect(slowNotifier.notify).toHaveBeenCalled());

    clock = minutesAfter(1);
    c.markSeen(pr1.identity);
    gate.resolve();
    const { snapshot } = await cycle;

    expect(store.getRecord(pr1.identity)).toMatchObject({ seenAt: minutesAfter(1), lastNotifiedAt: minutesAfter(1) });
    expect(snapshot.recentlyReviewed.map((i) => i.identity)).toEqual([pr1.identity]);
    expect(snapshot.needsAttention).toEqual([]);
  });

  it("joins a cycle that is already running", async () => {
    const check = staticCheck("github", [pr1]);
    const c = coordinator([check]);
    const [a, b] = await Promise.all([c.runCycle(), c.runCycle()]);
    expect(a).toBe(b);
    expect(check.run).toHaveBeenCalledTimes(1);
  });

  it("records the cycle time and prunes long-gone identities", async () => {
    store.observe(["pr:acme/widgets#99"], minutesAfter(-60 * 24 * 8));
    const c = coordinator([staticCheck("github", [pr1])]);
    await c.runCycle();
    expect(store.getMeta("last_check")).toBe(T0.toISOString());
    expect(store.getRecord("pr:acme/widgets#99")).toBeUndefined();
    expect(store.getRecord(pr1.identity)?.lastObservedAt).toEqual(T0);
  });

  it("schedules cycles and reports when the next one is due", async () => {
    const check = staticCheck("github", [pr1]);
    const c = coordinator([check]);
    c.start();
    await vi.waitFor(() => expect(c.getSnapshot().needsAttention).toHaveLength(1));
    expect(c.getSnapshot().nextCheckAt).toEqual(minutesAfter(10));

    await c.stop();
    expect(check.run).toHaveBeenCalledTimes(1);
    expect(c.getSnapshot().nextCheckAt).toBeNull();
  });

  it("reports the next check as soon as an overrunning cycle ends", async () => {
    const first = deferred<Issue[]>();
    const second = deferred<Issue[]>();
    const run = vi
      .fn<(signal: AbortSignal) => Promise<Issue[]>>()
      .mockReturnValueOnce(first.promise)
      .mockReturnValueOnce(second.promise);
    const c = coordinator([{ name: "github", run }]);

    c.start();
    await vi.waitFor(() => expect(run).toHaveBeenCalledTimes(1));
    expect(c.getSnapshot().nextCheckAt).toEqual(minutesAfter(10));

    clock = minutesAfter(12);
    first.resolve([pr1]);
    await vi.waitFor(() => expect(run).toHaveBeenCalledTimes(2));
    expect(c.getSnapshot().nextCheckAt).toEqual(minutesAfter(22));

    second.resolve([pr1]);
    await c.stop();
  });
});
