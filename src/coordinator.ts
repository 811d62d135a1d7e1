import { runCheck } from "./check.js";
import { CheckError, errorMessage } from "./errors.js";
import { logger } from "./logger.js";
import { summarize } from "./notifier.js";
import { Ticker } from "./scheduler.js";
import type { StateStore } from "./store.js";
import type { Check, CheckFailure, ClassifiedIssue, DashboardSnapshot, Issue, Notifier, PollResult } from "./types.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface CoordinatorOptions {
  intervalMs: number;
  checkTimeoutMs: number;
  /** Opened when the user clicks a notification. */
  dashboardUrl: string;
  /** When false, cycles classify and publish but never notify. */
  notify?: boolean;
  /** Records untouched for this long are dropped. Defaults to a week. */
  retentionMs?: number;
  now?: () => Date;
}

export interface CycleResult {
  snapshot: DashboardSnapshot;
  notified: Issue[];
}

export class Coordinator {
  private checks: Check[];
  private store: StateStore;
  private notifier: Notifier;
  private opts: Required<CoordinatorOptions>;
  private ticker: Ticker;
  private lastPoll: PollResult = { issues: [], errors: [] };
  private snapshot: DashboardSnapshot;
  private inFlight: Promise<CycleResult> | undefined;

  constructor(checks: Check[], store: StateStore, notifier: Notifier, opts: CoordinatorOptions) {
    this.checks = checks;
    this.store = store;
    this.notifier = notifier;
    this.opts = {
      ...opts,
      notify: opts.notify ?? true,
      retentionMs: opts.retentionMs ?? 7 * DAY_MS,
      now: opts.now ?? (() => new Date()),
    };
    this.ticker = new Ticker(async () => {
      await this.runCycle();
    }, this.opts.intervalMs, this.opts.now);
    this.snapshot = this.publish();
  }

  getSnapshot(): DashboardSnapshot {
    // The ticker settles the next run time only once a cycle has finished.
    const next = this.ticker.nextRunAt();
    if (next?.getTime() !== this.snapshot.nextCheckAt?.getTime()) {
      this.snapshot = { ...this.snapshot, nextCheckAt: next };
    }
    return this.snapshot;
  }

  /** Runs every check concurrently; one failing check never hides another's issues. */
  async poll(): Promise<PollResult> {
    const settled = await Promise.allSettled(this.checks.map((check) => runCheck(check, this.opts.checkTimeoutMs)));
    const issues: Issue[] = [];
    const errors: CheckFailure[] = [];
    settled.forEach((result, i) => {
      const check = this.checks[i];
      if (result.status === "fulfilled") {
        issues.push(...result.value);
      } else {
        const name = result.reason instanceof CheckError ? result.reason.check : check.name;
        errors.push({ check: name, message: errorMessage(result.reason) });
        logger.warn(`${name} check failed`, { error: errorMessage(result.reason) });
      }
    });
    return { issues, errors };
  }

  /** A cycle already in progress is joined rather than started twice. */
  runCycle(): Promise<CycleResult> {
    if (!this.inFlight) {
      this.inFlight = this.cycle().finally(() => {
        this.inFlight = undefined;
      });
    }
    return this.inFlight;
  }

  private async cycle(): Promise<CycleResult> {
    const poll = await this.poll();
    const now = this.opts.now();
    this.store.observe(
      poll.issues.map((i) => i.identity),
      now,
    );
    const candidates = poll.issues.filter((issue) => this.store.classify(issue, now) === "Fresh");
    let notified: Issue[] = [];

    if (candidates.length > 0 && this.opts.notify) {
      const summary = summarize(candidates);
      try {
        await this.notifier.notify(summary, this.opts.dashboardUrl);
        const notifiedAt = this.opts.now();
        for (const issue of candidates) this.store.recordNotified(issue.identity, notifiedAt);
        notified = candidates;
        logger.info(`Sent notification: ${summary}`);
      } catch (err) {
        logger.warn(`Notification failed: ${errorMessage(err)}`);
      }
    } else {
      logger.debug("no notification sent", { issues: poll.issues.length, candidates: candidates.length });
    }

    this.lastPoll = poll;
    this.snapshot = this.publish();

    const removed = this.store.prune(new Date(now.getTime() - this.opts.retentionMs));
    if (removed > 0) logger.debug(`pruned ${removed} stale records`);
    this.store.setMeta("last_check", now.toISOString());

    return { snapshot: this.snapshot, notified };
  }

  /** Dashboard write path: acknowledges an issue and refreshes the snapshot. */
  markSeen(identity: string): DashboardSnapshot {
    this.store.markSeen(identity, this.opts.now());
    this.snapshot = this.publish();
    return this.snapshot;
  }

  private publish(): DashboardSnapshot {
    const now = this.opts.now();
    const needsAttention: ClassifiedIssue[] = [];
    const recentlyReviewed: ClassifiedIssue[] = [];
    for (const issue of this.lastPoll.issues) {
      const classification = this.store.classify(issue, now);
      // Throttled issues stay listed; only acknowledged ones move out of the way.
      const bucket = classification === "SeenRecently" ? recentlyReviewed : needsAttention;
      bucket.push({ ...issue, classification });
    }
    return {
      generatedAt: now,
      nextCheckAt: this.ticker.nextRunAt(),
      needsAttention,
      recentlyReviewed,
      errors: this.lastPoll.errors,
    };
  }

  start(): void {
    logger.info(`Checking every ${Math.round(this.opts.intervalMs / 60000)} minutes`);
    this.ticker.start();
  }

  /** Stops scheduling and waits for the current cycle, if any. */
  async stop(): Promise<void> {
    await this.ticker.stop();
    await this.inFlight;
  }
}
