import type { Issue, IssueCategory, Notifier, PullRequestRecord } from "../types.js";

export const T0 = new Date("2026-03-02T12:00:00.000Z");

export function minutesAfter(minutes: number, base = T0): Date {
  return new Date(base.getTime() + minutes * 60 * 1000);
}

export function makeIssue(identity: string, category: IssueCategory = "PrFailingChecks"): Issue {
  return {
    identity,
    category,
    title: `issue ${identity}`,
    url: `https://example.test/${encodeURIComponent(identity)}`,
    detectedAt: T0,
    source: category.startsWith("Pr") ? "github" : "launchdarkly",
  };
}

export function makePR(overrides: Partial<PullRequestRecord> = {}): PullRequestRecord {
  return {
    repository: "acme/widgets",
    number: 1,
    title: "Fix login",
    url: "https://github.com/acme/widgets/pull/1",
    branch: "fix-login",
    isDraft: false,
    ciStatus: "pending",
    reviewDecision: null,
    labels: [],
    ...overrides,
  };
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (err: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (err: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export class RecordingNotifier implements Notifier {
  calls: Array<{ summary: string; target: string }> = [];
  failWith: Error | undefined;

  async notify(summary: string, target: string): Promise<void> {
    this.calls.push({ summary, target });
    if (this.failWith) throw this.failWith;
  }
}
