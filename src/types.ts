export type IssueCategory =
  | "PrFailingChecks"
  | "PrDraftChecksPassing"
  | "PrApprovedUnlabeled"
  | "PrAwaitingReview"
  | "FlagStaleRollout"
  | "FlagStagingAheadOfProduction";

export interface Issue {
  /** Stable across polls of the same underlying PR or flag environment. */
  identity: string;
  category: IssueCategory;
  title: string;
  url: string;
  /** When this cycle observed the issue, not when it first appeared. */
  detectedAt: Date;
  /** Name of the check that emitted it. */
  source: string;
}

export type Classification = "Fresh" | "Suppressed" | "SeenRecently";

export interface SeenRecord {
  identity: string;
  seenAt?: Date;
  lastNotifiedAt?: Date;
  lastObservedAt?: Date;
}

export interface Check {
  readonly name: string;
  run(signal: AbortSignal): Promise<Issue[]>;
}

export interface CheckFailure {
  check: string;
  message: string;
}

export interface PollResult {
  issues: Issue[];
  errors: CheckFailure[];
}

export interface ClassifiedIssue extends Issue {
  classification: Classification;
}

export interface DashboardSnapshot {
  generatedAt: Date;
  nextCheckAt: Date | null;
  needsAttention: ClassifiedIssue[];
  recentlyReviewed: ClassifiedIssue[];
  errors: CheckFailure[];
}

// ── collaborator contracts ──────────────────────────────────────

export type CIStatus = "success" | "failure" | "pending" | "unknown";

export type ReviewDecision = "approved" | "changes_requested" | "review_required" | null;

export interface PullRequestRecord {
  repository: string;
  number: number;
  title: string;
  url: string;
  branch: string;
  isDraft: boolean;
  ciStatus: CIStatus;
  reviewDecision: ReviewDecision;
  labels: string[];
}

export interface PullRequestListing {
  authored: PullRequestRecord[];
  reviewRequested: PullRequestRecord[];
  /** Local branch of the working directory, if it is a git checkout. */
  currentBranch?: string;
  /** "owner/name" of that checkout's GitHub origin. */
  currentRepo?: string;
}

export interface PullRequestSource {
  fetchPullRequests(signal?: AbortSignal): Promise<PullRequestListing>;
}

export interface FlagVariation {
  name?: string;
  value: unknown;
}

export interface WeightedVariation {
  variation: number;
  weight: number;
}

export interface FlagEnvironment {
  on: boolean;
  /** Epoch milliseconds. */
  lastModified?: number;
  fallthrough?: {
    variation?: number;
    rollout?: WeightedVariation[];
  };
}

export interface FlagRecord {
  key: string;
  name: string;
  kind: string;
  maintainerId?: string;
  variations: FlagVariation[];
  environments: Record<string, FlagEnvironment>;
}

export interface FlagSource {
  readonly projectKey: string;
  fetchFlags(signal?: AbortSignal): Promise<FlagRecord[]>;
}

export interface Notifier {
  notify(summary: string, target: string): Promise<void>;
}
