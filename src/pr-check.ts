import type {
  Check,
  Issue,
  IssueCategory,
  PullRequestListing,
  PullRequestRecord,
  PullRequestSource,
} from "./types.js";

export interface PullRequestCheckOptions {
  readyLabel: string;
  now?: () => Date;
}

/** Which attention category an authored PR falls into, first match wins. */
export function classifyAuthoredPR(pr: PullRequestRecord, readyLabel: string): IssueCategory | undefined {
  if (pr.ciStatus === "failure") return "PrFailingChecks";
  if (pr.isDraft && pr.ciStatus === "success") return "PrDraftChecksPassing";
  if (
    !pr.isDraft &&
    pr.ciStatus === "success" &&
    pr.reviewDecision === "approved" &&
    !pr.labels.includes(readyLabel)
  ) {
    return "PrApprovedUnlabeled";
  }
  return undefined;
}

function describe(category: IssueCategory, pr: PullRequestRecord, readyLabel: string): string {
  const ref = `PR #${pr.number} '${pr.title}'`;
  switch (category) {
    case "PrFailingChecks":
      return `${ref} has failing checks`;
    case "PrDraftChecksPassing":
      return `${ref} is draft with all checks passing`;
    case "PrApprovedUnlabeled":
      return `${ref} approved but missing ${readyLabel} label`;
    default:
      return `${ref} awaiting your review`;
  }
}

export function pullRequestIdentity(pr: PullRequestRecord): string {
  return `pr:${pr.repository}#${pr.number}`;
}

/** The PR whose head is the branch checked out in the working directory's repository. */
export function isCheckedOut(pr: PullRequestRecord, listing: PullRequestListing): boolean {
  if (!listing.currentBranch || !listing.currentRepo) return false;
  return pr.branch === listing.currentBranch && pr.repository.toLowerCase() === listing.currentRepo.toLowerCase();
}

export class PullRequestCheck implements Check {
  readonly name = "github";
  private source: PullRequestSource;
  private readyLabel: string;
  private now: () => Date;

  constructor(source: PullRequestSource, opts: PullRequestCheckOptions) {
    this.source = source;
    this.readyLabel = opts.readyLabel;
    this.now = opts.now ?? (() => new Date());
  }

  async run(signal: AbortSignal): Promise<Issue[]> {
    const listing = await this.source.fetchPullRequests(signal);
    const { authored, reviewRequested } = listing;
    const detectedAt = this.now();
    const notCurrent = (pr: PullRequestRecord) => !isCheckedOut(pr, listing);
    const issues: Issue[] = [];

    for (const pr of authored.filter(notCurrent)) {
      const category = classifyAuthoredPR(pr, this.readyLabel);
      if (!category) continue;
      issues.push({
        identity: pullRequestIdentity(pr),
        category,
        title: describe(category, pr, this.readyLabel),
        url: pr.url,
        detectedAt,
        source: this.name,
      });
    }

    for (const pr of reviewRequested.filter(notCurrent)) {
      issues.push({
        identity: `${pullRequestIdentity(pr)}:review`,
        category: "PrAwaitingReview",
        title: describe("PrAwaitingReview", pr, this.readyLabel),
        url: pr.url,
        detectedAt,
        source: this.name,
      });
    }

    return issues;
  }
}
