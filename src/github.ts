import { spawn } from "node:child_process";
import { Octokit } from "@octokit/rest";
import { z } from "zod";
import { toError } from "./errors.js";
import { logger } from "./logger.js";
import type { CIStatus, PullRequestListing, PullRequestRecord, PullRequestSource, ReviewDecision } from "./types.js";

export interface GitHubClientOptions {
  /** Restrict searches to one repository, "owner/name". */
  repo?: string;
  /** Directory whose checked-out branch is excluded from results. */
  cwd?: string;
}

export interface RateLimitInfo {
  remaining: number;
  limit: number;
  resetAt: Date;
}

export function mapCIStatus(state: string | null | undefined): CIStatus {
  switch (state) {
    case "SUCCESS":
      return "success";
    case "FAILURE":
    case "ERROR":
      return "failure";
    case "PENDING":
    case "EXPECTED":
      return "pending";
    default:
      return "unknown";
  }
}

export function mapReviewDecision(decision: string | null | undefined): ReviewDecision {
  switch (decision) {
    case "APPROVED":
      return "approved";
    case "CHANGES_REQUESTED":
      return "changes_requested";
    case "REVIEW_REQUIRED":
      return "review_required";
    default:
      return null;
  }
}

const PullRequestNodeSchema = z.object({
  number: z.number(),
  title: z.string(),
  url: z.string(),
  headRefName: z.string(),
  isDraft: z.boolean(),
  reviewDecision: z.string().nullish(),
  repository: z.object({ nameWithOwner: z.string() }),
  labels: z.object({ nodes: z.array(z.object({ name: z.string() }).nullable()) }).nullish(),
  commits: z.object({
    nodes: z.array(
      z
        .object({
          commit: z.object({ statusCheckRollup: z.object({ state: z.string() }).nullable() }),
        })
        .nullable(),
    ),
  }),
});

export type PullRequestNode = z.infer<typeof PullRequestNodeSchema>;

const SearchResponseSchema = z.object({
  search: z.object({
    nodes: z.array(z.record(z.unknown()).nullable()),
  }),
  rateLimit: z.object({ remaining: z.number(), limit: z.number(), resetAt: z.string() }).nullish(),
});

const SEARCH_QUERY = `
  query($q: String!) {
    rateLimit { remaining limit resetAt }
    search(query: $q, type: ISSUE, first: 50) {
      nodes {
        ... on PullRequest {
          number
          title
          url
          headRefName
          isDraft
          reviewDecision
          repository { nameWithOwner }
          labels(first: 20) { nodes { name } }
          commits(last: 1) {
            nodes {
              commit {
                statusCheckRollup { state }
              }
            }
          }
        }
      }
    }
  }
`;

export function toPullRequestRecord(node: PullRequestNode): PullRequestRecord {
  const rollup = node.commits.nodes[0]?.commit.statusCheckRollup?.state;
  return {
    repository: node.repository.nameWithOwner,
    number: node.number,
    title: node.title,
    url: node.url,
    branch: node.headRefName,
    isDraft: node.isDraft,
    ciStatus: mapCIStatus(rollup),
    reviewDecision: mapReviewDecision(node.reviewDecision),
    labels: (node.labels?.nodes ?? []).flatMap((l) => (l ? [l.name] : [])),
  };
}

function errorStatus(err: unknown): number | undefined {
  if (typeof err === "object" && err !== null && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return undefined;
}

function git(args: string[], cwd?: string, signal?: AbortSignal): Promise<string | undefined> {
  return new Promise((resolve) => {
    const proc = spawn("git", args, { cwd, signal, stdio: ["ignore", "pipe", "ignore"] });
    let stdout = "";
    proc.stdout.on("data", (data: Buffer) => {
      stdout += data.toString();
    });
    proc.on("error", () => resolve(undefined));
    proc.on("close", (code) => resolve(code === 0 ? stdout.trim() : undefined));
  });
}

/** Current branch of a git checkout, or undefined outside one (or on a detached HEAD). */
export async function currentGitBranch(cwd?: string, signal?: AbortSignal): Promise<string | undefined> {
  const branch = await git(["rev-parse", "--abbrev-ref", "HEAD"], cwd, signal);
  return branch && branch !== "HEAD" ? branch : undefined;
}

/** "owner/name" of a GitHub remote URL, in https or ssh form. */
export function repoFromRemote(url: string): string | undefined {
  const match = url.trim().match(/github\.com[:/]([^/\s]+)\/([^/\s]+?)(?:\.git)?\/?$/);
  return match ? `${match[1]}/${match[2]}` : undefined;
}

/** GitHub repository the checkout's origin points at. */
export async function currentGitRepo(cwd?: string, signal?: AbortSignal): Promise<string | undefined> {
  const url = await git(["remote", "get-url", "origin"], cwd, signal);
  return url ? repoFromRemote(url) : undefined;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(toError(signal.reason));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(toError(signal?.reason));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export class GitHubClient implements PullRequestSource {
  private octokit: Octokit;
  private repo?: string;
  private cwd?: string;
  private rateLimit: RateLimitInfo = { remaining: 5000, limit: 5000, resetAt: new Date() };

  constructor(token: string, opts: GitHubClientOptions = {}) {
    this.octokit = new Octokit({ auth: token });
    this.repo = opts.repo;
    this.cwd = opts.cwd;
  }

  getRateLimit(): RateLimitInfo {
    return { ...this.rateLimit };
  }

  /** Retries 403s. Waits between attempts end early when `signal` aborts. */
  async withBackoff<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    for (let attempt = 0; attempt < 3; attempt++) {
      signal?.throwIfAborted();
      try {
        return await fn();
      } catch (err) {
        if (errorStatus(err) === 403 && this.rateLimit.remaining === 0) {
          const waitMs = Math.max(0, this.rateLimit.resetAt.getTime() - Date.now()) + 1000;
          logger.warn(`GitHub rate limited. Waiting ${Math.ceil(waitMs / 1000)}s until reset...`);
          await sleep(waitMs, signal);
          continue;
        }
        if (errorStatus(err) === 403 && attempt < 2) {
          await sleep((attempt + 1) * 5000, signal);
          continue;
        }
        throw err;
      }
    }
    throw new Error("Max retries exceeded");
  }

  async searchPullRequests(qualifier: string, signal?: AbortSignal): Promise<PullRequestRecord[]> {
    const q = ["is:pr", "is:open", "archived:false", qualifier, this.repo ? `repo:${this.repo}` : ""]
      .filter(Boolean)
      .join(" ");
    const raw = await this.withBackoff(() =>
      this.octokit.graphql<unknown>(SEARCH_QUERY, { q, request: { signal } }),
      signal,
    );
    const result = SearchResponseSchema.parse(raw);

    if (result.rateLimit) {
      this.rateLimit = {
        remaining: result.rateLimit.remaining,
        limit: result.rateLimit.limit,
        resetAt: new Date(result.rateLimit.resetAt),
      };
    }

    // Non-PR search hits come back as empty objects.
    return result.search.nodes.flatMap((node) =>
      node && Object.keys(node).length > 0 ? [toPullRequestRecord(PullRequestNodeSchema.parse(node))] : [],
    );
  }

  async fetchPullRequests(signal?: AbortSignal): Promise<PullRequestListing> {
    const [authored, reviewRequested, currentBranch, currentRepo] = await Promise.all([
      this.searchPullRequests("author:@me", signal),
      this.searchPullRequests("review-requested:@me", signal),
      currentGitBranch(this.cwd, signal),
      currentGitRepo(this.cwd, signal),
    ]);
    logger.debug("fetched pull requests", {
      authored: authored.length,
      reviewRequested: reviewRequested.length,
      currentBranch,
      currentRepo,
    });
    return { authored, reviewRequested, currentBranch, currentRepo };
  }
}
