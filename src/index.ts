// Public API — the engine for programmatic use

export { runCheck } from "./check.js";
export { loadConfig, loadEnvConfig, parseConfig, parseEnv, parseRepo } from "./config.js";
export type { EnvConfig, NudgeConfig } from "./config.js";
export { createAppContext } from "./context.js";
export type { AppContext } from "./context.js";
export { Coordinator } from "./coordinator.js";
export type { CoordinatorOptions, CycleResult } from "./coordinator.js";
export { createDashboardRoutes, serveDashboard } from "./dashboard.js";
export type { DashboardBackend } from "./dashboard.js";
export { CheckError, ConfigError, NotifyError, NudgeError } from "./errors.js";
export { FlagCheck, rolloutPercentage } from "./flag-check.js";
export { GitHubClient } from "./github.js";
export { LaunchDarklyClient } from "./launchdarkly.js";
export { DesktopNotifier, summarize } from "./notifier.js";
export { PullRequestCheck, classifyAuthoredPR } from "./pr-check.js";
export { Ticker } from "./scheduler.js";
export { NOTIFY_THROTTLE_MS, SEEN_WINDOW_MS, StateStore } from "./store.js";
export type {
  Check,
  CheckFailure,
  Classification,
  ClassifiedIssue,
  DashboardSnapshot,
  FlagRecord,
  FlagSource,
  Issue,
  IssueCategory,
  Notifier,
  PollResult,
  PullRequestRecord,
  PullRequestSource,
  SeenRecord,
} from "./types.js";
