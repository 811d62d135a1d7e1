import { resolve } from "node:path";
import { type EnvConfig, type NudgeConfig, loadConfig, loadEnvConfig, parseRepo } from "./config.js";
import { Coordinator } from "./coordinator.js";
import { FlagCheck } from "./flag-check.js";
import { GitHubClient } from "./github.js";
import { LaunchDarklyClient } from "./launchdarkly.js";
import { logger } from "./logger.js";
import { DesktopNotifier } from "./notifier.js";
import { PullRequestCheck } from "./pr-check.js";
import { StateStore } from "./store.js";
import type { Notifier } from "./types.js";

export interface AppContext {
  config: NudgeConfig;
  env: EnvConfig;
  store: StateStore;
  coordinator: Coordinator;
  dashboardUrl: string;
}

export interface AppContextOptions {
  configPath?: string;
  notify?: boolean;
  /** --verbose wins over LOG_LEVEL. */
  verbose?: boolean;
}

export function dashboardUrl(config: NudgeConfig): string {
  return `http://${config.dashboard.host}:${config.dashboard.port}/`;
}

/** Loads configuration and wires the checks, store and notifier. Throws ConfigError on missing credentials. */
export function createAppContext(opts: AppContextOptions = {}): AppContext {
  const config = loadConfig(opts.configPath);
  const env = loadEnvConfig();
  logger.configure({ level: env.LOG_LEVEL, verbose: opts.verbose });

  const repo = config.repo ? parseRepo(config.repo) : undefined;
  const github = new GitHubClient(env.GITHUB_TOKEN, {
    repo: repo ? `${repo.owner}/${repo.repo}` : undefined,
    cwd: process.cwd(),
  });
  const launchdarkly = new LaunchDarklyClient({
    apiToken: env.LAUNCHDARKLY_API_TOKEN,
    projectKey: env.LAUNCHDARKLY_PROJECT_KEY,
    maintainerId: env.LAUNCHDARKLY_MAINTAINER_ID,
  });

  const checks = [
    new PullRequestCheck(github, { readyLabel: config.ready_label }),
    new FlagCheck(launchdarkly, { maintainerId: env.LAUNCHDARKLY_MAINTAINER_ID }),
  ];
  const notifier: Notifier = new DesktopNotifier(config.notify.command, config.notify.title);

  const store = new StateStore(resolve(config.state_path));
  const url = dashboardUrl(config);
  const coordinator = new Coordinator(checks, store, notifier, {
    intervalMs: config.interval_minutes * 60 * 1000,
    checkTimeoutMs: config.check_timeout_seconds * 1000,
    dashboardUrl: url,
    notify: opts.notify,
  });

  return { config, env, store, coordinator, dashboardUrl: url };
}
