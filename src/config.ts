import { existsSync, readFileSync } from "node:fs";
import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { config as loadEnv } from "dotenv";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ConfigError } from "./errors.js";

export const DEFAULT_CONFIG_FILE = "nudge.config.yaml";

const DashboardSchema = z.object({
  host: z.string().default("127.0.0.1"),
  port: z.number().int().min(1).max(65535).default(9845),
});

const NotifySchema = z.object({
  command: z
    .enum(["terminal-notifier", "notify-send", "none"])
    .default(process.platform === "darwin" ? "terminal-notifier" : "notify-send"),
  title: z.string().default("nudge"),
});

const ConfigSchema = z.object({
  version: z.number().optional().default(1),
  repo: z.string().optional(),
  ready_label: z.string().default("ready-to-merge"),
  interval_minutes: z.number().positive().default(10),
  check_timeout_seconds: z.number().positive().default(60),
  state_path: z.string().default(join(homedir(), ".local", "share", "nudge", "state.db")),
  dashboard: DashboardSchema.optional().transform((v) => DashboardSchema.parse(v ?? {})),
  notify: NotifySchema.optional().transform((v) => NotifySchema.parse(v ?? {})),
});

export type NudgeConfig = z.infer<typeof ConfigSchema>;

const EnvSchema = z.object({
  GITHUB_TOKEN: z.string().min(1),
  LAUNCHDARKLY_API_TOKEN: z.string().min(1),
  LAUNCHDARKLY_MAINTAINER_ID: z.string().min(1),
  LAUNCHDARKLY_PROJECT_KEY: z.string().min(1).default("default"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join(".") || "(root)";
      return issue.code === "invalid_type" && issue.received === "undefined" ? `${path} is not set` : `${path}: ${issue.message}`;
    })
    .join("; ");
}

export function parseConfig(raw: unknown): NudgeConfig {
  const result = ConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(`invalid config: ${describeIssues(result.error)}`, result.error);
  }
  if (result.data.version > 1) {
    throw new ConfigError(`config version ${result.data.version} requires a newer version of nudge.`);
  }
  return result.data;
}

/** The config file is optional; every field has a default. */
export function loadConfig(configPath?: string): NudgeConfig {
  const p = configPath || resolve(process.cwd(), DEFAULT_CONFIG_FILE);
  if (!existsSync(p)) {
    if (configPath) throw new ConfigError(`config not found at ${p}. run \`nudge init\` to create one`);
    return parseConfig({});
  }
  return parseConfig(parseYaml(readFileSync(p, "utf-8")));
}

export function parseEnv(env: Record<string, string | undefined>): EnvConfig {
  // Empty strings count as unset.
  const cleaned = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ""));
  const result = EnvSchema.safeParse(cleaned);
  if (!result.success) {
    throw new ConfigError(`missing credentials: ${describeIssues(result.error)}`, result.error);
  }
  return result.data;
}

export function loadEnvConfig(envPath?: string): EnvConfig {
  loadEnv({ path: envPath || resolve(process.cwd(), ".env") });
  return parseEnv(process.env);
}

export function parseRepo(repo: string): { owner: string; repo: string } {
  let cleaned = repo.trim();
  cleaned = cleaned.replace(/^https?:\/\/github\.com\//, "");
  cleaned = cleaned.replace(/^github\.com\//, "");
  cleaned = cleaned.replace(/\.git$/, "");
  cleaned = cleaned.replace(/\/$/, "");

  const parts = cleaned.split("/").filter(Boolean);
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    throw new ConfigError(`invalid repo format: "${repo}". expected owner/repo`);
  }
  return { owner: parts[0], repo: parts[1] };
}
