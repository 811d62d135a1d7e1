import type { Check, FlagEnvironment, FlagRecord, FlagSource, Issue } from "./types.js";

const HOUR_MS = 60 * 60 * 1000;

/** How long a partial rollout may sit untouched before it is reported. */
export const STALE_AFTER_MS: Record<string, number> = {
  staging: 2 * HOUR_MS,
  production: 18 * HOUR_MS,
};

const ENVIRONMENTS = ["staging", "production"] as const;

export interface FlagCheckOptions {
  maintainerId: string;
  now?: () => Date;
}

export function enabledVariationIndex(flag: FlagRecord): number | undefined {
  const byName = flag.variations.findIndex((v) => v.name?.toLowerCase() === "enabled");
  if (byName !== -1) return byName;
  const byValue = flag.variations.findIndex((v) => v.value === true);
  return byValue !== -1 ? byValue : undefined;
}

/**
 * Percentage of traffic served the enabled variation in one environment, or undefined
 * when it cannot be determined.
 */
export function rolloutPercentage(flag: FlagRecord, env: FlagEnvironment): number | undefined {
  if (!env.on) return 0;
  if (flag.kind !== "boolean") return undefined;

  const enabled = enabledVariationIndex(flag);
  if (enabled === undefined) return undefined;

  const fallthrough = env.fallthrough;
  if (fallthrough?.rollout) {
    const total = fallthrough.rollout.reduce((sum, v) => sum + v.weight, 0);
    if (total === 0) return 0;
    const onWeight = fallthrough.rollout.find((v) => v.variation === enabled)?.weight ?? 0;
    return (onWeight * 100) / total;
  }
  if (fallthrough?.variation !== undefined) {
    return fallthrough.variation === enabled ? 100 : 0;
  }
  return undefined;
}

export function flagUrl(projectKey: string, flagKey: string, env: string): string {
  return (
    `https://app.launchdarkly.com/projects/${encodeURIComponent(projectKey)}/flags/${encodeURIComponent(flagKey)}` +
    `/targeting?env=production&env=staging&selected-env=${encodeURIComponent(env)}`
  );
}

export class FlagCheck implements Check {
  readonly name = "launchdarkly";
  private source: FlagSource;
  private maintainerId: string;
  private now: () => Date;

  constructor(source: FlagSource, opts: FlagCheckOptions) {
    this.source = source;
    this.maintainerId = opts.maintainerId;
    this.now = opts.now ?? (() => new Date());
  }

  async run(signal: AbortSignal): Promise<Issue[]> {
    const flags = await this.source.fetchFlags(signal);
    const detectedAt = this.now();
    const project = this.source.projectKey;
    const issues: Issue[] = [];

    for (const flag of flags) {
      if (flag.kind !== "boolean") continue;
      if (flag.maintainerId !== this.maintainerId) continue;

      const rollouts = new Map<string, number | undefined>();
      for (const envName of ENVIRONMENTS) {
        const env = flag.environments[envName];
        rollouts.set(envName, env ? rolloutPercentage(flag, env) : undefined);
      }

      const staging = rollouts.get("staging");
      const production = rollouts.get("production");
      if (staging === 100 && production === 0) {
        issues.push({
          identity: `flag:${project}/${flag.key}:staging>production`,
          category: "FlagStagingAheadOfProduction",
          title: `Flag '${flag.name}' rolled out to 100% in staging, but not started in production`,
          url: flagUrl(project, flag.key, "production"),
          detectedAt,
          source: this.name,
        });
      }

      for (const envName of ENVIRONMENTS) {
        const env = flag.environments[envName];
        const rollout = rollouts.get(envName);
        if (!env || env.lastModified === undefined || rollout === undefined) continue;
        if (rollout <= 0 || rollout >= 100) continue;

        const staleAfter = STALE_AFTER_MS[envName];
        if (detectedAt.getTime() - env.lastModified <= staleAfter) continue;

        issues.push({
          identity: `flag:${project}/${flag.key}:${envName}`,
          category: "FlagStaleRollout",
          title: `Flag '${flag.name}' in ${envName} at partial ${rollout.toFixed(0)}% rollout, not updated in ${staleAfter / HOUR_MS}h`,
          url: flagUrl(project, flag.key, envName),
          detectedAt,
          source: this.name,
        });
      }
    }

    return issues;
  }
}
