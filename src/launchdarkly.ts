import { z } from "zod";
import { logger } from "./logger.js";
import type { FlagRecord, FlagSource } from "./types.js";

const DEFAULT_BASE_URL = "https://app.launchdarkly.com/api/v2";

export interface LaunchDarklyClientOptions {
  apiToken: string;
  projectKey: string;
  maintainerId: string;
  baseUrl?: string;
}

const FlagListSchema = z.object({
  items: z.array(z.object({ key: z.string(), name: z.string() })),
});

const EnvironmentSchema = z.object({
  on: z.boolean(),
  lastModified: z.number().nullish(),
  fallthrough: z
    .object({
      variation: z.number().nullish(),
      rollout: z
        .object({
          variations: z.array(z.object({ variation: z.number(), weight: z.number() })),
        })
        .nullish(),
    })
    .nullish(),
});

const FlagDetailSchema = z.object({
  key: z.string(),
  name: z.string(),
  kind: z.string(),
  maintainerId: z.string().nullish(),
  variations: z.array(z.object({ name: z.string().nullish(), value: z.unknown() })),
  environments: z.record(EnvironmentSchema).default({}),
});

export type FlagDetail = z.infer<typeof FlagDetailSchema>;

export function toFlagRecord(detail: FlagDetail): FlagRecord {
  const environments: FlagRecord["environments"] = {};
  for (const [name, env] of Object.entries(detail.environments)) {
    environments[name] = {
      on: env.on,
      lastModified: env.lastModified ?? undefined,
      fallthrough: env.fallthrough
        ? {
            variation: env.fallthrough.variation ?? undefined,
            rollout: env.fallthrough.rollout?.variations,
          }
        : undefined,
    };
  }
  return {
    key: detail.key,
    name: detail.name,
    kind: detail.kind,
    maintainerId: detail.maintainerId ?? undefined,
    variations: detail.variations.map((v) => ({ name: v.name ?? undefined, value: v.value })),
    environments,
  };
}

export class LaunchDarklyClient implements FlagSource {
  readonly projectKey: string;
  private apiToken: string;
  private maintainerId: string;
  private baseUrl: string;

  constructor(opts: LaunchDarklyClientOptions) {
    this.apiToken = opts.apiToken;
    this.projectKey = opts.projectKey;
    this.maintainerId = opts.maintainerId;
    this.baseUrl = opts.baseUrl || DEFAULT_BASE_URL;
  }

  private async get(path: string, signal?: AbortSignal): Promise<Response> {
    return fetch(`${this.baseUrl}${path}`, {
      headers: { Authorization: this.apiToken, "Content-Type": "application/json" },
      signal,
    });
  }

  async fetchFlags(signal?: AbortSignal): Promise<FlagRecord[]> {
    const project = encodeURIComponent(this.projectKey);
    const filter = encodeURIComponent(`maintainerId:${this.maintainerId}`);
    const resp = await this.get(`/flags/${project}?filter=${filter}&summary=true`, signal);
    if (!resp.ok) {
      throw new Error(`LaunchDarkly API error (${resp.status}) listing flags for project ${this.projectKey}`);
    }
    const list = FlagListSchema.parse(await resp.json());

    const flags: FlagRecord[] = [];
    for (const item of list.items) {
      const detailResp = await this.get(
        `/flags/${project}/${encodeURIComponent(item.key)}?env=staging&env=production`,
        signal,
      );
      if (!detailResp.ok) {
        logger.warn(`Failed to fetch details for flag '${item.name}': ${detailResp.status}`);
        continue;
      }
      const detail = FlagDetailSchema.parse(await detailResp.json());
      // Only boolean flags are of interest.
      if (detail.kind !== "boolean") continue;
      flags.push(toFlagRecord(detail));
    }
    return flags;
  }
}
