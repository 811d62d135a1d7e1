import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadConfig, parseConfig, parseEnv, parseRepo } from "../config.js";
import { ConfigError } from "../errors.js";

describe("parseRepo", () => {
  it("parses valid owner/repo", () => {
    expect(parseRepo("acme/widgets")).toEqual({ owner: "acme", repo: "widgets" });
  });

  it("throws on missing repo name", () => {
    expect(() => parseRepo("acme")).toThrow("invalid repo format");
  });

  it("strips the github.com URL and .git suffix", () => {
    expect(parseRepo("https://github.com/acme/widgets.git")).toEqual({ owner: "acme", repo: "widgets" });
    expect(parseRepo("github.com/acme/widgets")).toEqual({ owner: "acme", repo: "widgets" });
  });

  it("rejects extra path segments", () => {
    expect(() => parseRepo("acme/widgets/pulls")).toThrow(ConfigError);
  });
});

describe("parseConfig", () => {
  it("fills in defaults for an empty file", () => {
    const config = parseConfig(null);
    expect(config).toMatchObject({
      version: 1,
      ready_label: "ready-to-merge",
      interval_minutes: 10,
      check_timeout_seconds: 60,
      dashboard: { host: "127.0.0.1", port: 9845 },
    });
    expect(config.notify.title).toBe("nudge");
    expect(config.repo).toBeUndefined();
  });

  it("keeps explicit values", () => {
    const config = parseConfig({
      repo: "acme/widgets",
      ready_label: "ship-it",
      interval_minutes: 5,
      dashboard: { port: 8080 },
      notify: { command: "none" },
    });
    expect(config).toMatchObject({
      repo: "acme/widgets",
      ready_label: "ship-it",
      interval_minutes: 5,
      dashboard: { host: "127.0.0.1", port: 8080 },
      notify: { command: "none", title: "nudge" },
    });
  });

  it("rejects invalid values with the offending path", () => {
    expect(() => parseConfig({ dashboard: { port: 0 } })).toThrow(/^invalid config: dashboard\.port: /);
    expect(() => parseConfig({ notify: { command: "growl" } })).toThrow(/^invalid config: notify\.command: /);
  });

  it("rejects a config written for a newer version", () => {
    expect(() => parseConfig({ version: 2 })).toThrow("config version 2 requires a newer version of nudge.");
  });
});

describe("loadConfig", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "nudge-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("reads YAML from an explicit path", () => {
    const path = join(dir, "nudge.config.yaml");
    writeFileSync(path, "interval_minutes: 15\nnotify:\n  command: none\n");
    expect(loadConfig(path)).toMatchObject({ interval_minutes: 15, notify: { command: "none" } });
  });

  it("fails when an explicit path does not exist", () => {
    const path = join(dir, "missing.yaml");
    expect(() => loadConfig(path)).toThrow(`config not found at ${path}`);
  });
});

describe("parseEnv", () => {
  const complete = {
    GITHUB_TOKEN: "test-token",
    LAUNCHDARKLY_API_TOKEN: "test-secret",
    LAUNCHDARKLY_MAINTAINER_ID: "maint-1",
  };

  it("accepts the required credentials and fills defaults", () => {
    expect(parseEnv(complete)).toEqual({ ...complete, LAUNCHDARKLY_PROJECT_KEY: "default", LOG_LEVEL: "info" });
  });

  it("names every missing credential", () => {
    expect(() => parseEnv({ LAUNCHDARKLY_MAINTAINER_ID: "maint-1" })).toThrow(
      "missing credentials: GITHUB_TOKEN is not set; LAUNCHDARKLY_API_TOKEN is not set",
    );
  });

  it("treats empty strings as unset", () => {
    expect(() => parseEnv({ ...complete, GITHUB_TOKEN: "" })).toThrow(
      "missing credentials: GITHUB_TOKEN is not set",
    );
  });

  it("ignores unrelated variables", () => {
    expect(parseEnv({ ...complete, PATH: "/usr/bin", LOG_LEVEL: "debug" }).LOG_LEVEL).toBe("debug");
  });
});
