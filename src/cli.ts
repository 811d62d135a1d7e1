#!/usr/bin/env node
import { existsSync, unlinkSync, writeFileSync } from "node:fs";
import { resolve } from "node:path";
import { createInterface } from "node:readline";
import chalk from "chalk";
import Table from "cli-table3";
import { Command } from "commander";
import ora from "ora";
import { DEFAULT_CONFIG_FILE, loadConfig } from "./config.js";
import { createAppContext } from "./context.js";
import { createDashboardRoutes, serveDashboard } from "./dashboard.js";
import { ConfigError, errorMessage } from "./errors.js";
import { logger } from "./logger.js";
import { StateStore } from "./store.js";
import type { DashboardSnapshot } from "./types.js";

const program = new Command();

program
  .name("nudge")
  .description("Polls your pull requests and feature flags and nudges you about the ones that need attention")
  .version("0.1.0")
  .option("-c, --config <path>", "Path to nudge.config.yaml")
  .option("-v, --verbose", "Verbose logging")
  .hook("preAction", (cmd) => {
    if (cmd.opts().verbose) logger.configure({ verbose: true });
  });

function configPath(): string | undefined {
  const opts = program.opts<{ config?: string }>();
  return opts.config;
}

function verbose(): boolean | undefined {
  return program.opts<{ verbose?: boolean }>().verbose;
}

function printSnapshot(snapshot: DashboardSnapshot) {
  const rows = [...snapshot.needsAttention, ...snapshot.recentlyReviewed];
  if (rows.length === 0) {
    console.log(chalk.green("No issues found"));
  } else {
    const table = new Table({
      head: ["Status", "Category", "Issue"],
      colWidths: [14, 30, 70],
      wordWrap: true,
    });
    for (const issue of rows) {
      const status =
        issue.classification === "Fresh"
          ? chalk.red("new")
          : issue.classification === "Suppressed"
            ? chalk.yellow("notified")
            : chalk.dim("seen");
      table.push([status, issue.category, `${issue.title}\n${chalk.dim(issue.url)}`]);
    }
    console.log(table.toString());
  }

  for (const err of snapshot.errors) {
    console.log(chalk.yellow(`⚠ ${err.check}: ${err.message}`));
  }
}

// ── check ───────────────────────────────────────────────────────
program
  .command("check")
  .description("Run every check once, notify and print the results")
  .option("--no-notify", "Skip the desktop notification")
  .action(async (opts: { notify: boolean }) => {
    const ctx = createAppContext({ configPath: configPath(), notify: opts.notify, verbose: verbose() });
    try {
      const spinner = ora("Checking pull requests and flags...").start();
      const { snapshot, notified } = await ctx.coordinator.runCycle();
      spinner.succeed(
        `${snapshot.needsAttention.length} need attention, ${snapshot.recentlyReviewed.length} recently reviewed`,
      );
      printSnapshot(snapshot);
      if (notified.length > 0) console.log(chalk.dim(`notified about ${notified.length} issue(s)`));
    } finally {
      ctx.store.close();
    }
  });

// ── watch ───────────────────────────────────────────────────────
program
  .command("watch")
  .description("Check on a fixed interval and serve the dashboard")
  .option("-p, --port <number>", "Dashboard port")
  .option("--no-dashboard", "Do not serve the dashboard")
  .option("--no-notify", "Skip desktop notifications")
  .action(async (opts: { port?: string; dashboard: boolean; notify: boolean }) => {
    const ctx = createAppContext({ configPath: configPath(), notify: opts.notify, verbose: verbose() });
    const port = opts.port ? parseInt(opts.port, 10) : ctx.config.dashboard.port;
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
      throw new ConfigError(`invalid port: ${opts.port}`);
    }

    const server = opts.dashboard
      ? serveDashboard(createDashboardRoutes(ctx.coordinator), ctx.config.dashboard.host, port)
      : undefined;
    ctx.coordinator.start();

    const shutdown = async (signal: string) => {
      logger.info(`Received ${signal}, finishing current cycle...`);
      await ctx.coordinator.stop();
      server?.close();
      ctx.store.close();
      logger.success("Stopped");
    };
    for (const signal of ["SIGINT", "SIGTERM"] as const) {
      process.once(signal, () => {
        shutdown(signal).catch((err: unknown) => {
          logger.error("shutdown failed", err);
          process.exitCode = 1;
        });
      });
    }
  });

// ── seen ────────────────────────────────────────────────────────
program
  .command("seen <identity>")
  .description("Mark an issue as seen, hiding it from notifications for 30 minutes")
  .action((identity: string) => {
    const config = loadConfig(configPath());
    const store = new StateStore(resolve(config.state_path));
    try {
      store.markSeen(identity, new Date());
      console.log(chalk.green("✓") + ` Marked ${identity} as seen`);
    } finally {
      store.close();
    }
  });

// ── status ──────────────────────────────────────────────────────
program
  .command("status")
  .description("Show state store stats")
  .action(() => {
    const config = loadConfig(configPath());
    const store = new StateStore(resolve(config.state_path));
    try {
      const stats = store.getStats(new Date());
      const lastCheck = store.getMeta("last_check");
      console.log(chalk.bold("nudge status\n"));
      console.log(`  State:      ${resolve(config.state_path)}`);
      console.log(`  Records:    ${stats.records}`);
      console.log(`  Seen:       ${stats.seenRecently} in the last 30min`);
      console.log(`  Throttled:  ${stats.throttled} notified in the last 19min`);
      console.log(`  Last check: ${lastCheck ?? "never"}`);
      console.log(`  Dashboard:  http://${config.dashboard.host}:${config.dashboard.port}/`);
    } finally {
      store.close();
    }
  });

// ── reset ───────────────────────────────────────────────────────
program
  .command("reset")
  .description("Delete the state database, forgetting what was seen and notified")
  .option("-y, --yes", "Skip confirmation prompt")
  .action(async (opts: { yes?: boolean }) => {
    const dbPath = resolve(loadConfig(configPath()).state_path);
    if (!existsSync(dbPath)) {
      console.log(chalk.yellow("No state database found at " + dbPath));
      return;
    }

    if (!opts.yes) {
      const rl = createInterface({ input: process.stdin, output: process.stdout });
      const answer = await new Promise<string>((resolve) => {
        rl.question(chalk.yellow("Delete all seen and notification state? (y/N) "), resolve);
      });
      rl.close();
      if (answer.toLowerCase() !== "y") {
        console.log("Cancelled.");
        return;
      }
    }

    unlinkSync(dbPath);
    for (const suffix of ["-wal", "-shm"]) {
      if (existsSync(dbPath + suffix)) unlinkSync(dbPath + suffix);
    }
    console.log(chalk.green("✓") + " State deleted.");
  });

// ── init ────────────────────────────────────────────────────────
const CONFIG_TEMPLATE = `version: 1
# repo: owner/name            # only look at PRs in this repository
ready_label: ready-to-merge
interval_minutes: 10
check_timeout_seconds: 60
dashboard:
  host: 127.0.0.1
  port: 9845
notify:
  command: ${process.platform === "darwin" ? "terminal-notifier" : "notify-send"}   # or none
`;

program
  .command("init")
  .description(`Write a starter ${DEFAULT_CONFIG_FILE}`)
  .option("-f, --force", "Overwrite an existing file")
  .action((opts: { force?: boolean }) => {
    const p = resolve(process.cwd(), DEFAULT_CONFIG_FILE);
    if (existsSync(p) && !opts.force) {
      console.log(chalk.yellow(`${p} already exists. use --force to overwrite`));
      return;
    }
    writeFileSync(p, CONFIG_TEMPLATE);
    console.log(chalk.green("✓") + ` Wrote ${p}`);
    console.log(
      chalk.dim("Set GITHUB_TOKEN, LAUNCHDARKLY_API_TOKEN and LAUNCHDARKLY_MAINTAINER_ID in .env, then run `nudge watch`"),
    );
  });

program.parseAsync().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    console.error(chalk.red(err.message));
  } else {
    logger.error(errorMessage(err), err);
  }
  process.exit(1);
});
