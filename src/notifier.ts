import { spawn } from "node:child_process";
import { NotifyError } from "./errors.js";
import type { Issue, Notifier } from "./types.js";

const NOTIFY_TIMEOUT_MS = 10_000;

export type NotifyCommand = "terminal-notifier" | "notify-send" | "none";

function plural(n: number, word: string): string {
  return `${n} ${word}${n === 1 ? "" : "s"}`;
}

/** One-line summary for a notification, counting PR and flag issues. */
export function summarize(issues: Issue[]): string {
  const prs = issues.filter((i) => i.category.startsWith("Pr")).length;
  const flags = issues.length - prs;
  if (prs === 0) return `${plural(flags, "flag")} waiting`;
  if (flags === 0) return `${plural(prs, "PR")} need attention`;
  return `${plural(prs, "PR")} and ${plural(flags, "flag")} need attention`;
}

export function notifierArgs(command: Exclude<NotifyCommand, "none">, title: string, summary: string, target: string) {
  if (command === "terminal-notifier") {
    return ["-title", title, "-message", summary, "-sound", "Blow", "-open", target];
  }
  return ["--app-name", title, title, `${summary}\n${target}`];
}

export class DesktopNotifier implements Notifier {
  constructor(
    private command: NotifyCommand,
    private title = "nudge",
  ) {}

  notify(summary: string, target: string): Promise<void> {
    const command = this.command;
    if (command === "none") return Promise.resolve();

    return new Promise((resolve, reject) => {
      const proc = spawn(command, notifierArgs(command, this.title, summary, target), {
        stdio: ["ignore", "ignore", "pipe"],
      });
      let stderr = "";
      const timer = setTimeout(() => proc.kill("SIGTERM"), NOTIFY_TIMEOUT_MS);

      proc.stderr.on("data", (data: Buffer) => {
        stderr += data.toString();
      });
      proc.on("error", (err) => {
        clearTimeout(timer);
        reject(new NotifyError(`failed to run ${command}: ${err.message}`, err));
      });
      proc.on("close", (code) => {
        clearTimeout(timer);
        if (code === 0) resolve();
        else reject(new NotifyError(`${command} exited with code ${code}${stderr ? `: ${stderr.trim()}` : ""}`));
      });
    });
  }
}
