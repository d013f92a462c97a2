import { spawn } from "node:child_process";
import type { ActionOutcome, CommandRunner } from "@voxdesk/desktop-state";
import type { AppLauncher, LaunchTarget, WebNavigator } from "../types/actions.js";

/** Starts a process that outlives the shell. Resolves once the OS accepted or refused it. */
export type DetachedSpawn = (command: string, args: readonly string[]) => Promise<ActionOutcome>;

export const spawnDetached: DetachedSpawn = (command, args) =>
  new Promise<ActionOutcome>((resolve) => {
    const child = spawn(command, [...args], { detached: true, stdio: "ignore" });
    child.once("spawn", () => {
      child.unref();
      resolve(child.pid === undefined ? { kind: "ok" } : { kind: "ok", pid: child.pid });
    });
    child.once("error", (err) => resolve({ kind: "failed", reason: err.message }));
  });

export function createProcessLauncher(run: CommandRunner, start: DetachedSpawn = spawnDetached): AppLauncher {
  return {
    launch: (target: LaunchTarget) => start(target.command, target.args),

    async close(app, processNames, pid) {
      if (pid !== undefined) {
        const killed = await run("kill", [String(pid)]);
        if (killed.kind === "ok") return { kind: "ok" };
      }
      // the tracked instance is gone or unknown; fall back to the name
      const results = await Promise.all(processNames.map((name) => run("pkill", ["-f", name])));
      if (results.some((r) => r.kind === "ok")) return { kind: "ok" };
      if (results.some((r) => r.kind === "missing")) return { kind: "failed", reason: "pkill is not installed" };
      return { kind: "failed", reason: `no running process for ${app}` };
    },
  };
}

/** Opens URLs in the desktop's default browser. */
export function createDesktopNavigator(start: DetachedSpawn = spawnDetached, opener = "xdg-open"): WebNavigator {
  return {
    open: (url) => start(opener, [url]),
  };
}
