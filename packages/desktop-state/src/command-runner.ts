import { execFile } from "node:child_process";
import type { CommandResult, CommandRunner } from "./types.js";

export const COMMAND_TIMEOUT_MS = 2000;

function errorCode(err: unknown): string | undefined {
  if (typeof err === "object" && err !== null && "code" in err) {
    return typeof err.code === "string" ? err.code : undefined;
  }
  return undefined;
}

export function createExecFileRunner(timeoutMs = COMMAND_TIMEOUT_MS): CommandRunner {
  return (command, args) =>
    new Promise<CommandResult>((resolve) => {
      execFile(command, [...args], { timeout: timeoutMs, encoding: "utf8" }, (err, stdout, stderr) => {
        if (!err) {
          resolve({ kind: "ok", stdout });
          return;
        }
        if (errorCode(err) === "ENOENT") {
          resolve({ kind: "missing", command });
          return;
        }
        resolve({ kind: "failed", reason: (stderr || err.message).trim() });
      });
    });
}
