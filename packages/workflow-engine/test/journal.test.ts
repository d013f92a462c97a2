import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Journal, resolveArtifactPath } from "../src/index.js";

describe("journal", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "voxdesk-journal-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("appends logs and audit records as JSON lines", async () => {
    const journal = new Journal({ workspaceDir: dir, now: () => 0 });
    journal.log("info", "State: idle → awaiting_profile", { subject: "chrome" });
    const record = journal.audit({
      sessionId: "s1",
      action: "launch",
      target: "chrome",
      outcome: "ok",
      detail: { command: "google-chrome" },
    });
    await journal.flush();

    expect(resolveArtifactPath(dir, "logs")).toBe(join(dir, ".voxdesk", "logs.jsonl"));
    const logs = (await readFile(join(dir, ".voxdesk", "logs.jsonl"), "utf-8")).trim().split("\n");
    expect(logs.map((l) => JSON.parse(l))).toEqual([
      {
        level: "info",
        message: "State: idle → awaiting_profile",
        data: { subject: "chrome" },
        timestamp: "1970-01-01T00:00:00.000Z",
      },
    ]);

    const actions = (await readFile(join(dir, ".voxdesk", "audit", "actions.jsonl"), "utf-8")).trim().split("\n");
    expect(JSON.parse(actions[0])).toEqual(record);
    expect(record.atMs).toBe(0);
    expect(journal.lastAction()).toEqual(record);
  });

  it("keeps a bounded in-memory tail", () => {
    const journal = new Journal({ tailSize: 2 });
    journal.log("info", "one");
    journal.log("info", "two");
    journal.log("info", "three");
    expect(journal.tail().map((l) => l.message)).toEqual(["two", "three"]);
  });

  it("records a failed write as a warning without throwing", async () => {
    const blocker = join(dir, "not-a-dir");
    await writeFile(blocker, "");
    const journal = new Journal({ workspaceDir: blocker });

    journal.log("info", "hello");
    await journal.flush();

    const warn = journal.tail().find((l) => l.level === "warn");
    expect(warn?.message).toBe("Artifact write failed");
    expect(warn?.data?.type).toBe("logs");
  });
});
