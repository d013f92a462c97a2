/**
 * Journal
 * In-memory tail of execution logs and audit records, mirrored to JSONL artifacts
 * when a workspace directory is configured. Never read back: it records, it does not restore.
 */
import { nanoid } from "nanoid";
import type { AuditActionRecord, ExecutionLog, LogLevel } from "../types/log.js";
import { writeArtifact, type ArtifactType } from "./artifact-writer.js";

export interface JournalOptions {
  workspaceDir?: string;
  /** Records kept in memory per stream. */
  tailSize?: number;
  now?: () => number;
}

export class Journal {
  private logs: ExecutionLog[] = [];
  private actions: AuditActionRecord[] = [];
  private pending: Promise<void> = Promise.resolve();
  private workspaceDir?: string;
  private tailSize: number;
  private now: () => number;

  constructor(opts: JournalOptions = {}) {
    this.workspaceDir = opts.workspaceDir;
    this.tailSize = opts.tailSize ?? 200;
    this.now = opts.now ?? Date.now;
  }

  log(level: LogLevel, message: string, data?: Record<string, unknown>): ExecutionLog {
    const entry: ExecutionLog = { level, message, data, timestamp: new Date(this.now()).toISOString() };
    push(this.logs, entry, this.tailSize);
    this.persist("logs", entry);
    return entry;
  }

  audit(record: Omit<AuditActionRecord, "id" | "atMs">): AuditActionRecord {
    const full: AuditActionRecord = { id: nanoid(), atMs: this.now(), ...record };
    push(this.actions, full, this.tailSize);
    this.persist("audit_actions", full);
    return full;
  }

  tail(): ExecutionLog[] {
    return [...this.logs];
  }

  auditTrail(): AuditActionRecord[] {
    return [...this.actions];
  }

  lastAction(): AuditActionRecord | undefined {
    return this.actions[this.actions.length - 1];
  }

  /** Resolves once every queued artifact write has settled. */
  flush(): Promise<void> {
    return this.pending;
  }

  private persist(type: ArtifactType, payload: unknown) {
    const dir = this.workspaceDir;
    if (!dir) return;
    this.pending = this.pending
      .then(() => writeArtifact(dir, type, payload))
      .catch((err: unknown) => {
        // memory only
        push(
          this.logs,
          { level: "warn", message: "Artifact write failed", data: { type, error: String(err) }, timestamp: new Date(this.now()).toISOString() },
          this.tailSize,
        );
      });
  }
}

function push<T>(list: T[], item: T, max: number) {
  list.push(item);
  if (list.length > max) list.splice(0, list.length - max);
}
