export type LogLevel = "debug" | "info" | "warn" | "error";

export interface ExecutionLog {
  level: LogLevel;
  message: string;
  data?: Record<string, unknown>;
  timestamp: string;
}

export type AuditAction = "launch" | "close" | "open_url" | "focus" | "close_tab" | "search";

export interface AuditActionRecord {
  id: string;
  sessionId: string | null;
  atMs: number;
  action: AuditAction;
  /** App, site or window the action was aimed at. */
  target: string;
  outcome: "ok" | "failed";
  detail: Record<string, string>;
}
