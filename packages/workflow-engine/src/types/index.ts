export type { WorkflowState, WorkflowSession, SessionSnapshot, ResetReason, EngineReply } from "./session.js";
export type { Language } from "./language.js";
export { LANGUAGES } from "./language.js";
export type { AppLauncher, LaunchTarget, Speaker, WebNavigator } from "./actions.js";
export type { AuditAction, AuditActionRecord, ExecutionLog, LogLevel } from "./log.js";
