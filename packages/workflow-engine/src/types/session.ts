export type WorkflowState = "idle" | "awaiting_profile" | "awaiting_target" | "awaiting_query";

export interface WorkflowSession {
  sessionId: string;
  state: Exclude<WorkflowState, "idle">;
  /** Browser the workflow is about, e.g. "chrome". */
  subject: string;
  /** Slot name -> value collected across turns. */
  accumulated: Record<string, string>;
  /** Utterances handled by this session so far. */
  turns: number;
  startedAtMs: number;
  lastTurnAtMs: number;
}

export type SessionSnapshot =
  | { state: "idle" }
  | {
      state: WorkflowSession["state"];
      sessionId: string;
      subject: string;
      accumulated: Record<string, string>;
      turns: number;
    };

export type ResetReason = "completed" | "cancelled" | "turn_ceiling" | "timeout";

export interface EngineReply {
  text: string;
  state: WorkflowState;
  /** False when the engine had no active session to give the utterance to. */
  consumed: boolean;
}
