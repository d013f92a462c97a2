/** One top-level window as seen at sampling time. Never cached by the sampler. */
export interface WindowRecord {
  windowId: string;
  pid: number;
  /** Lower-cased process name (`comm`), or the WM_CLASS instance when unknown. */
  processName: string;
  /** WM_CLASS as reported, e.g. "google-chrome.Google-chrome". */
  wmClass: string;
  windowTitle: string;
  isFocused: boolean;
  /** 0 = top of the stacking order; absent when the stacking order could not be read. */
  focusRank?: number;
}

export interface ProcessRecord {
  pid: number;
  name: string;
}

export type SamplingUnavailable = { kind: "sampling_unavailable"; reason: string };

export type SampleResult<T> = { kind: "ok"; records: T[] } | SamplingUnavailable;

export type CountUnit = "windows" | "processes";

export type CountResult = { kind: "ok"; count: number } | SamplingUnavailable;

export type SummaryResult = { kind: "ok"; text: string; apps: AppSummary[] } | SamplingUnavailable;

export interface AppSummary {
  name: string;
  windows: number;
  processes: number;
}

/** `pid` is set when the action started a process. */
export type ActionOutcome = { kind: "ok"; pid?: number } | { kind: "failed"; reason: string };

export type CommandResult =
  | { kind: "ok"; stdout: string }
  | { kind: "missing"; command: string }
  | { kind: "failed"; reason: string };

/** Runs an external utility. Implementations never throw. */
export type CommandRunner = (command: string, args: readonly string[]) => Promise<CommandResult>;
