export type ContextKind = "app" | "website" | "window";

export const CONTEXT_KINDS: readonly ContextKind[] = ["app", "website", "window"];

export interface ContextEntry {
  id: string;
  kind: ContextKind;
  /** Normalized name, e.g. "chrome" or "youtube". */
  identifier: string;
  /** Monotonic milliseconds; never decreases across entries of one store. */
  timestamp: number;
  /** Insertion sequence, used only to order entries that share a timestamp. */
  seq: number;
  metadata: Readonly<Record<string, string>>;
}

export type ReferenceResult =
  | { kind: "found"; entry: ContextEntry; fallback: boolean }
  | { kind: "no_recent_entry"; requested?: ContextKind };

export interface ResolveOptions {
  /** When set, never fall back to an entry of another kind. */
  strict?: boolean;
}

export type Clock = () => number;
