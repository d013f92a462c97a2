/**
 * Context Store
 * Bounded ring of the entities the user interacted with, newest last.
 * Answers "what does 'it' mean right now?" by recency.
 */
import { performance } from "node:perf_hooks";
import { nanoid } from "nanoid";
import type { Clock, ContextEntry, ContextKind, ReferenceResult, ResolveOptions } from "./types.js";

/** History depth. Fixed: not configurable at runtime. */
export const HISTORY_DEPTH = 10;

const monotonicNow: Clock = () => performance.now();

export class ContextStore {
  private ring: Array<ContextEntry | undefined>;
  private head = 0; // slot the next entry is written to
  private count = 0;
  private seq = 0;
  private lastTimestamp = Number.NEGATIVE_INFINITY;
  private clock: Clock;

  readonly capacity = HISTORY_DEPTH;

  constructor(clock: Clock = monotonicNow) {
    this.clock = clock;
    this.ring = new Array<ContextEntry | undefined>(this.capacity).fill(undefined);
  }

  get size(): number {
    return this.count;
  }

  remember(kind: ContextKind, identifier: string, metadata: Record<string, string> = {}): ContextEntry {
    // a clock that steps backwards must not break chronological order
    const timestamp = Math.max(this.clock(), this.lastTimestamp);
    this.lastTimestamp = timestamp;

    const entry: ContextEntry = Object.freeze({
      id: nanoid(),
      kind,
      identifier: identifier.trim().toLowerCase(),
      timestamp,
      seq: this.seq++,
      metadata: Object.freeze({ ...metadata }),
    });

    this.ring[this.head] = entry;
    this.head = (this.head + 1) % this.capacity;
    if (this.count < this.capacity) this.count++;
    return entry;
  }

  /**
   * Most recent entry, optionally of one kind. Without `strict`, a kind with no
   * entries falls back to the most recent entry of any kind.
   */
  resolveReference(kind?: ContextKind, opts: ResolveOptions = {}): ReferenceResult {
    const all = this.entries();
    if (kind) {
      const match = latest(all.filter((e) => e.kind === kind));
      if (match) return { kind: "found", entry: match, fallback: false };
      if (opts.strict) return { kind: "no_recent_entry", requested: kind };
    }
    const any = latest(all);
    if (!any) return { kind: "no_recent_entry", requested: kind };
    return { kind: "found", entry: any, fallback: kind !== undefined };
  }

  /** Entries oldest first. */
  entries(): ContextEntry[] {
    const out: ContextEntry[] = [];
    const start = (this.head - this.count + this.capacity) % this.capacity;
    for (let i = 0; i < this.count; i++) {
      const entry = this.ring[(start + i) % this.capacity];
      if (entry) out.push(entry);
    }
    return out;
  }

  recent(n = 3): ContextEntry[] {
    if (n <= 0) return [];
    return this.entries().slice(-n);
  }

  clear() {
    this.ring.fill(undefined);
    this.head = 0;
    this.count = 0;
  }
}

function latest(entries: ContextEntry[]): ContextEntry | undefined {
  let best: ContextEntry | undefined;
  for (const e of entries) {
    if (!best || e.timestamp > best.timestamp || (e.timestamp === best.timestamp && e.seq > best.seq)) {
      best = e;
    }
  }
  return best;
}
