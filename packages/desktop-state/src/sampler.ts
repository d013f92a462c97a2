/**
 * Desktop State Sampler
 * Point-in-time view of running apps. Every call samples again; callers own any caching.
 * An unavailable sample means "unknown", never "nothing is running".
 */
import type { DesktopProbe } from "./probe.js";
import type {
  AppSummary,
  CountResult,
  CountUnit,
  ProcessRecord,
  SampleResult,
  SummaryResult,
  WindowRecord,
} from "./types.js";

/** App name -> process / WM_CLASS fragments. */
export type AppPatternTable = Record<string, readonly string[]>;

export const DEFAULT_APP_PATTERNS: AppPatternTable = {
  chrome: ["chrome", "google-chrome", "chromium"],
  firefox: ["firefox"],
  code: ["code", "code-oss"],
  terminal: ["gnome-terminal", "konsole", "xterm"],
  files: ["nautilus", "dolphin", "thunar"],
  calculator: ["gnome-calculator", "kcalc"],
  settings: ["gnome-control-center", "systemsettings"],
  music: ["rhythmbox", "spotify"],
  videos: ["totem", "vlc"],
};

export class DesktopSampler {
  private probe: DesktopProbe;
  private patterns: AppPatternTable;

  constructor(probe: DesktopProbe, patterns: AppPatternTable = DEFAULT_APP_PATTERNS) {
    this.probe = probe;
    this.patterns = patterns;
  }

  listRunningApps(): Promise<SampleResult<WindowRecord>> {
    return this.probe.listWindows();
  }

  listProcesses(): Promise<SampleResult<ProcessRecord>> {
    return this.probe.listProcesses();
  }

  /** Fragments an app name or alias is matched by. Unknown names match themselves. */
  patternsFor(appNameOrAlias: string): string[] {
    const name = appNameOrAlias.trim().toLowerCase();
    const known = this.patterns[name];
    if (known) return [name, ...known.map((p) => p.toLowerCase())];
    for (const [app, fragments] of Object.entries(this.patterns)) {
      if (fragments.some((f) => f.toLowerCase() === name)) return [app, ...fragments.map((p) => p.toLowerCase())];
    }
    return [name];
  }

  windowMatches(record: WindowRecord, appNameOrAlias: string): boolean {
    return matchesAny([record.processName, record.wmClass.toLowerCase()], this.patternsFor(appNameOrAlias));
  }

  async countInstances(appNameOrAlias: string, unit: CountUnit = "windows"): Promise<CountResult> {
    const patterns = this.patternsFor(appNameOrAlias);
    if (!patterns[0]) return { kind: "ok", count: 0 };

    const windows = await this.probe.listWindows();
    if (windows.kind !== "ok") return windows;
    const matching = windows.records.filter((w) => matchesAny([w.processName, w.wmClass.toLowerCase()], patterns));

    if (unit === "windows") {
      return { kind: "ok", count: new Set(matching.map((w) => w.windowId)).size };
    }

    const processes = await this.probe.listProcesses();
    if (processes.kind !== "ok") {
      // windowless processes are invisible without ps; count what the windows tell us
      return { kind: "ok", count: new Set(matching.map((w) => w.pid)).size };
    }
    const pids = processes.records.filter((p) => matchesAny([p.name], patterns)).map((p) => p.pid);
    return { kind: "ok", count: new Set(pids).size };
  }

  async countWindows(): Promise<CountResult> {
    const windows = await this.probe.listWindows();
    if (windows.kind !== "ok") return windows;
    return { kind: "ok", count: new Set(windows.records.map((w) => w.windowId)).size };
  }

  async summarize(): Promise<SummaryResult> {
    const windows = await this.probe.listWindows();
    if (windows.kind !== "ok") return windows;
    const processes = await this.probe.listProcesses();

    const groups = new Map<string, { windows: Set<string>; pids: Set<number> }>();
    const group = (name: string) => {
      let g = groups.get(name);
      if (!g) {
        g = { windows: new Set(), pids: new Set() };
        groups.set(name, g);
      }
      return g;
    };

    for (const w of windows.records) {
      const g = group(this.appNameOf([w.processName, w.wmClass.toLowerCase()]) ?? w.processName);
      g.windows.add(w.windowId);
      g.pids.add(w.pid);
    }
    if (processes.kind === "ok") {
      // only known apps: listing every daemon would drown the answer
      for (const p of processes.records) {
        const app = this.appNameOf([p.name]);
        if (app) group(app).pids.add(p.pid);
      }
    }

    const apps: AppSummary[] = [...groups.entries()]
      .map(([name, g]) => ({ name, windows: g.windows.size, processes: g.pids.size }))
      .sort((a, b) => b.windows - a.windows || a.name.localeCompare(b.name));

    return { kind: "ok", text: renderSummary(apps), apps };
  }

  private appNameOf(fields: string[]): string | undefined {
    for (const [app, fragments] of Object.entries(this.patterns)) {
      if (matchesAny(fields, [app, ...fragments])) return app;
    }
    return undefined;
  }
}

/** Longest name `ps -o comm` prints; longer names are cut to this length. */
const COMM_LENGTH = 15;

function matchesAny(fields: string[], patterns: string[]): boolean {
  return fields.some((f) => patterns.some((p) => p.length > 0 && nameMatches(f.toLowerCase(), p.toLowerCase())));
}

function nameMatches(field: string, pattern: string): boolean {
  if (field.includes(pattern)) return true;
  return field.length === COMM_LENGTH && pattern.startsWith(field);
}

function plural(n: number, one: string, many: string) {
  return `${n} ${n === 1 ? one : many}`;
}

function titleCase(name: string) {
  return name.replace(/(^|[\s-])(\p{L})/gu, (_, sep: string, ch: string) => sep + ch.toUpperCase());
}

export function renderSummary(apps: AppSummary[]): string {
  if (apps.length === 0) return "No applications detected";
  const lines = [`Found ${apps.length} running application${apps.length === 1 ? "" : "s"}:`];
  for (const app of apps) {
    const parts = [plural(app.processes, "process", "processes")];
    if (app.windows > 0) parts.push(plural(app.windows, "window", "windows"));
    lines.push(`  • ${titleCase(app.name)}: ${parts.join(", ")}`);
  }
  return lines.join("\n");
}
