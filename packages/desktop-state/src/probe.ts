/**
 * X11 desktop probe
 * Shells out to wmctrl (windows), ps (processes) and xprop (focus / stacking order).
 * wmctrl is required; the other two only enrich the records.
 */
import type { CommandRunner, ProcessRecord, SampleResult, WindowRecord } from "./types.js";

export interface DesktopProbe {
  listWindows(): Promise<SampleResult<WindowRecord>>;
  listProcesses(): Promise<SampleResult<ProcessRecord>>;
}

export interface RawWindow {
  windowId: string;
  pid: number;
  wmClass: string;
  title: string;
}

const WMCTRL_LINE = /^(0x[0-9a-f]+)\s+(-?\d+)\s+(\d+)\s+(\S+)\s+(\S+)(?:\s(.*))?$/i;

/** Parses `wmctrl -lpx` output. */
export function parseWmctrlList(stdout: string): RawWindow[] {
  const windows: RawWindow[] = [];
  for (const line of stdout.split("\n")) {
    const m = WMCTRL_LINE.exec(line.trim());
    if (!m) continue;
    windows.push({
      windowId: m[1],
      pid: Number(m[3]),
      wmClass: m[4],
      title: (m[6] ?? "").trim(),
    });
  }
  return windows;
}

/** Parses `ps -eo pid=,comm=` output. */
export function parseProcessList(stdout: string): ProcessRecord[] {
  const out: ProcessRecord[] = [];
  for (const line of stdout.split("\n")) {
    const m = /^\s*(\d+)\s+(.+?)\s*$/.exec(line);
    if (!m) continue;
    out.push({ pid: Number(m[1]), name: m[2].toLowerCase() });
  }
  return out;
}

/** Window ids from an xprop root property, in the order xprop lists them. */
export function parseXpropWindowIds(stdout: string): string[] {
  const idx = stdout.indexOf("#");
  if (idx < 0) return [];
  return stdout
    .slice(idx + 1)
    .split(",")
    .map((s) => s.trim())
    .filter((s) => /^0x[0-9a-f]+$/i.test(s))
    .map(canonicalWindowId);
}

/** wmctrl zero-pads ids, xprop does not. */
export function canonicalWindowId(id: string): string {
  const n = Number.parseInt(id, 16);
  return Number.isNaN(n) ? id.toLowerCase() : `0x${n.toString(16)}`;
}

function classInstance(wmClass: string): string {
  return (wmClass.split(".")[0] ?? wmClass).toLowerCase();
}

export function createX11Probe(run: CommandRunner): DesktopProbe {
  async function listProcesses(): Promise<SampleResult<ProcessRecord>> {
    const res = await run("ps", ["-eo", "pid=,comm="]);
    if (res.kind === "missing") return { kind: "sampling_unavailable", reason: "ps is not installed" };
    if (res.kind === "failed") return { kind: "sampling_unavailable", reason: res.reason };
    return { kind: "ok", records: parseProcessList(res.stdout) };
  }

  async function readRootWindows(property: string): Promise<string[]> {
    const res = await run("xprop", ["-root", property]);
    return res.kind === "ok" ? parseXpropWindowIds(res.stdout) : [];
  }

  async function listWindows(): Promise<SampleResult<WindowRecord>> {
    const res = await run("wmctrl", ["-lpx"]);
    if (res.kind === "missing") {
      return { kind: "sampling_unavailable", reason: "wmctrl is not installed" };
    }
    if (res.kind === "failed") {
      return { kind: "sampling_unavailable", reason: res.reason };
    }

    const raw = parseWmctrlList(res.stdout);
    const [processes, active, stacking] = await Promise.all([
      listProcesses(),
      readRootWindows("_NET_ACTIVE_WINDOW"),
      readRootWindows("_NET_CLIENT_LIST_STACKING"),
    ]);

    const names = new Map<number, string>();
    if (processes.kind === "ok") {
      for (const p of processes.records) names.set(p.pid, p.name);
    }
    const activeId = active[0];
    // xprop lists the stack bottom to top
    const ranks = new Map<string, number>();
    stacking.forEach((id, i) => ranks.set(id, stacking.length - 1 - i));

    const records = raw.map((w): WindowRecord => {
      const id = canonicalWindowId(w.windowId);
      const record: WindowRecord = {
        windowId: w.windowId,
        pid: w.pid,
        processName: names.get(w.pid) ?? classInstance(w.wmClass),
        wmClass: w.wmClass,
        windowTitle: w.title,
        isFocused: activeId !== undefined && id === activeId,
      };
      const rank = ranks.get(id);
      if (rank !== undefined) record.focusRank = rank;
      return record;
    });
    return { kind: "ok", records };
  }

  return { listWindows, listProcesses };
}
