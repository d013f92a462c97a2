import { ContextStore } from "@voxdesk/context-memory";
import {
  DesktopSampler,
  TabLocator,
  type ActionOutcome,
  type DesktopProbe,
  type ProcessRecord,
  type SampleResult,
  type WindowActions,
  type WindowRecord,
} from "@voxdesk/desktop-state";
import {
  CommandRouter,
  Journal,
  Phrasebook,
  WorkflowEngine,
  appPatternTable,
  loadAliasTable,
  type AppLauncher,
  type EngineConfig,
  type LaunchTarget,
  type WebNavigator,
} from "../src/index.js";

export const ALIASES = loadAliasTable();
export const PHRASES = Phrasebook.load();

const FAILED: ActionOutcome = { kind: "failed", reason: "test failure" };
const OK: ActionOutcome = { kind: "ok" };

export function chromeWindow(windowId: string, title: string, extra: Partial<WindowRecord> = {}): WindowRecord {
  return {
    windowId,
    pid: 2001,
    processName: "chrome",
    wmClass: "google-chrome.Google-chrome",
    windowTitle: `${title} - Google Chrome`,
    isFocused: false,
    ...extra,
  };
}

export class FakeDesktop implements DesktopProbe {
  windows: WindowRecord[] = [];
  processes: ProcessRecord[] | null = null;
  available = true;

  async listWindows(): Promise<SampleResult<WindowRecord>> {
    if (!this.available) return { kind: "sampling_unavailable", reason: "wmctrl is not installed" };
    return { kind: "ok", records: [...this.windows] };
  }

  async listProcesses(): Promise<SampleResult<ProcessRecord>> {
    if (!this.processes) return { kind: "sampling_unavailable", reason: "ps is not installed" };
    return { kind: "ok", records: [...this.processes] };
  }
}

export class FakeLauncher implements AppLauncher {
  launches: LaunchTarget[] = [];
  closes: Array<{ app: string; processNames: readonly string[]; pid?: number }> = [];
  failLaunch: (target: LaunchTarget) => boolean = () => false;
  /** When set, successful launches report this pid and increment it. */
  nextPid: number | null = null;

  async launch(target: LaunchTarget): Promise<ActionOutcome> {
    this.launches.push(target);
    if (this.failLaunch(target)) return FAILED;
    if (this.nextPid === null) return OK;
    return { kind: "ok", pid: this.nextPid++ };
  }

  async close(app: string, processNames: readonly string[], pid?: number): Promise<ActionOutcome> {
    this.closes.push({ app, processNames, pid });
    return OK;
  }
}

export class FakeNavigator implements WebNavigator {
  opened: string[] = [];
  fail = false;

  async open(url: string): Promise<ActionOutcome> {
    this.opened.push(url);
    return this.fail ? FAILED : OK;
  }
}

export class FakeWindows implements WindowActions {
  focused: string[] = [];
  closed: string[] = [];

  async focus(windowId: string): Promise<ActionOutcome> {
    this.focused.push(windowId);
    return OK;
  }

  async close(windowId: string): Promise<ActionOutcome> {
    this.closed.push(windowId);
    return OK;
  }
}

export function harness(config: Partial<EngineConfig> = {}) {
  let now = 1_000;
  const desktop = new FakeDesktop();
  const launcher = new FakeLauncher();
  const navigator = new FakeNavigator();
  const windows = new FakeWindows();
  const journal = new Journal({ now: () => now });
  const context = new ContextStore(() => now);

  const sampler = new DesktopSampler(desktop, appPatternTable(ALIASES));
  const tabs = new TabLocator(sampler, { browsers: ALIASES.browsers, sites: ALIASES.sites, actions: windows });
  const engine = new WorkflowEngine(
    { context, tabs, launcher, navigator, aliases: ALIASES, phrases: PHRASES, journal, clock: () => now },
    config,
  );
  const router = new CommandRouter({ engine, sampler, tabs, windows, launcher, navigator, aliases: ALIASES, phrases: PHRASES });

  return {
    desktop,
    launcher,
    navigator,
    windows,
    journal,
    context,
    engine,
    router,
    advance(ms: number) {
      now += ms;
    },
    /** Routes each utterance in order and returns the spoken replies. */
    async say(...utterances: string[]) {
      const replies: string[] = [];
      for (const u of utterances) replies.push((await router.route(u)).responseText);
      return replies;
    },
  };
}
