/**
 * Tab/Resource Locator
 * Derives a browser's open tabs from sampled window titles and decides which window a
 * site keyword refers to. Focusing or closing is delegated to WindowActions.
 */
import { matchAlias, normalizePhrase, type AliasEntry } from "./alias-match.js";
import type { DesktopSampler } from "./sampler.js";
import type { ActionOutcome, SamplingUnavailable, WindowRecord } from "./types.js";
import type { WindowActions } from "./window-actions.js";

export interface BrowserWindowSpec {
  id: string;
  /** Process-name / WM_CLASS fragments identifying the browser's windows. */
  windowPatterns: readonly string[];
  /** Suffixes the browser appends to page titles, stripped from tab titles. */
  titleSuffixes: readonly string[];
}

export interface SitePatternSpec {
  id: string;
  /** Title fragments that identify the site. */
  patterns: readonly string[];
}

export interface Tab {
  title: string;
  browser: string;
  windowId: string;
  pid: number;
  isFocused: boolean;
  focusRank?: number;
  matchedSite?: string;
}

export type TabListResult =
  | { kind: "ok"; tabs: Tab[] }
  | { kind: "browser_not_running"; browser: string }
  | SamplingUnavailable;

export type TabLookup =
  | { kind: "found"; tab: Tab; candidates: number }
  | { kind: "not_found"; browser: string; site: string }
  | { kind: "browser_not_running"; browser: string }
  | SamplingUnavailable;

export interface TabLocatorOptions {
  browsers: readonly BrowserWindowSpec[];
  sites: readonly SitePatternSpec[];
  actions: WindowActions;
}

export class TabLocator {
  private sampler: DesktopSampler;
  private browsers: readonly BrowserWindowSpec[];
  private sites: readonly SitePatternSpec[];
  private siteTable: AliasEntry<string>[];
  private actions: WindowActions;

  constructor(sampler: DesktopSampler, opts: TabLocatorOptions) {
    this.sampler = sampler;
    this.browsers = opts.browsers;
    this.sites = opts.sites;
    this.siteTable = opts.sites.map((s) => ({ aliases: s.patterns, value: s.id }));
    this.actions = opts.actions;
  }

  async listTabs(browserName: string): Promise<TabListResult> {
    const browser = this.browserSpec(browserName);
    const sample = await this.sampler.listRunningApps();
    if (sample.kind !== "ok") return sample;

    const tabs = sample.records.filter((w) => isBrowserWindow(w, browser)).map((w) => this.toTab(w, browser));
    if (tabs.length === 0) return { kind: "browser_not_running", browser: browser.id };
    return { kind: "ok", tabs };
  }

  /** Tabs of every configured browser, in browser-table order. */
  async listAllTabs(): Promise<{ kind: "ok"; tabs: Tab[] } | SamplingUnavailable> {
    const sample = await this.sampler.listRunningApps();
    if (sample.kind !== "ok") return sample;

    const tabs: Tab[] = [];
    for (const browser of this.browsers) {
      for (const w of sample.records) {
        if (isBrowserWindow(w, browser)) tabs.push(this.toTab(w, browser));
      }
    }
    return { kind: "ok", tabs };
  }

  async findTab(browserName: string, siteKeyword: string): Promise<TabLookup> {
    const listed = await this.listTabs(browserName);
    if (listed.kind !== "ok") return listed;
    return this.pick(listed.tabs, browserName, siteKeyword);
  }

  /** Like findTab, across every configured browser. */
  async findTabAnywhere(siteKeyword: string): Promise<TabLookup> {
    const listed = await this.listAllTabs();
    if (listed.kind !== "ok") return listed;
    return this.pick(listed.tabs, "any", siteKeyword);
  }

  async isSiteOpen(siteKeyword: string): Promise<boolean | SamplingUnavailable> {
    const res = await this.findTabAnywhere(siteKeyword);
    if (res.kind === "sampling_unavailable") return res;
    return res.kind === "found";
  }

  switchToTab(tab: Tab): Promise<ActionOutcome> {
    return this.actions.focus(tab.windowId);
  }

  closeTab(tab: Tab): Promise<ActionOutcome> {
    return this.actions.close(tab.windowId);
  }

  private pick(tabs: Tab[], browser: string, siteKeyword: string): TabLookup {
    const site = normalizePhrase(siteKeyword);
    const patterns = this.sitePatterns(site);
    const matches = tabs.filter((t) => {
      const title = t.title.toLowerCase();
      return patterns.some((p) => title.includes(p));
    });

    if (matches.length === 0) return { kind: "not_found", browser, site };
    return { kind: "found", tab: mostRecentlyFocused(matches), candidates: matches.length };
  }

  private sitePatterns(site: string): string[] {
    const spec = this.sites.find((s) => s.id === site);
    const patterns = spec ? [spec.id, ...spec.patterns] : [site];
    return patterns.map(normalizePhrase).filter(Boolean);
  }

  private browserSpec(name: string): BrowserWindowSpec {
    const id = normalizePhrase(name);
    return this.browsers.find((b) => b.id === id) ?? { id, windowPatterns: [id], titleSuffixes: [] };
  }

  private toTab(w: WindowRecord, browser: BrowserWindowSpec): Tab {
    const title = stripSuffix(w.windowTitle, browser.titleSuffixes);
    const tab: Tab = {
      title,
      browser: browser.id,
      windowId: w.windowId,
      pid: w.pid,
      isFocused: w.isFocused,
    };
    if (w.focusRank !== undefined) tab.focusRank = w.focusRank;
    const site = matchAlias(title, this.siteTable);
    if (site) tab.matchedSite = site.value;
    return tab;
  }
}

function isBrowserWindow(w: WindowRecord, browser: BrowserWindowSpec): boolean {
  const fields = [w.processName, w.wmClass.toLowerCase()];
  if (browser.windowPatterns.some((p) => fields.some((f) => f.includes(p.toLowerCase())))) return true;
  return browser.titleSuffixes.some((s) => s.length > 0 && w.windowTitle.endsWith(s));
}

function stripSuffix(title: string, suffixes: readonly string[]): string {
  for (const s of suffixes) {
    if (s && title.endsWith(s)) return title.slice(0, -s.length).trim();
  }
  return title.trim();
}

/**
 * Lowest focus rank wins; tabs without a rank lose to ranked ones.
 * With no ranks at all the first enumerated tab wins.
 */
function mostRecentlyFocused(tabs: Tab[]): Tab {
  let best = tabs[0];
  for (const t of tabs.slice(1)) {
    if (t.focusRank === undefined) continue;
    if (best.focusRank === undefined || t.focusRank < best.focusRank) best = t;
  }
  return best;
}
