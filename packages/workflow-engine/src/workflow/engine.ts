/**
 * Workflow State Machine
 * Owns the single in-flight WorkflowSession and the Context Store. Every utterance is
 * offered to the active session first; only a slot fill advances it and only a cancel
 * phrase, completion, the turn ceiling or the idle timeout ends it.
 */
import { nanoid } from "nanoid";
import type { ContextStore } from "@voxdesk/context-memory";
import { matchAlias, normalizePhrase, type ActionOutcome, type AliasEntry, type TabLocator } from "@voxdesk/desktop-state";
import type { AliasTable, BrowserConfig, BrowserProfile, SiteConfig } from "../config/alias-table.js";
import { ConfigurationError } from "../config/errors.js";
import { resolveEngineConfig, type EngineConfig } from "../config/engine-config.js";
import type { Phrasebook, PhraseKey, PhraseVars } from "../config/phrasebook.js";
import { Journal } from "../execution/journal.js";
import type { AppLauncher, LaunchTarget, WebNavigator } from "../types/actions.js";
import type { Language } from "../types/language.js";
import type { AuditAction } from "../types/log.js";
import type { EngineReply, ResetReason, SessionSnapshot, WorkflowSession, WorkflowState } from "../types/session.js";
import { collapse, extractSearchQuery, isBarePhrase, isOpenCommand, listPhrase, titleCase } from "./utterance.js";

export interface WorkflowEngineDeps {
  context: ContextStore;
  tabs: TabLocator;
  launcher: AppLauncher;
  navigator: WebNavigator;
  aliases: AliasTable;
  phrases: Phrasebook;
  journal?: Journal;
  /** Wall clock for session timing; defaults to Date.now. */
  clock?: () => number;
}

type SearchableSite = SiteConfig & { searchUrl: string };

/** Result of one turn inside the session. */
interface Step {
  text: string;
  advanced: boolean;
}

export class WorkflowEngine {
  readonly config: EngineConfig;
  readonly context: ContextStore;
  readonly journal: Journal;

  private tabs: TabLocator;
  private launcher: AppLauncher;
  private navigator: WebNavigator;
  private aliases: AliasTable;
  private phrases: Phrasebook;
  private clock: () => number;
  private session: WorkflowSession | null = null;

  private browserTable: AliasEntry<BrowserConfig>[];
  private siteTable: AliasEntry<SiteConfig>[];
  private defaultSearch: SearchableSite;

  constructor(deps: WorkflowEngineDeps, config: Partial<EngineConfig> = {}) {
    this.config = resolveEngineConfig(config);
    this.context = deps.context;
    this.tabs = deps.tabs;
    this.launcher = deps.launcher;
    this.navigator = deps.navigator;
    this.aliases = deps.aliases;
    this.phrases = deps.phrases;
    this.journal = deps.journal ?? new Journal();
    this.clock = deps.clock ?? Date.now;

    this.browserTable = deps.aliases.browsers.map((b) => ({ aliases: b.aliases, value: b }));
    this.siteTable = deps.aliases.sites.map((s) => ({ aliases: s.keywords, value: s }));

    const fallback = deps.aliases.sites.find((s) => s.id === deps.aliases.defaultSearchSite);
    if (!fallback || !isSearchable(fallback)) {
      throw new ConfigurationError("Default search site is not usable", [
        `defaultSearchSite: "${deps.aliases.defaultSearchSite}" is missing or has no searchUrl`,
      ]);
    }
    this.defaultSearch = fallback;
  }

  get state(): WorkflowState {
    this.expireIfIdle();
    return this.session?.state ?? "idle";
  }

  /** True while a session is non-idle. Resets a session that has timed out. */
  isActive(): boolean {
    this.expireIfIdle();
    return this.session !== null;
  }

  snapshot(): SessionSnapshot {
    this.expireIfIdle();
    const s = this.session;
    if (!s) return { state: "idle" };
    return { state: s.state, sessionId: s.sessionId, subject: s.subject, accumulated: { ...s.accumulated }, turns: s.turns };
  }

  matchBrowser(text: string): BrowserConfig | null {
    return matchAlias(text, this.browserTable)?.value ?? null;
  }

  matchSite(text: string): SiteConfig | null {
    return matchAlias(text, this.siteTable)?.value ?? null;
  }

  /** Whether the most recent app the user touched is a configured browser. */
  isBrowserTask(): boolean {
    const ref = this.context.resolveReference("app", { strict: true });
    if (ref.kind !== "found") return false;
    return this.aliases.browsers.some((b) => b.id === ref.entry.identifier);
  }

  help(lang: Language = this.config.defaultLanguage): string {
    const s = this.isActive() ? this.session : null;
    if (!s) return this.say("helpIdle", lang);
    switch (s.state) {
      case "awaiting_profile": {
        const browser = this.browserById(s.subject);
        return this.say("helpProfile", lang, {
          browser: this.label(browser ?? s.subject),
          profiles: browser ? this.profileChoices(browser, lang) : "",
        });
      }
      case "awaiting_target":
        return this.say("helpTarget", lang, { sites: this.siteChoices(lang) });
      case "awaiting_query":
        return this.say("helpQuery", lang, { site: this.label(this.siteById(s.accumulated.site ?? "") ?? s.subject) });
    }
  }

  /**
   * Entry point for "open <browser>". Launches the browser and, when it takes profiles,
   * starts a session; a profile named in the same utterance skips the profile turn.
   */
  async openBrowser(browser: BrowserConfig, utterance: string, lang: Language = this.config.defaultLanguage): Promise<EngineReply> {
    if (this.isActive()) {
      return { text: this.say("busy", lang), state: this.state, consumed: false };
    }

    const profile = browser.supportsProfiles ? this.matchProfile(browser, utterance) : null;
    const target = profile ? profileLaunch(browser, profile) : plainLaunch(browser);
    const outcome = await this.launch(target, null);

    if (outcome.kind === "failed") {
      this.journal.log("warn", "Browser launch failed", { browser: browser.id, reason: outcome.reason });
      return { text: this.say("launchFailed", lang, { app: this.label(browser) }), state: "idle", consumed: true };
    }

    if (profile) {
      this.context.remember("app", browser.id, { profile: profile.id, ...pidMetadata(outcome) });
      this.begin(browser.id, "awaiting_target", { profile: profile.id });
      return { text: this.say("profileOpened", lang, { profile: profile.id }), state: "awaiting_target", consumed: true };
    }

    this.context.remember("app", browser.id, pidMetadata(outcome));
    if (!browser.supportsProfiles) {
      return { text: this.say("browserOpened", lang, { browser: this.label(browser) }), state: "idle", consumed: true };
    }

    this.begin(browser.id, "awaiting_profile", {});
    return {
      text: this.say("profilePrompt", lang, { browser: this.label(browser), profiles: this.profileChoices(browser, lang) }),
      state: "awaiting_profile",
      consumed: true,
    };
  }

  /** Offers an utterance to the active session. Without one the utterance is not consumed. */
  async handle(text: string, lang: Language = this.config.defaultLanguage): Promise<EngineReply> {
    this.expireIfIdle();
    const session = this.session;
    if (!session) {
      return { text: this.say("unknown", lang), state: "idle", consumed: false };
    }

    session.turns++;
    session.lastTurnAtMs = this.clock();
    const utterance = normalizePhrase(text);
    this.journal.log("info", "Turn", { sessionId: session.sessionId, state: session.state, turn: session.turns, utterance });

    if (this.isCancel(utterance)) {
      this.reset("cancelled");
      return { text: this.say("cancelled", lang), state: "idle", consumed: true };
    }

    let step: Step;
    if (/^(?:help|what can i say|مدد)$/.test(utterance)) {
      step = { text: this.help(lang), advanced: false };
    } else if (this.isStartCommand(utterance)) {
      this.journal.log("info", "Start command rejected while session active", { sessionId: session.sessionId, utterance });
      step = { text: this.say("busy", lang), advanced: false };
    } else {
      step = await this.advance(session, text, lang);
    }

    if (!step.advanced && this.session === session && session.turns >= this.config.maxTurns) {
      this.reset("turn_ceiling");
      return { text: this.say("turnCeiling", lang), state: "idle", consumed: true };
    }
    return { text: step.text, state: this.state, consumed: true };
  }

  cancel(lang: Language = this.config.defaultLanguage): string {
    if (this.isActive()) this.reset("cancelled");
    return this.say("cancelled", lang);
  }

  /**
   * Searches the most recent website when it has a search URL, else the default search site.
   * Does not touch the session.
   */
  async search(query: string, lang: Language = this.config.defaultLanguage): Promise<string> {
    return this.runSearch(this.searchSite(), query, lang);
  }

  private advance(session: WorkflowSession, text: string, lang: Language): Promise<Step> {
    switch (session.state) {
      case "awaiting_profile":
        return this.onProfile(session, normalizePhrase(text), lang);
      case "awaiting_target":
        return this.onTarget(session, text, lang);
      case "awaiting_query":
        return this.onQuery(text, lang);
    }
  }

  private async onProfile(session: WorkflowSession, utterance: string, lang: Language): Promise<Step> {
    const browser = this.browserById(session.subject);
    if (!browser) {
      this.reset("cancelled");
      return { text: this.say("actionFailed", lang), advanced: true };
    }

    const profile = this.matchProfile(browser, utterance);
    if (!profile) {
      return { text: this.say("profileRetry", lang, { profiles: this.profileChoices(browser, lang) }), advanced: false };
    }

    const outcome = await this.launch(profileLaunch(browser, profile), session.sessionId);
    if (outcome.kind === "failed") {
      // the browser is up; the profile pick can be retried
      return { text: this.say("profileFailed", lang, { profile: profile.id }), advanced: false };
    }

    this.context.remember("app", browser.id, { profile: profile.id, ...pidMetadata(outcome) });
    session.accumulated.profile = profile.id;
    this.transition(session, "awaiting_target");
    return { text: this.say("profileOpened", lang, { profile: profile.id }), advanced: true };
  }

  private async onTarget(session: WorkflowSession, text: string, lang: Language): Promise<Step> {
    const query = extractSearchQuery(text);
    if (query !== null) {
      if (!query) return { text: this.say("queryRetry", lang), advanced: false };
      const reply = await this.runSearch(this.searchSite(), query, lang, session.sessionId);
      this.reset("completed");
      return { text: reply, advanced: true };
    }

    const site = this.matchSite(text);
    if (!site) return { text: this.say("targetRetry", lang, { sites: this.siteChoices(lang) }), advanced: false };

    const shown = await this.showSite(site, session);
    if (shown.outcome.kind === "failed") {
      return { text: this.say("siteFailed", lang), advanced: false };
    }

    this.context.remember("website", site.id, { url: site.url, browser: session.subject, via: shown.via });
    session.accumulated.site = site.id;

    if (!isSearchable(site)) {
      this.reset("completed");
      return { text: this.say("siteOpenedNoSearch", lang, { site: this.label(site) }), advanced: true };
    }

    this.transition(session, "awaiting_query");
    const key: PhraseKey = shown.via === "tab" ? "siteSwitched" : "siteOpened";
    return { text: this.say(key, lang, { site: this.label(site) }), advanced: true };
  }

  private async onQuery(text: string, lang: Language): Promise<Step> {
    const query = extractSearchQuery(text) ?? collapse(text);
    if (!query) return { text: this.say("queryRetry", lang), advanced: false };
    const sessionId = this.session?.sessionId ?? null;
    const reply = await this.runSearch(this.searchSite(), query, lang, sessionId);
    this.reset("completed");
    return { text: reply, advanced: true };
  }

  /** Focuses an already open tab of the site, else opens its URL. */
  private async showSite(site: SiteConfig, session: WorkflowSession): Promise<{ outcome: ActionOutcome; via: "tab" | "url" }> {
    const lookup = await this.tabs.findTab(session.subject, site.id);
    this.journal.log("debug", "Tab lookup", { browser: session.subject, site: site.id, result: lookup.kind });

    if (lookup.kind === "found") {
      const focused = await this.tabs.switchToTab(lookup.tab);
      this.record("focus", site.id, focused, session.sessionId, { windowId: lookup.tab.windowId, title: lookup.tab.title });
      if (focused.kind === "ok") return { outcome: focused, via: "tab" };
    }

    const opened = await this.navigator.open(site.url);
    this.record("open_url", site.id, opened, session.sessionId, { url: site.url });
    return { outcome: opened, via: "url" };
  }

  private async runSearch(site: SearchableSite, query: string, lang: Language, sessionId: string | null = null): Promise<string> {
    const url = site.searchUrl.replace("{query}", encodeQuery(query));
    const outcome = await this.navigator.open(url);
    this.record("search", site.id, outcome, sessionId, { query, url });
    if (outcome.kind === "failed") return this.say("searchFailed", lang);
    return this.say("searching", lang, { site: this.label(site), query });
  }

  private searchSite(): SearchableSite {
    const ref = this.context.resolveReference("website", { strict: true });
    if (ref.kind === "found") {
      const site = this.siteById(ref.entry.identifier);
      if (site && isSearchable(site)) return site;
    }
    return this.defaultSearch;
  }

  private async launch(target: LaunchTarget, sessionId: string | null): Promise<ActionOutcome> {
    const outcome = await this.launcher.launch(target);
    const detail: Record<string, string> = { command: [target.command, ...target.args].join(" ") };
    if (target.profile) detail.profile = target.profile;
    this.record("launch", target.app, outcome, sessionId, { ...detail, ...pidMetadata(outcome) });
    return outcome;
  }

  private record(action: AuditAction, target: string, outcome: ActionOutcome, sessionId: string | null, detail: Record<string, string>) {
    const full = outcome.kind === "failed" ? { ...detail, reason: outcome.reason } : detail;
    this.journal.audit({ sessionId, action, target, outcome: outcome.kind, detail: full });
    if (outcome.kind === "failed") {
      this.journal.log("warn", `Action ${action} failed`, { target, reason: outcome.reason });
    }
  }

  private begin(subject: string, state: WorkflowSession["state"], accumulated: Record<string, string>) {
    const now = this.clock();
    this.session = {
      sessionId: nanoid(),
      state,
      subject,
      accumulated,
      turns: 0,
      startedAtMs: now,
      lastTurnAtMs: now,
    };
    this.journal.log("info", `State: idle → ${state}`, { sessionId: this.session.sessionId, subject });
  }

  private transition(session: WorkflowSession, next: WorkflowSession["state"]) {
    this.journal.log("info", `State: ${session.state} → ${next}`, { sessionId: session.sessionId });
    session.state = next;
  }

  private reset(reason: ResetReason) {
    const s = this.session;
    if (!s) return;
    this.journal.log("info", `State: ${s.state} → idle`, { sessionId: s.sessionId, reason, turns: s.turns });
    this.session = null;
  }

  private expireIfIdle() {
    const s = this.session;
    if (s && this.clock() - s.lastTurnAtMs > this.config.sessionTimeoutMs) {
      this.reset("timeout");
    }
  }

  private isCancel(utterance: string): boolean {
    return this.config.cancelPhrases.some((p) => isBarePhrase(utterance, p));
  }

  private isStartCommand(utterance: string): boolean {
    return isOpenCommand(utterance) && this.matchBrowser(utterance) !== null;
  }

  private matchProfile(browser: BrowserConfig, utterance: string): BrowserProfile | null {
    const table = browser.profiles.map((p) => ({ aliases: p.aliases, value: p }));
    return matchAlias(utterance, table)?.value ?? null;
  }

  private browserById(id: string): BrowserConfig | undefined {
    return this.aliases.browsers.find((b) => b.id === id);
  }

  private siteById(id: string): SiteConfig | undefined {
    return this.aliases.sites.find((s) => s.id === id);
  }

  private profileChoices(browser: BrowserConfig, lang: Language): string {
    return listPhrase(browser.profiles.map((p) => p.aliases[0]), lang);
  }

  private siteChoices(lang: Language): string {
    return listPhrase(this.aliases.sites.slice(0, 3).map((s) => this.label(s)), lang);
  }

  private label(item: { id: string; label?: string } | string): string {
    if (typeof item === "string") return titleCase(item);
    return item.label ?? titleCase(item.id);
  }

  private say(key: PhraseKey, lang: Language, vars?: PhraseVars): string {
    return this.phrases.say(key, lang, vars);
  }
}

function isSearchable(site: SiteConfig): site is SearchableSite {
  return typeof site.searchUrl === "string";
}

function plainLaunch(browser: BrowserConfig): LaunchTarget {
  return { app: browser.id, command: browser.command, args: [] };
}

function profileLaunch(browser: BrowserConfig, profile: BrowserProfile): LaunchTarget {
  const template = browser.profileArg ?? "";
  const args = template ? [template.replace("{profile}", profile.directory)] : [];
  return { app: browser.id, command: browser.command, args, profile: profile.id };
}

/** Context metadata for the process an action started, if any. */
export function pidMetadata(outcome: ActionOutcome): Record<string, string> {
  return outcome.kind === "ok" && outcome.pid !== undefined ? { pid: String(outcome.pid) } : {};
}

/** Query-string encoding with spaces as "+". */
export function encodeQuery(query: string): string {
  return encodeURIComponent(query).replace(/%20/g, "+");
}
