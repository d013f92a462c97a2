/**
 * Routing table for utterances arriving while no workflow is active.
 * Evaluated in ascending priority; the first route whose matcher accepts the utterance runs.
 *
 *   5 help          15 tab-count    25 how-many      40 open-browser   60 switch-to
 *  10 forget        16 list-tabs    30 is-open       50 search         70 close-site
 *  20 list-apps                                                        75 close-reference
 *  80 close-app     90 open-site    95 open-app
 */
import type { ContextEntry } from "@voxdesk/context-memory";
import {
  matchAlias,
  type ActionOutcome,
  type AliasEntry,
  type DesktopSampler,
  type Tab,
  type TabLocator,
  type WindowActions,
} from "@voxdesk/desktop-state";
import type { AliasTable, AppConfig, SiteConfig } from "../config/alias-table.js";
import type { Phrasebook, PhraseKey, PhraseVars } from "../config/phrasebook.js";
import type { AppLauncher, WebNavigator } from "../types/actions.js";
import type { Language } from "../types/language.js";
import type { AuditAction } from "../types/log.js";
import { pidMetadata, type WorkflowEngine } from "../workflow/engine.js";
import { extractSearchQuery, isOpenCommand, openObject, titleCase } from "../workflow/utterance.js";
import { defineRoute, sortRoutes, type AnyRoute } from "./route.js";

export interface RouteContext {
  engine: WorkflowEngine;
  sampler: DesktopSampler;
  tabs: TabLocator;
  windows: WindowActions;
  launcher: AppLauncher;
  navigator: WebNavigator;
  aliases: AliasTable;
  phrases: Phrasebook;
}

/** Something that runs as a process: a configured browser or app. */
interface KnownApp {
  id: string;
  label: string;
  processNames: readonly string[];
}

/** Titles spoken before the remainder is summarized as "and K more". */
export const SPOKEN_TAB_TITLES = 5;

export function summarizeTabs(tabs: readonly Tab[], lang: Language, phrases: Phrasebook): string {
  const titles = tabs.map((t) => t.title || t.browser);
  if (titles.length === 0) return phrases.say("tabsNone", lang);
  if (titles.length === 1) return phrases.say("tabsOne", lang, { titles: titles[0] });
  const spoken = titles.slice(0, SPOKEN_TAB_TITLES).join(", ");
  if (titles.length <= SPOKEN_TAB_TITLES) return phrases.say("tabsMany", lang, { count: titles.length, titles: spoken });
  return phrases.say("tabsMore", lang, { count: titles.length, titles: spoken, more: titles.length - SPOKEN_TAB_TITLES });
}

export function createRoutes(ctx: RouteContext): AnyRoute[] {
  const { engine, sampler, tabs, phrases, aliases } = ctx;
  const say = (key: PhraseKey, lang: Language, vars?: PhraseVars) => phrases.say(key, lang, vars);

  const appTable: AliasEntry<AppConfig>[] = aliases.apps.map((a) => ({ aliases: a.aliases, value: a }));
  const knownTable: AliasEntry<KnownApp>[] = [
    ...aliases.browsers.map((b) => ({
      aliases: b.aliases,
      value: { id: b.id, label: b.label ?? titleCase(b.id), processNames: b.windowPatterns },
    })),
    ...aliases.apps.map((a) => ({
      aliases: [a.id, ...a.aliases],
      value: { id: a.id, label: a.label ?? titleCase(a.id), processNames: a.processNames },
    })),
  ];
  const knownApp = (text: string) => matchAlias(text, knownTable)?.value ?? null;
  const siteTable: AliasEntry<SiteConfig>[] = aliases.sites.map((s) => ({ aliases: s.keywords, value: s }));
  const siteLabel = (site: Pick<SiteConfig, "id" | "label">) => site.label ?? titleCase(site.id);

  const record = (action: AuditAction, target: string, outcome: ActionOutcome, detail: Record<string, string> = {}) => {
    const full = outcome.kind === "failed" ? { ...detail, reason: outcome.reason } : detail;
    engine.journal.audit({ sessionId: null, action, target, outcome: outcome.kind, detail: full });
  };

  /** Pid of the instance last launched under this id, when the context still holds it. */
  const trackedPid = (appId: string, entry?: ContextEntry): number | undefined => {
    const source = entry ?? [...engine.context.entries()].reverse().find((e) => e.kind === "app" && e.identifier === appId);
    const pid = Number(source?.metadata.pid);
    return Number.isInteger(pid) && pid > 0 ? pid : undefined;
  };

  const closeApp = async (app: KnownApp, lang: Language, entry?: ContextEntry) => {
    const pid = trackedPid(app.id, entry);
    const outcome = await ctx.launcher.close(app.id, app.processNames, pid);
    record("close", app.id, outcome, pid === undefined ? {} : { pid: String(pid) });
    return outcome.kind === "ok" ? say("closed", lang, { name: app.label }) : say("actionFailed", lang);
  };

  const closeSiteTab = async (site: Pick<SiteConfig, "id" | "label">, lang: Language) => {
    const lookup = await tabs.findTabAnywhere(site.id);
    switch (lookup.kind) {
      case "sampling_unavailable":
        return say("samplingUnavailable", lang);
      case "not_found":
      case "browser_not_running":
        return say("siteNotOpen", lang, { site: siteLabel(site) });
      case "found": {
        const outcome = await tabs.closeTab(lookup.tab);
        record("close_tab", site.id, outcome, { windowId: lookup.tab.windowId, title: lookup.tab.title });
        return outcome.kind === "ok" ? say("closed", lang, { name: siteLabel(site) }) : say("actionFailed", lang);
      }
    }
  };

  const closeWindow = async (entry: ContextEntry, lang: Language) => {
    const windowId = entry.metadata.windowId ?? entry.identifier;
    const outcome = await ctx.windows.close(windowId);
    record("close_tab", windowId, outcome, { title: entry.metadata.title ?? "" });
    return outcome.kind === "ok" ? say("closed", lang, { name: entry.metadata.title ?? windowId }) : say("actionFailed", lang);
  };

  /** Focuses an open tab of the site anywhere. Null when no tab could be focused. */
  const focusSite = async (site: SiteConfig): Promise<Tab | null> => {
    const lookup = await tabs.findTabAnywhere(site.id);
    if (lookup.kind !== "found") return null;
    const outcome = await tabs.switchToTab(lookup.tab);
    record("focus", site.id, outcome, { windowId: lookup.tab.windowId, title: lookup.tab.title });
    if (outcome.kind !== "ok") return null;
    engine.context.remember("website", site.id, { url: site.url, browser: lookup.tab.browser, via: "tab" });
    engine.context.remember("window", lookup.tab.windowId, { windowId: lookup.tab.windowId, title: lookup.tab.title });
    return lookup.tab;
  };

  return sortRoutes([
    defineRoute({
      name: "help",
      priority: 5,
      match: ({ normalized }) => (/^(?:help|what can i say)\b|^مدد$/.test(normalized) ? true : null),
      run: (_m, { lang }) => engine.help(lang),
    }),
    defineRoute({
      name: "forget",
      priority: 10,
      match: ({ normalized }) => (/^forget\b|بھول جاؤ$/.test(normalized) ? true : null),
      run: (_m, { lang }) => {
        const dropped = engine.context.size;
        engine.context.clear();
        engine.journal.log("info", "Context cleared", { dropped });
        return say("forgot", lang);
      },
    }),
    defineRoute({
      name: "tab-count",
      priority: 15,
      match: ({ normalized }) => (/\bhow many\b.*\btabs?\b/.test(normalized) ? true : null),
      run: async (_m, { lang }) => {
        const listed = await tabs.listAllTabs();
        if (listed.kind !== "ok") return say("samplingUnavailable", lang);
        return say("tabCount", lang, { count: listed.tabs.length });
      },
    }),
    defineRoute({
      name: "list-tabs",
      priority: 16,
      match: ({ normalized }) => (/\b(?:list|show|what|which)\b.*\btabs?\b|ٹیبز/.test(normalized) ? true : null),
      run: async (_m, { lang }) => {
        const listed = await tabs.listAllTabs();
        if (listed.kind !== "ok") return say("samplingUnavailable", lang);
        return summarizeTabs(listed.tabs, lang, phrases);
      },
    }),
    defineRoute({
      name: "list-apps",
      priority: 20,
      match: ({ normalized }) =>
        /\b(?:what|which|list|show)\b.*\b(?:apps?|applications?|programs?|running)\b/.test(normalized) ? true : null,
      run: async (_m, { lang }) => {
        const summary = await sampler.summarize();
        if (summary.kind !== "ok") return say("samplingUnavailable", lang);
        return summary.text;
      },
    }),
    defineRoute({
      name: "how-many",
      priority: 25,
      match: ({ normalized }) => {
        if (!/\bhow many\b/.test(normalized)) return null;
        const unit = /\bprocess(?:es)?\b/.test(normalized) ? ("processes" as const) : ("windows" as const);
        const app = knownApp(normalized);
        if (app) return { app, unit };
        if (/\bwindows?\b/.test(normalized)) return { app: null, unit };
        return null;
      },
      run: async ({ app, unit }, { lang }) => {
        const counted = app ? await sampler.countInstances(app.id, unit) : await sampler.countWindows();
        if (counted.kind !== "ok") return say("samplingUnavailable", lang);
        if (!app) return say("windowCount", lang, { count: counted.count });
        return say("instanceCount", lang, { app: app.label, unit, count: counted.count });
      },
    }),
    defineRoute({
      name: "is-open",
      priority: 30,
      match: ({ normalized }) => /^(?:is|are) (.+?) (?:open|running)\??$/.exec(normalized)?.[1] ?? null,
      run: async (subject, { lang }) => {
        const app = knownApp(subject);
        if (app) {
          const counted = await sampler.countInstances(app.id);
          if (counted.kind !== "ok") return say("samplingUnavailable", lang);
          return say(counted.count > 0 ? "siteIsOpen" : "siteNotOpen", lang, { site: app.label });
        }
        const site = engine.matchSite(subject);
        if (!site) return say("siteNotOpen", lang, { site: subject });
        const open = await tabs.isSiteOpen(site.id);
        if (typeof open !== "boolean") return say("samplingUnavailable", lang);
        return say(open ? "siteIsOpen" : "siteNotOpen", lang, { site: siteLabel(site) });
      },
    }),
    defineRoute({
      name: "open-browser",
      priority: 40,
      match: ({ normalized }) => (isOpenCommand(normalized) ? engine.matchBrowser(openObject(normalized)) : null),
      run: async (browser, { text, lang }) => (await engine.openBrowser(browser, text, lang)).text,
    }),
    defineRoute({
      name: "search",
      priority: 50,
      match: ({ text }) => extractSearchQuery(text),
      run: (query, { lang }) => (query ? engine.search(query, lang) : say("queryRetry", lang)),
    }),
    defineRoute({
      name: "switch-to",
      priority: 60,
      match: ({ normalized }) => {
        const object = /^(?:switch|go) to (.+)$/.exec(normalized)?.[1];
        return object ? engine.matchSite(object) : null;
      },
      run: async (site, { lang }) => {
        const lookup = await tabs.findTabAnywhere(site.id);
        if (lookup.kind === "sampling_unavailable") return say("samplingUnavailable", lang);
        if (lookup.kind !== "found") return say("siteNotOpen", lang, { site: siteLabel(site) });
        const tab = await focusSite(site);
        return tab ? say("switched", lang, { name: siteLabel(site) }) : say("actionFailed", lang);
      },
    }),
    defineRoute({
      name: "close-site",
      priority: 70,
      match: ({ normalized }) => {
        const object = /^close (?:the )?(.+?)(?: tab)?$/.exec(normalized)?.[1];
        if (!object) return null;
        const site = matchAlias(object, siteTable);
        if (!site) return null;
        // "close google chrome" names the app; a longer app alias outranks the site keyword
        const app = matchAlias(object, knownTable);
        return app && app.alias.length > site.alias.length ? null : site.value;
      },
      run: (site, { lang }) => closeSiteTab(site, lang),
    }),
    defineRoute({
      name: "close-reference",
      priority: 75,
      match: ({ normalized }) => (/^close (?:it|that|this)$|^(?:اسے|یہ) بند کرو$/.test(normalized) ? true : null),
      run: async (_m, { lang }) => {
        const ref = engine.context.resolveReference();
        if (ref.kind !== "found") return say("noReference", lang);
        const entry = ref.entry;
        engine.journal.log("info", "Reference resolved", { kind: entry.kind, identifier: entry.identifier });
        switch (entry.kind) {
          case "website":
            return closeSiteTab(aliases.sites.find((s) => s.id === entry.identifier) ?? { id: entry.identifier }, lang);
          case "window":
            return closeWindow(entry, lang);
          case "app": {
            const app = knownTable.find((k) => k.value.id === entry.identifier)?.value;
            const known = app ?? { id: entry.identifier, label: titleCase(entry.identifier), processNames: [entry.identifier] };
            return closeApp(known, lang, entry);
          }
        }
      },
    }),
    defineRoute({
      name: "close-app",
      priority: 80,
      match: ({ normalized }) => {
        const object = /^close (.+)$/.exec(normalized)?.[1];
        return object ? knownApp(object) : null;
      },
      run: (app, { lang }) => closeApp(app, lang),
    }),
    defineRoute({
      name: "open-site",
      priority: 90,
      match: ({ normalized }) => (isOpenCommand(normalized) ? engine.matchSite(openObject(normalized)) : null),
      run: async (site, { lang }) => {
        if (await focusSite(site)) return say("switched", lang, { name: siteLabel(site) });
        const outcome = await ctx.navigator.open(site.url);
        record("open_url", site.id, outcome, { url: site.url });
        if (outcome.kind !== "ok") return say("actionFailed", lang);
        engine.context.remember("website", site.id, { url: site.url, via: "url" });
        return say("siteOpenedNoSearch", lang, { site: siteLabel(site) });
      },
    }),
    defineRoute({
      name: "open-app",
      priority: 95,
      match: ({ normalized }) => (isOpenCommand(normalized) ? (matchAlias(openObject(normalized), appTable)?.value ?? null) : null),
      run: async (app, { lang }) => {
        const label = app.label ?? titleCase(app.id);
        const outcome = await ctx.launcher.launch({ app: app.id, command: app.command, args: [] });
        record("launch", app.id, outcome, { command: app.command, ...pidMetadata(outcome) });
        if (outcome.kind !== "ok") return say("launchFailed", lang, { app: label });
        engine.context.remember("app", app.id, { command: app.command, ...pidMetadata(outcome) });
        return say("appOpened", lang, { app: label });
      },
    }),
  ]);
}
