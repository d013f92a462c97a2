import { ContextStore } from "@voxdesk/context-memory";
import {
  DEFAULT_APP_PATTERNS,
  DesktopSampler,
  TabLocator,
  createExecFileRunner,
  createWmctrlWindowActions,
  createX11Probe,
  type AppPatternTable,
  type CommandRunner,
} from "@voxdesk/desktop-state";
import { createDesktopNavigator, createProcessLauncher } from "./adapters/process-launcher.js";
import { loadAliasTable, type AliasTable } from "./config/alias-table.js";
import type { EngineConfig } from "./config/engine-config.js";
import { Phrasebook } from "./config/phrasebook.js";
import { Journal } from "./execution/journal.js";
import { CommandRouter } from "./routing/router.js";
import { WorkflowEngine } from "./workflow/engine.js";

export interface VoxdeskOptions {
  /** Enables JSONL artifacts under `<workspaceDir>/.voxdesk`. */
  workspaceDir?: string;
  aliasesPath?: string;
  phrasesPath?: string;
  engine?: Partial<EngineConfig>;
  run?: CommandRunner;
}

export interface Voxdesk {
  router: CommandRouter;
  engine: WorkflowEngine;
  phrases: Phrasebook;
  journal: Journal;
}

/** Process-name patterns for every configured browser and app, over the built-in ones. */
export function appPatternTable(aliases: AliasTable): AppPatternTable {
  const table: Record<string, readonly string[]> = { ...DEFAULT_APP_PATTERNS };
  for (const b of aliases.browsers) table[b.id] = b.windowPatterns;
  for (const a of aliases.apps) table[a.id] = a.processNames;
  return table;
}

/** Wires the engine to the real desktop. Throws ConfigurationError on a bad alias table or phrasebook. */
export function createVoxdesk(opts: VoxdeskOptions = {}): Voxdesk {
  const aliases = loadAliasTable(opts.aliasesPath);
  const phrases = Phrasebook.load(opts.phrasesPath);
  const run = opts.run ?? createExecFileRunner();

  const sampler = new DesktopSampler(createX11Probe(run), appPatternTable(aliases));
  const windows = createWmctrlWindowActions(run);
  const tabs = new TabLocator(sampler, { browsers: aliases.browsers, sites: aliases.sites, actions: windows });
  const launcher = createProcessLauncher(run);
  const navigator = createDesktopNavigator();
  const journal = new Journal({ workspaceDir: opts.workspaceDir });

  const engine = new WorkflowEngine(
    { context: new ContextStore(), tabs, launcher, navigator, aliases, phrases, journal },
    opts.engine,
  );
  const router = new CommandRouter({ engine, sampler, tabs, windows, launcher, navigator, aliases, phrases });
  return { router, engine, phrases, journal };
}
