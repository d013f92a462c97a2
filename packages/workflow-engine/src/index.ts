export * from "./types/index.js";

export { ConfigurationError } from "./config/errors.js";
export {
  AliasTableSchema,
  DEFAULT_ALIAS_TABLE_PATH,
  loadAliasTable,
  parseAliasTable,
  type AliasTable,
  type AppConfig,
  type BrowserConfig,
  type BrowserProfile,
  type SiteConfig,
} from "./config/alias-table.js";
export { DEFAULT_PHRASEBOOK_PATH, PHRASE_KEYS, Phrasebook, type PhraseKey, type PhraseVars } from "./config/phrasebook.js";
export { DEFAULT_ENGINE_CONFIG, resolveEngineConfig, type EngineConfig } from "./config/engine-config.js";

export { Journal, type JournalOptions } from "./execution/journal.js";
export { resolveArtifactPath, resolveVoxdeskRoot, writeArtifact, type ArtifactType } from "./execution/artifact-writer.js";

export { WorkflowEngine, encodeQuery, pidMetadata, type WorkflowEngineDeps } from "./workflow/engine.js";
export { detectLanguage, extractSearchQuery, isOpenCommand } from "./workflow/utterance.js";

export { CommandRouter, type RouterResult } from "./routing/router.js";
export { createRoutes, summarizeTabs, SPOKEN_TAB_TITLES, type RouteContext } from "./routing/routes.js";
export { defineRoute, sortRoutes, type AnyRoute, type RouteDefinition, type RouteInput } from "./routing/route.js";

export { createDesktopNavigator, createProcessLauncher, spawnDetached, type DetachedSpawn } from "./adapters/process-launcher.js";
export { createTextSpeaker, runShell, EXIT_PHRASES, type ShellOptions, type ShellSummary } from "./shell/shell.js";
export { appPatternTable, createVoxdesk, type Voxdesk, type VoxdeskOptions } from "./runtime.js";
