export type {
  ActionOutcome,
  AppSummary,
  CommandResult,
  CommandRunner,
  CountResult,
  CountUnit,
  ProcessRecord,
  SampleResult,
  SamplingUnavailable,
  SummaryResult,
  WindowRecord,
} from "./types.js";

export { createExecFileRunner, COMMAND_TIMEOUT_MS } from "./command-runner.js";
export {
  createX11Probe,
  parseWmctrlList,
  parseProcessList,
  parseXpropWindowIds,
  canonicalWindowId,
  type DesktopProbe,
  type RawWindow,
} from "./probe.js";
export { DesktopSampler, DEFAULT_APP_PATTERNS, renderSummary, type AppPatternTable } from "./sampler.js";
export { matchAlias, normalizePhrase, type AliasEntry, type AliasMatch } from "./alias-match.js";
export {
  TabLocator,
  type BrowserWindowSpec,
  type SitePatternSpec,
  type Tab,
  type TabListResult,
  type TabLookup,
  type TabLocatorOptions,
} from "./tab-locator.js";
export { createWmctrlWindowActions, type WindowActions } from "./window-actions.js";
