import type { Language } from "../types/language.js";

export interface EngineConfig {
  /** Utterances a session may consume before a non-advancing one cancels it. */
  maxTurns: number;
  /** A session idle for longer than this is reset on the next consultation. */
  sessionTimeoutMs: number;
  /** Phrases that end any active session when said on their own. */
  cancelPhrases: string[];
  defaultLanguage: Language;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  maxTurns: 5,
  sessionTimeoutMs: 30 * 1000,
  cancelPhrases: ["cancel", "never mind", "nevermind", "stop", "forget it", "منسوخ", "رہنے دو"],
  defaultLanguage: "en",
};

export function resolveEngineConfig(config: Partial<EngineConfig> = {}): EngineConfig {
  const merged = { ...DEFAULT_ENGINE_CONFIG, ...config };
  if (!Number.isInteger(merged.maxTurns) || merged.maxTurns < 1) {
    throw new RangeError(`maxTurns must be a positive integer, got ${merged.maxTurns}`);
  }
  if (merged.sessionTimeoutMs <= 0) {
    throw new RangeError(`sessionTimeoutMs must be positive, got ${merged.sessionTimeoutMs}`);
  }
  return merged;
}
