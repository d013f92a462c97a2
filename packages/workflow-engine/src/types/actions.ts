import type { ActionOutcome } from "@voxdesk/desktop-state";
import type { Language } from "./language.js";

export interface LaunchTarget {
  app: string;
  command: string;
  args: readonly string[];
  /** Profile id when the launch is profile-aware. */
  profile?: string;
}

/** Process launch mechanics live outside the engine. */
export interface AppLauncher {
  launch(target: LaunchTarget): Promise<ActionOutcome>;
  /** Signals `pid` when given, else every process whose command line contains one of the names. */
  close(app: string, processNames: readonly string[], pid?: number): Promise<ActionOutcome>;
}

export interface WebNavigator {
  open(url: string): Promise<ActionOutcome>;
}

/** Text-to-speech boundary: fire and forget. */
export interface Speaker {
  speak(text: string, language: Language): void;
}
