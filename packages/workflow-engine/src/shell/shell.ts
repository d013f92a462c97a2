/**
 * Text shell: one utterance per input line, each routed to completion before the next is read.
 */
import { createInterface } from "node:readline";
import type { Readable, Writable } from "node:stream";
import type { CommandRouter } from "../routing/router.js";
import type { Speaker } from "../types/actions.js";
import type { Language } from "../types/language.js";
import type { Phrasebook } from "../config/phrasebook.js";
import { containsPhrase, detectLanguage } from "../workflow/utterance.js";

export const EXIT_PHRASES = ["exit", "quit", "goodbye", "bye", "خدا حافظ"];

export interface ShellOptions {
  input: Readable;
  router: CommandRouter;
  speaker: Speaker;
  phrases: Phrasebook;
  exitPhrases?: readonly string[];
}

export interface ShellSummary {
  /** Lines routed, not counting blanks and the exit line. */
  utterances: number;
  exited: boolean;
}

export function createTextSpeaker(out: Writable): Speaker {
  return {
    speak(text: string, language: Language) {
      out.write(`[${language}] ${text}\n`);
    },
  };
}

export async function runShell(opts: ShellOptions): Promise<ShellSummary> {
  const exitPhrases = opts.exitPhrases ?? EXIT_PHRASES;
  const rl = createInterface({ input: opts.input, crlfDelay: Infinity, terminal: false });
  let utterances = 0;

  try {
    for await (const line of rl) {
      const text = line.trim();
      if (!text) continue;
      const lang = detectLanguage(text);

      if (exitPhrases.some((p) => containsPhrase(text, p) && text.split(/\s+/).length <= 3)) {
        opts.speaker.speak(opts.phrases.say("goodbye", lang), lang);
        return { utterances, exited: true };
      }

      const result = await opts.router.route(text, lang);
      utterances++;
      opts.speaker.speak(result.responseText, result.language);
    }
  } finally {
    rl.close();
  }
  return { utterances, exited: false };
}
