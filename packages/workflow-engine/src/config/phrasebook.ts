import { fileURLToPath } from "node:url";
import { z } from "zod";
import type { Language } from "../types/language.js";
import { ConfigurationError } from "./errors.js";
import { formatIssues, readJsonFile } from "./alias-table.js";

export const PHRASE_KEYS = [
  "profilePrompt",
  "profileRetry",
  "profileOpened",
  "profileFailed",
  "browserOpened",
  "launchFailed",
  "targetRetry",
  "siteOpened",
  "siteSwitched",
  "siteOpenedNoSearch",
  "siteFailed",
  "searching",
  "searchFailed",
  "queryRetry",
  "cancelled",
  "turnCeiling",
  "busy",
  "noReference",
  "samplingUnavailable",
  "siteNotOpen",
  "siteIsOpen",
  "browserNotRunning",
  "actionFailed",
  "unknown",
  "forgot",
  "appOpened",
  "closed",
  "switched",
  "tabsNone",
  "tabsOne",
  "tabsMany",
  "tabsMore",
  "tabCount",
  "windowCount",
  "instanceCount",
  "helpIdle",
  "helpProfile",
  "helpTarget",
  "helpQuery",
  "goodbye",
] as const;

export type PhraseKey = (typeof PHRASE_KEYS)[number];

const TemplatesSchema = z.record(z.string().min(1));

const PhrasebookSchema = z
  .object({ en: TemplatesSchema, ur: TemplatesSchema })
  .superRefine((book, ctx) => {
    for (const lang of ["en", "ur"] as const) {
      for (const key of PHRASE_KEYS) {
        if (!(key in book[lang])) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: [lang, key], message: "missing phrase" });
        }
      }
    }
  });

export const DEFAULT_PHRASEBOOK_PATH = fileURLToPath(new URL("../../config/phrases.json", import.meta.url));

export type PhraseVars = Record<string, string | number>;

export class Phrasebook {
  private templates: Record<Language, Record<string, string>>;

  constructor(templates: Record<Language, Record<string, string>>) {
    this.templates = templates;
  }

  static parse(raw: unknown): Phrasebook {
    const parsed = PhrasebookSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError("Invalid phrasebook", formatIssues(parsed.error));
    }
    return new Phrasebook(parsed.data);
  }

  static load(filePath = DEFAULT_PHRASEBOOK_PATH): Phrasebook {
    return Phrasebook.parse(readJsonFile(filePath, "phrasebook"));
  }

  say(key: PhraseKey, lang: Language, vars: PhraseVars = {}): string {
    const template = this.templates[lang][key] ?? this.templates.en[key] ?? key;
    return template.replace(/\{(\w+)\}/g, (whole, name: string) => {
      const value = vars[name];
      return value === undefined ? whole : String(value);
    });
  }
}
