import type { Language } from "../types/language.js";

const SEARCH_PREFIX = /^(?:search(?:\s+for)?|look\s+up)(?:\s+(.*))?$/i;
const OPEN_VERB = /^(?:open|launch|start)\b|(?:کھولو|چلاؤ)$/;
const SEARCH_SUFFIX_UR = /^(.*?)\s*(?:تلاش\s+کرو|تلاش\s+کریں)$/;
const POLITE = /^(?:please\s+)?(.*?)(?:,?\s+please)?[\s.!?۔]*$/;

export function collapse(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}

/**
 * Query of a "search for X" style utterance, "" when the query is missing,
 * null when the utterance is not a search at all.
 */
export function extractSearchQuery(text: string): string | null {
  const t = collapse(text);
  const en = SEARCH_PREFIX.exec(t);
  if (en) return (en[1] ?? "").trim();
  const ur = SEARCH_SUFFIX_UR.exec(t);
  if (ur) return ur[1].trim();
  return null;
}

/** "open X", "launch X", or the Urdu verb-final "X کھولو". */
export function isOpenCommand(text: string): boolean {
  return OPEN_VERB.test(collapse(text).toLowerCase());
}

/** Strips the open verb, leaving the object of the command. */
export function openObject(text: string): string {
  return collapse(text)
    .replace(/^(?:open|launch|start)\s+/i, "")
    .replace(/\s*(?:کھولو|چلاؤ)$/, "")
    .trim();
}

/** Whole-word containment; works for scripts without \b support. */
export function containsPhrase(utterance: string, phrase: string): boolean {
  const hay = ` ${collapse(utterance).toLowerCase()} `;
  return hay.includes(` ${collapse(phrase).toLowerCase()} `);
}

/** The whole utterance is the phrase, give or take a "please" and closing punctuation. */
export function isBarePhrase(utterance: string, phrase: string): boolean {
  const core = POLITE.exec(collapse(utterance).toLowerCase())?.[1] ?? "";
  return core === collapse(phrase).toLowerCase();
}

export function listPhrase(items: string[], lang: Language): string {
  if (items.length <= 1) return items.join("");
  const sep = lang === "ur" ? "، " : ", ";
  const last = lang === "ur" ? " یا " : " or ";
  return items.slice(0, -1).join(sep) + last + items[items.length - 1];
}

export function titleCase(name: string): string {
  return name.replace(/(^|\s)(\p{L})/gu, (_, sep: string, ch: string) => sep + ch.toUpperCase());
}

/** Arabic-script characters mean the utterance was recognised as Urdu. */
export function detectLanguage(text: string): Language {
  return /[؀-ۿ]/.test(text) ? "ur" : "en";
}
