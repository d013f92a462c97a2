export interface AliasEntry<T> {
  aliases: readonly string[];
  value: T;
}

export interface AliasMatch<T> {
  value: T;
  alias: string;
  /** Position of the winning entry in the table. */
  index: number;
}

export function normalizePhrase(text: string): string {
  return text.toLowerCase().replace(/\s+/g, " ").trim();
}

/**
 * Case-insensitive substring match of every alias against `text`.
 * The longest matching alias wins; on equal length the earlier table entry wins.
 */
export function matchAlias<T>(text: string, table: readonly AliasEntry<T>[]): AliasMatch<T> | null {
  const haystack = normalizePhrase(text);
  let best: AliasMatch<T> | null = null;

  for (const [index, entry] of table.entries()) {
    for (const raw of entry.aliases) {
      const alias = normalizePhrase(raw);
      if (!alias || !haystack.includes(alias)) continue;
      if (!best || alias.length > best.alias.length) {
        best = { value: entry.value, alias, index };
      }
    }
  }

  return best;
}
