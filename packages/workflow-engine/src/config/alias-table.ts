/**
 * Alias table: spoken keyword -> canonical browser / site / app, loaded once at startup.
 */
import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";

const nonEmpty = z.string().trim().min(1);

const ProfileSchema = z.object({
  id: nonEmpty,
  aliases: z.array(nonEmpty).min(1),
  /** Browser profile directory, e.g. "Profile 1". */
  directory: nonEmpty,
});

const BrowserSchema = z.object({
  id: nonEmpty,
  /** Spoken display name; defaults to the id. */
  label: nonEmpty.optional(),
  aliases: z.array(nonEmpty).min(1),
  command: nonEmpty,
  supportsProfiles: z.boolean(),
  /** Launch argument template; `{profile}` is replaced by the profile directory. */
  profileArg: z.string().includes("{profile}").optional(),
  windowPatterns: z.array(nonEmpty).min(1),
  titleSuffixes: z.array(z.string()).default([]),
  profiles: z.array(ProfileSchema).default([]),
});

const SiteSchema = z.object({
  id: nonEmpty,
  label: nonEmpty.optional(),
  keywords: z.array(nonEmpty).min(1),
  /** Window-title fragments identifying an open tab of the site. */
  patterns: z.array(nonEmpty).default([]),
  url: z.string().url(),
  /** Search URL template with a `{query}` placeholder. */
  searchUrl: z.string().includes("{query}").optional(),
});

const AppSchema = z.object({
  id: nonEmpty,
  label: nonEmpty.optional(),
  aliases: z.array(nonEmpty).min(1),
  command: nonEmpty,
  processNames: z.array(nonEmpty).min(1),
});

export const AliasTableSchema = z
  .object({
    defaultSearchSite: nonEmpty,
    browsers: z.array(BrowserSchema).min(1),
    sites: z.array(SiteSchema).min(1),
    apps: z.array(AppSchema).default([]),
  })
  .superRefine((table, ctx) => {
    for (const [i, b] of table.browsers.entries()) {
      if (b.supportsProfiles && b.profiles.length === 0) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["browsers", i, "profiles"],
          message: `browser "${b.id}" supports profiles but lists none`,
        });
      }
      if (b.supportsProfiles && !b.profileArg) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["browsers", i, "profileArg"],
          message: `browser "${b.id}" supports profiles but has no profileArg`,
        });
      }
    }
    const search = table.sites.find((s) => s.id === table.defaultSearchSite);
    if (!search?.searchUrl) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["defaultSearchSite"],
        message: `default search site "${table.defaultSearchSite}" is missing or has no searchUrl`,
      });
    }
    for (const kind of ["browsers", "sites", "apps"] as const) {
      const seen = new Set<string>();
      for (const item of table[kind]) {
        if (seen.has(item.id)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: [kind], message: `duplicate id "${item.id}"` });
        }
        seen.add(item.id);
      }
    }
  });

export type AliasTable = z.infer<typeof AliasTableSchema>;
export type BrowserConfig = AliasTable["browsers"][number];
export type BrowserProfile = BrowserConfig["profiles"][number];
export type SiteConfig = AliasTable["sites"][number];
export type AppConfig = AliasTable["apps"][number];

export const DEFAULT_ALIAS_TABLE_PATH = fileURLToPath(new URL("../../config/aliases.json", import.meta.url));

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
}

export function parseAliasTable(raw: unknown): AliasTable {
  const parsed = AliasTableSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError("Invalid alias table", formatIssues(parsed.error));
  }
  return parsed.data;
}

export function readJsonFile(filePath: string, what: string): unknown {
  let text: string;
  try {
    text = readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new ConfigurationError(`Cannot read ${what} at ${filePath}`, [String(err)]);
  }
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError(`${what} at ${filePath} is not valid JSON`, [String(err)]);
  }
}

export function loadAliasTable(filePath = DEFAULT_ALIAS_TABLE_PATH): AliasTable {
  return parseAliasTable(readJsonFile(filePath, "alias table"));
}
