export type Language = "en" | "ur";

export const LANGUAGES: readonly Language[] = ["en", "ur"];
