import { describe, it, expect } from "vitest";
import { matchAlias, type AliasEntry } from "../src/index.js";

const PROFILES: AliasEntry<string>[] = [
  { aliases: ["default", "personal"], value: "Default" },
  { aliases: ["profile 1", "profile1", "office"], value: "Profile 1" },
  { aliases: ["profile 11"], value: "Profile 11" },
  { aliases: ["work", "profile 2"], value: "Profile 2" },
  { aliases: ["office", "profile 2"], value: "Office" },
];

describe("alias matching", () => {
  it("matches case-insensitively inside a longer utterance", () => {
    expect(matchAlias("use  OFFICE please", PROFILES)).toEqual({ value: "Profile 1", alias: "office", index: 1 });
  });

  it("lets the longest literal alias win", () => {
    expect(matchAlias("profile 11", PROFILES)?.value).toBe("Profile 11");
  });

  it("breaks equal-length ties by table order", () => {
    expect(matchAlias("profile 2", PROFILES)).toEqual({ value: "Profile 2", alias: "profile 2", index: 3 });
  });

  it("prefers a longer alias from a later entry over a shorter earlier one", () => {
    expect(matchAlias("work in personal profile 1", PROFILES)?.value).toBe("Profile 1");
  });

  it("returns null when nothing matches", () => {
    expect(matchAlias("something else", PROFILES)).toBeNull();
    expect(matchAlias("", PROFILES)).toBeNull();
  });
});
