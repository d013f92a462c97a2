import { describe, it, expect } from "vitest";
import { chromeWindow, harness } from "./harness.js";

const PROFILE_PROMPT = "Chrome is opening. Which profile? Say default, profile 1 or profile 2.";
const PROFILE_RETRY = "I didn't catch a profile. Say default, profile 1 or profile 2, or cancel.";

describe("workflow engine", () => {
  it("runs open -> profile -> site -> search to completion", async () => {
    const h = harness();
    const replies = await h.say("open chrome", "profile 1", "youtube", "search for lofi music");

    expect(replies).toEqual([
      PROFILE_PROMPT,
      "Opened the profile 1 profile. Which site?",
      "Opening YouTube. What should I search for?",
      "Searching YouTube for lofi music.",
    ]);
    expect(h.engine.state).toBe("idle");

    const tail = h.context.entries().slice(-2);
    expect(tail.map((e) => [e.kind, e.identifier])).toEqual([
      ["app", "chrome"],
      ["website", "youtube"],
    ]);
    expect(tail[0].metadata).toEqual({ profile: "profile 1" });

    const last = h.journal.lastAction();
    expect(last?.action).toBe("search");
    expect(last?.target).toBe("youtube");
    expect(last?.detail.query).toBe("lofi music");
    expect(h.navigator.opened).toEqual([
      "https://youtube.com",
      "https://www.youtube.com/results?search_query=lofi+music",
    ]);
  });

  it("enters awaiting_profile and records the browser on open", async () => {
    const h = harness();
    await h.say("open chrome");

    expect(h.engine.state).toBe("awaiting_profile");
    expect(h.launcher.launches).toEqual([{ app: "chrome", command: "google-chrome", args: [] }]);
    const ref = h.context.resolveReference("app");
    expect(ref.kind === "found" && ref.entry.identifier).toBe("chrome");
    expect(h.journal.tail().map((l) => l.message)).toContain("State: idle → awaiting_profile");
  });

  it("launches the profile and records it on a profile reply", async () => {
    const h = harness();
    await h.say("open chrome", "profile 1");

    expect(h.engine.state).toBe("awaiting_target");
    expect(h.launcher.launches[1]).toEqual({
      app: "chrome",
      command: "google-chrome",
      args: ["--profile-directory=Profile 1"],
      profile: "profile 1",
    });
    const ref = h.context.resolveReference("app");
    expect(ref.kind === "found" && ref.entry.metadata).toEqual({ profile: "profile 1" });
  });

  it("remembers the pid of the launched profile", async () => {
    const h = harness();
    h.launcher.nextPid = 700;
    await h.say("open chrome", "profile 1");

    const ref = h.context.resolveReference("app");
    expect(ref.kind === "found" && ref.entry.metadata).toEqual({ profile: "profile 1", pid: "701" });
    expect(h.journal.lastAction()?.detail).toEqual({
      command: "google-chrome --profile-directory=Profile 1",
      profile: "profile 1",
      pid: "701",
    });
  });

  it("stays put for maxTurns - 1 unmatched replies and resets on the next", async () => {
    const h = harness();
    await h.say("open chrome");

    for (let i = 0; i < 4; i++) {
      expect(await h.say("banana")).toEqual([PROFILE_RETRY]);
      expect(h.engine.state).toBe("awaiting_profile");
    }
    expect(await h.say("banana")).toEqual(["I'm cancelling this for now."]);
    expect(h.engine.state).toBe("idle");
  });

  it("counts advancing turns toward the ceiling without discarding them", async () => {
    const h = harness();
    await h.say("open chrome", "banana", "banana", "banana");
    expect(await h.say("profile 1")).toEqual(["Opened the profile 1 profile. Which site?"]);
    expect(h.engine.snapshot()).toMatchObject({ state: "awaiting_target", turns: 4 });

    expect(await h.say("banana")).toEqual(["I'm cancelling this for now."]);
    expect(h.engine.state).toBe("idle");
  });

  it("cancels on a cancel phrase in any active state", async () => {
    const h = harness();
    expect(await h.say("open chrome", "never mind")).toEqual([PROFILE_PROMPT, "Okay, cancelled."]);
    expect(h.engine.state).toBe("idle");

    await h.say("open chrome with profile 1");
    expect(await h.say("please stop")).toEqual(["Okay, cancelled."]);
    expect(h.engine.isActive()).toBe(false);

    await h.say("open chrome with profile 1");
    expect(await h.say("Cancel, please!")).toEqual(["Okay, cancelled."]);

    await h.say("open chrome");
    expect(h.engine.cancel()).toBe("Okay, cancelled.");
    expect(h.engine.state).toBe("idle");
  });

  it("searches a query that merely contains a cancel word", async () => {
    const h = harness();
    const replies = await h.say("open chrome with profile 1", "youtube", "bus stop");
    expect(replies[2]).toBe("Searching YouTube for bus stop.");
    expect(h.navigator.opened).toEqual([
      "https://youtube.com",
      "https://www.youtube.com/results?search_query=bus+stop",
    ]);

    const again = harness();
    expect(await again.say("open chrome with profile 1", "search for stop motion")).toEqual([
      "Opened the profile 1 profile. Which site?",
      "Searching Google for stop motion.",
    ]);
    expect(again.navigator.opened).toEqual(["https://www.google.com/search?q=stop+motion"]);
  });

  it("rejects a new browser command while active and counts it as a turn", async () => {
    const h = harness();
    await h.say("open chrome");

    expect(await h.say("open firefox")).toEqual(["Let's finish this first, or say cancel."]);
    expect(h.engine.snapshot()).toMatchObject({ state: "awaiting_profile", subject: "chrome", turns: 1 });
    expect(h.launcher.launches).toHaveLength(1);
  });

  it("stays in awaiting_profile when only the profile launch fails", async () => {
    const h = harness();
    h.launcher.failLaunch = (t) => t.args.length > 0;

    expect(await h.say("open chrome", "profile 1")).toEqual([
      PROFILE_PROMPT,
      "I couldn't open the profile 1 profile. Which profile?",
    ]);
    expect(h.engine.state).toBe("awaiting_profile");
    const last = h.journal.lastAction();
    expect(last?.outcome).toBe("failed");
    expect(last?.detail.reason).toBe("test failure");
  });

  it("returns to idle with nothing remembered when the browser cannot launch", async () => {
    const h = harness();
    h.launcher.failLaunch = () => true;

    expect(await h.say("open chrome")).toEqual(["I couldn't open Chrome."]);
    expect(h.engine.state).toBe("idle");
    expect(h.context.size).toBe(0);
  });

  it("resets a session left idle past the timeout", async () => {
    const h = harness();
    await h.say("open chrome");

    h.advance(30_000);
    expect(h.engine.isActive()).toBe(true);
    h.advance(1);
    expect(h.engine.isActive()).toBe(false);
    expect(h.engine.snapshot()).toEqual({ state: "idle" });

    const reset = h.journal.tail().find((l) => l.message === "State: awaiting_profile → idle");
    expect(reset?.data?.reason).toBe("timeout");
  });

  it("skips the profile turn when the profile is named up front", async () => {
    const h = harness();
    expect(await h.say("open chrome with profile 2")).toEqual(["Opened the profile 2 profile. Which site?"]);
    expect(h.launcher.launches[0].args).toEqual(["--profile-directory=Profile 2"]);
    expect(h.engine.snapshot()).toEqual({
      state: "awaiting_target",
      sessionId: expect.any(String),
      subject: "chrome",
      accumulated: { profile: "profile 2" },
      turns: 0,
    });
  });

  it("opens a browser without profiles and stays idle", async () => {
    const h = harness();
    expect(await h.say("open firefox")).toEqual(["Firefox opened."]);
    expect(h.engine.state).toBe("idle");
    expect(h.engine.isBrowserTask()).toBe(true);
  });

  it("focuses an already open tab instead of opening the site again", async () => {
    const h = harness();
    h.desktop.windows = [
      chromeWindow("0x01", "Inbox - Gmail", { focusRank: 1 }),
      chromeWindow("0x02", "Lofi beats - YouTube", { focusRank: 0 }),
    ];

    const replies = await h.say("open chrome with profile 1", "youtube");
    expect(replies[1]).toBe("Switched to YouTube. What should I search for?");
    expect(h.windows.focused).toEqual(["0x02"]);
    expect(h.navigator.opened).toEqual([]);
    const ref = h.context.resolveReference("website");
    expect(ref.kind === "found" && ref.entry.metadata.via).toBe("tab");
  });

  it("searches the default site when asked to search before picking one", async () => {
    const h = harness();
    const replies = await h.say("open chrome with profile 1", "search for cats");
    expect(replies[1]).toBe("Searching Google for cats.");
    expect(h.navigator.opened).toEqual(["https://www.google.com/search?q=cats"]);
    expect(h.engine.state).toBe("idle");
  });

  it("finishes on a site that has no search page", async () => {
    const h = harness();
    const replies = await h.say("open chrome with profile 1", "facebook");
    expect(replies[1]).toBe("Opening Facebook.");
    expect(h.engine.state).toBe("idle");
  });

  it("re-prompts for an unknown site and keeps the state when the site fails to open", async () => {
    const h = harness();
    await h.say("open chrome with profile 1");
    expect(await h.say("banana")).toEqual(["Say a site like YouTube, Gmail or Google, or say search for something."]);

    h.navigator.fail = true;
    expect(await h.say("youtube")).toEqual(["That didn't work. Which site?"]);
    expect(h.engine.state).toBe("awaiting_target");
  });

  it("asks again for an empty query", async () => {
    const h = harness();
    await h.say("open chrome with profile 1", "youtube");
    expect(await h.say("search for")).toEqual(["What should I search for?"]);
    expect(h.engine.state).toBe("awaiting_query");
  });

  it("answers help for the current state", async () => {
    const h = harness();
    expect(h.engine.help()).toBe("Ready. Try open chrome, what apps are running, or list tabs.");

    await h.say("open chrome");
    expect(await h.say("help")).toEqual(["Chrome is waiting for a profile. Say default, profile 1 or profile 2."]);

    await h.say("profile 1");
    expect(h.engine.help()).toBe("Browser ready. Say YouTube, Gmail or Google, or search for something.");

    await h.say("youtube");
    expect(h.engine.help()).toBe("On YouTube. Say what to search for.");
  });

  it("replies in Urdu to an Urdu command", async () => {
    const h = harness();
    expect(await h.say("کروم کھولو")).toEqual(["Chrome کھل رہا ہے۔ کون سا پروفائل؟ کہیں default، profile 1 یا profile 2۔"]);
    expect(h.engine.state).toBe("awaiting_profile");
  });

  it("does not consume an utterance when no session is active", async () => {
    const h = harness();
    const reply = await h.engine.handle("profile 1");
    expect(reply).toEqual({ text: "Sorry, I didn't understand that.", state: "idle", consumed: false });
  });
});
