/**
 * Command Router
 * An active workflow owns every utterance; otherwise the routing table decides.
 */
import { normalizePhrase } from "@voxdesk/desktop-state";
import type { Language } from "../types/language.js";
import { collapse, detectLanguage } from "../workflow/utterance.js";
import type { AnyRoute } from "./route.js";
import { createRoutes, type RouteContext } from "./routes.js";

export interface RouterResult {
  handled: boolean;
  responseText: string;
  /** Route that produced the response; "workflow" when the active session consumed it. */
  route?: string;
  language: Language;
}

export class CommandRouter {
  private ctx: RouteContext;
  private routes: AnyRoute[];

  constructor(ctx: RouteContext, routes?: AnyRoute[]) {
    this.ctx = ctx;
    this.routes = routes ?? createRoutes(ctx);
  }

  get routeNames(): string[] {
    return this.routes.map((r) => r.name);
  }

  async route(text: string, lang: Language = detectLanguage(text)): Promise<RouterResult> {
    const { engine } = this.ctx;
    const input = { text: collapse(text), normalized: normalizePhrase(text), lang };

    if (engine.isActive()) {
      const reply = await engine.handle(input.text, lang);
      return { handled: reply.consumed, responseText: reply.text, route: "workflow", language: lang };
    }

    for (const route of this.routes) {
      const run = route.tryMatch(input);
      if (!run) continue;
      engine.journal.log("debug", "Route matched", { route: route.name, utterance: input.normalized });
      return { handled: true, responseText: await run(), route: route.name, language: lang };
    }

    engine.journal.log("info", "No route matched", { utterance: input.normalized });
    return { handled: false, responseText: this.ctx.phrases.say("unknown", lang), language: lang };
  }
}
