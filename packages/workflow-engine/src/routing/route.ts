import type { Language } from "../types/language.js";

export interface RouteInput {
  /** Utterance with whitespace collapsed, original casing. */
  text: string;
  /** Lower-cased form used for matching. */
  normalized: string;
  lang: Language;
}

/** A route with its match type erased, as stored in the routing table. */
export interface AnyRoute {
  name: string;
  /** Lower runs first. */
  priority: number;
  tryMatch(input: RouteInput): (() => Promise<string>) | null;
}

export interface RouteDefinition<M> {
  name: string;
  priority: number;
  match(input: RouteInput): M | null;
  run(match: M, input: RouteInput): Promise<string> | string;
}

export function defineRoute<M>(def: RouteDefinition<M>): AnyRoute {
  return {
    name: def.name,
    priority: def.priority,
    tryMatch(input) {
      const m = def.match(input);
      if (m === null) return null;
      return async () => def.run(m, input);
    },
  };
}

/** Stable by priority, then by table order. */
export function sortRoutes(routes: readonly AnyRoute[]): AnyRoute[] {
  return routes
    .map((route, index) => ({ route, index }))
    .sort((a, b) => a.route.priority - b.route.priority || a.index - b.index)
    .map((r) => r.route);
}
