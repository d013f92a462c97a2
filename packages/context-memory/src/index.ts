export type { Clock, ContextEntry, ContextKind, ReferenceResult, ResolveOptions } from "./types.js";
export { CONTEXT_KINDS } from "./types.js";
export { ContextStore, HISTORY_DEPTH } from "./context-store.js";
