export type * from "./types/api.js";
export type * from "./types/corpus.js";
export type * from "./types/retrieval.js";
export type * from "./types/session.js";
export type * from "./store.js";
