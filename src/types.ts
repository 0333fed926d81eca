import type { Request } from "express";

export type Fallible<T> = { ok: true; value: T } | { ok: false; error: Error };

export type Resolution =
  | {
      state: "Resolved";
      word: string; // Word whose category page satisfied the lookup
      candidates: string[];
      imageUrl: string;
      attempts: string[];
    }
  | { state: "Exhausted"; attempts: string[] }
  | { state: "MissingInput" };

export interface PageSource {
  fetch(word: string): Promise<Fallible<string>>;
}

export interface SynonymSource {
  lookup(word: string): Promise<Fallible<string[]>>;
}

export interface WordImageResolver {
  resolve(word: string | undefined): Promise<Resolution>;
}

// Anything the query-string parser can produce for a single key
export type QueryValue = Request["query"][string];

export interface ImageUrlQueryParams {
  word?: QueryValue;
}
