import axios from "axios";
import { performance } from "perf_hooks";
import env from "../config/env";
import scale from "../config/scale";
import { elapsed, toError } from "../lib/helpers";
import logger from "../lib/logger";
import { Fallible, SynonymSource } from "../types";

export interface SynonymResolverOptions {
  apiUrl?: string;
  apiKey?: string;
  timeout?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Flattens a thesaurus payload into one synonym list.
 *
 * Categories (noun, verb, ...) are visited in payload order and only their `syn`
 * lists are read, so a word listed under several categories appears several times.
 * Returns `null` when the payload is not a category map at all.
 */
export function flattenSynonyms(payload: unknown): string[] | null {
  if (!isRecord(payload)) return null;

  const synonyms: string[] = [];
  for (const category of Object.values(payload)) {
    if (!isRecord(category) || !Array.isArray(category.syn)) continue;

    for (const word of category.syn) {
      if (typeof word === "string" && word.length > 0) synonyms.push(word);
    }
  }

  return synonyms;
}

export class SynonymResolver implements SynonymSource {
  private readonly apiUrl: string;
  private readonly apiKey: string;
  private readonly timeout: number;

  constructor(options: SynonymResolverOptions = {}) {
    this.apiUrl = options.apiUrl ?? env.thesaurus.apiUrl;
    this.apiKey = options.apiKey ?? env.thesaurus.apiKey;
    this.timeout = options.timeout ?? scale.scraping.httpTimeout;
  }

  synonymUrl(word: string): string {
    return `${this.apiUrl}${this.apiKey}/${encodeURIComponent(word)}/json`;
  }

  async lookup(word: string): Promise<Fallible<string[]>> {
    const startTime = performance.now();
    logger.debug(`[Synonyms] Looking up synonyms for "${word}"`);

    if (!this.apiKey) {
      return { ok: false, error: new Error("THESAURUS_API_KEY environment variable not set") };
    }

    try {
      const response = await axios.get<unknown>(this.synonymUrl(word), {
        timeout: this.timeout,
        responseType: "json",
      });

      const synonyms = flattenSynonyms(response.data);
      if (synonyms === null) {
        return { ok: false, error: new Error("Invalid JSON response from thesaurus API") };
      }

      logger.debug(
        `[Synonyms] Found ${synonyms.length} synonyms for "${word}" in ${elapsed(startTime, performance.now())}`,
      );
      return { ok: true, value: synonyms };
    } catch (error) {
      return { ok: false, error: toError(error) };
    }
  }
}
