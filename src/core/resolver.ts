import { performance } from "perf_hooks";
import { elapsed } from "../lib/helpers";
import logger from "../lib/logger";
import { PageSource, Resolution, SynonymSource, WordImageResolver } from "../types";
import { extractImageSources } from "./extractor";
import { normalizeImageLinks } from "./normalizer";
import { pickRandom } from "./selector";

/**
 * Resolves a word to a full-size image URL.
 *
 * The word's own category page is tried first. When it yields nothing, the
 * thesaurus is asked once for synonyms of the original word and each synonym is
 * tried in order until one of them yields images. Every attempt starts from an
 * empty result set, so the chosen URL always belongs to the word that produced it.
 */
export class ImageResolver implements WordImageResolver {
  constructor(
    private readonly pages: PageSource,
    private readonly synonyms: SynonymSource,
    private readonly random: () => number = Math.random,
  ) {}

  async resolve(input: string | undefined): Promise<Resolution> {
    const word = input?.trim() ?? "";
    if (!word) {
      logger.debug("[Resolve] No word supplied");
      return { state: "MissingInput" };
    }

    const startTime = performance.now();
    const attempts = [word];
    logger.info(`[Resolve] Starting lookup for "${word}"`);

    try {
      const primary = await this.imagesFor(word);
      if (primary.length > 0) return this.resolved(word, primary, attempts);

      const lookup = await this.synonyms.lookup(word);
      if (!lookup.ok) logger.warn(`[Synonyms] Lookup failed for "${word}": ${lookup.error.message}`);

      const synonyms = lookup.ok ? lookup.value : [];
      if (lookup.ok && synonyms.length === 0) logger.info(`[Resolve] No synonyms found for "${word}"`);

      for (const synonym of synonyms) {
        attempts.push(synonym);
        logger.debug(`[Resolve] Trying synonym "${synonym}"`);

        const candidates = await this.imagesFor(synonym);
        if (candidates.length > 0) return this.resolved(synonym, candidates, attempts);
      }

      logger.info(`[Resolve] No images for "${word}" after ${attempts.length} attempt(s)`);
      return { state: "Exhausted", attempts };
    } finally {
      logger.debug(`[Resolve] Total lookup time: ${elapsed(startTime, performance.now())}`);
    }
  }

  /** Fetch, extract and normalize for a single word; a failed fetch counts as no images. */
  async imagesFor(word: string): Promise<string[]> {
    const page = await this.pages.fetch(word);
    if (!page.ok) {
      logger.warn(`[Fetch] Category page for "${word}" unavailable: ${page.error.message}`);
      return [];
    }

    const rawLinks = extractImageSources(page.value);
    const candidates = normalizeImageLinks(rawLinks);
    logger.debug(
      `[Process] "${word}": ${rawLinks.length} image references, ${candidates.length} full-size URLs`,
    );
    return candidates;
  }

  private resolved(word: string, candidates: string[], attempts: string[]): Resolution {
    const imageUrl = pickRandom(candidates, this.random);
    logger.info(`[Resolve] Resolved "${attempts[0]}" via "${word}": ${imageUrl}`);
    return { state: "Resolved", word, candidates, imageUrl, attempts };
  }
}
