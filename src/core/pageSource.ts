import { CheerioCrawler, Configuration, log, LogLevel, RequestQueue } from "crawlee";
import { performance } from "perf_hooks";
import { v4 as uuid } from "uuid";
import env from "../config/env";
import scale from "../config/scale";
import { elapsed, toError } from "../lib/helpers";
import logger from "../lib/logger";
import { Fallible, PageSource } from "../types";

// Maps winston level names onto crawlee's logger
export function crawleeLogLevel(level: string): LogLevel {
  switch (level) {
    case "error":
      return LogLevel.ERROR;
    case "warn":
      return LogLevel.WARNING;
    case "debug":
    case "verbose":
    case "silly":
      return LogLevel.DEBUG;
    default:
      return LogLevel.INFO;
  }
}

log.setLevel(process.env.NODE_ENV === "test" ? LogLevel.OFF : crawleeLogLevel(env.logLevel));

export interface CategoryPageSourceOptions {
  baseUrl?: string;
  navigationTimeout?: number;
}

/** Loads a media category listing page for a word. */
export class CategoryPageSource implements PageSource {
  private readonly baseUrl: string;
  private readonly navigationTimeoutSecs: number;
  // Queues live in memory only and are dropped after each fetch
  private readonly config = new Configuration({ persistStorage: false });

  constructor(options: CategoryPageSourceOptions = {}) {
    this.baseUrl = options.baseUrl ?? env.categoryBaseUrl;
    this.navigationTimeoutSecs =
      (options.navigationTimeout ?? scale.scraping.navigationTimeout) / 1000;
  }

  categoryUrl(word: string): string {
    return `${this.baseUrl}${encodeURIComponent(word)}`;
  }

  async fetch(word: string): Promise<Fallible<string>> {
    const url = this.categoryUrl(word);
    const startTime = performance.now();
    logger.debug(`[Fetch] Starting fetch for ${url}`);

    try {
      const html = await this.crawl(url);
      return { ok: true, value: html };
    } catch (error) {
      return { ok: false, error: toError(error) };
    } finally {
      logger.debug(`[Fetch] ${url} finished in ${elapsed(startTime, performance.now())}`);
    }
  }

  private async crawl(url: string): Promise<string> {
    const outcome: { html?: string; failure?: Error } = {};
    const requestQueue = await RequestQueue.open(uuid(), { config: this.config });

    const crawler = new CheerioCrawler(
      {
        requestQueue,
        requestHandler: ({ body }) => {
          outcome.html = body.toString();
        },
        failedRequestHandler: (_, error) => {
          outcome.failure = error;
        },
        maxRequestRetries: scale.scraping.maxRequestRetries,
        navigationTimeoutSecs: this.navigationTimeoutSecs,
        requestHandlerTimeoutSecs: this.navigationTimeoutSecs,
      },
      this.config,
    );

    try {
      await requestQueue.addRequest({ url, uniqueKey: uuid() });
      await crawler.run();
    } finally {
      await crawler.teardown();
      await requestQueue.drop();
    }

    if (outcome.failure) throw outcome.failure;
    if (outcome.html === undefined) throw new Error(`No response from ${url}`);
    return outcome.html;
  }
}
