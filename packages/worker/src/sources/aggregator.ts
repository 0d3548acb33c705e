// =============================================================================
// @dailysync/worker — Source aggregator
// =============================================================================
// Fetches every configured source for a date, in order. A failing source is
// logged and skipped; the result is whatever text the others produced, or ""
// when none did.
// =============================================================================

import {
  SourceFetchError,
  errorMessage,
  logExternalCall,
  type DateKey,
  type Logger,
  type SourceDefinition,
} from "@dailysync/shared";
import type { SourceCache } from "./cache.js";
import { extractArticleText } from "./html.js";

export interface SourceAggregator {
  fetchSourceText(date: DateKey): Promise<string>;
}

export type FetchFn = (
  url: string,
  init?: { signal?: AbortSignal; headers?: Record<string, string> },
) => Promise<Response>;

export interface SourceAggregatorOptions {
  sources: SourceDefinition[];
  cache: SourceCache;
  timeoutMs: number;
  logger: Logger;
  fetchFn?: FetchFn;
}

const USER_AGENT = "Mozilla/5.0 (compatible; dailysync/0.1)";

export function sourceUrl(source: SourceDefinition, date: DateKey): string {
  return `${source.baseUrl}${date}`;
}

export function createSourceAggregator(
  options: SourceAggregatorOptions,
): SourceAggregator {
  const { sources, cache, timeoutMs, logger } = options;
  const fetchFn: FetchFn = options.fetchFn ?? ((url, init) => fetch(url, init));

  async function fetchOne(
    source: SourceDefinition,
    date: DateKey,
  ): Promise<string> {
    const url = sourceUrl(source, date);
    let response: Response;
    try {
      response = await fetchFn(url, {
        signal: AbortSignal.timeout(timeoutMs),
        headers: { "user-agent": USER_AGENT },
      });
    } catch (err) {
      throw new SourceFetchError(source.name, `request failed: ${errorMessage(err)}`, {
        cause: err,
      });
    }
    if (!response.ok) {
      throw new SourceFetchError(source.name, `HTTP ${response.status} from ${url}`);
    }

    const text = extractArticleText(await response.text());
    if (text.length === 0) {
      throw new SourceFetchError(source.name, "page contains no article text");
    }

    const path = await cache.write(date, source.name, text);
    return cache.read(path);
  }

  return {
    async fetchSourceText(date) {
      const texts: string[] = [];

      for (const source of sources) {
        const start = performance.now();
        try {
          const text = await fetchOne(source, date);
          texts.push(text);
          logExternalCall(
            logger,
            "source",
            `fetch:${source.name}`,
            Math.round(performance.now() - start),
          );
        } catch (err) {
          logger.warn("Source skipped", {
            source: source.name,
            date,
            durationMs: Math.round(performance.now() - start),
            error: errorMessage(err),
          });
        }
      }

      logger.info("Sources aggregated", {
        date,
        fetched: texts.length,
        total: sources.length,
      });
      return texts.join("\n");
    },
  };
}
