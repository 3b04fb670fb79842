/**
 * Wikipedia client: page summaries with a search fallback.
 */

import { asArray, asString, getJson, pick } from "./http.js";
import type { WikiSummary } from "./types.js";

const PROVIDER = "Wikipedia";
const REST_BASE = "https://en.wikipedia.org/api/rest_v1/page/summary/";
const ACTION_API = "https://en.wikipedia.org/w/api.php";

export interface WikipediaOptions {
  timeoutMs?: number;
}

export class WikipediaClient {
  private timeoutMs: number;

  constructor(options: WikipediaOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 15_000;
  }

  async summary(title: string): Promise<WikiSummary | null> {
    const slug = encodeURIComponent(title.trim().replace(/\s+/g, "_"));
    const js = await getJson(PROVIDER, `${REST_BASE}${slug}`, { timeoutMs: this.timeoutMs });
    if (js === null || pick(js, "type") === "disambiguation") return null;
    const extract = asString(pick(js, "extract")) ?? "";
    if (!extract) return null;
    return {
      title: asString(pick(js, "title")) ?? title,
      url: asString(pick(js, "content_urls", "desktop", "page")) ?? "",
      description: asString(pick(js, "description")) ?? "",
      extract,
    };
  }

  /** Title of the best full-text search hit */
  async search(query: string): Promise<string | null> {
    const js = await getJson(PROVIDER, ACTION_API, {
      params: {
        action: "query",
        list: "search",
        srsearch: query,
        srlimit: 1,
        format: "json",
      },
      timeoutMs: this.timeoutMs,
    });
    const first = asArray(pick(js, "query", "search"))[0];
    return asString(pick(first, "title")) ?? null;
  }

  /** Try the query as a page title, then fall back to search */
  async lookup(query: string): Promise<WikiSummary | null> {
    const direct = await this.summary(query);
    if (direct) return direct;
    const title = await this.search(query);
    return title ? this.summary(title) : null;
  }
}
