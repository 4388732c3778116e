import { setTimeout as sleep } from "node:timers/promises";
import { z } from "zod";
import type { Tool } from "@helpdesk/types";
import { defineTool } from "@helpdesk/runtime";
import type { WebResult } from "./data.js";

export interface WebSearchOptions {
  /** Simulated backend latency. The call stops early when its signal aborts. */
  latencyMs?: number;
  maxResults?: number;
}

/** Canned results whose keywords appear in the query, most keyword hits first. */
export function matchWebResults(results: ReadonlyArray<WebResult>, query: string, maxResults: number): WebResult[] {
  const q = query.toLowerCase();
  return results
    .map((r) => ({ r, hits: r.keywords.filter((k) => q.includes(k)).length }))
    .filter((m) => m.hits > 0)
    .sort((a, b) => b.hits - a.hits)
    .slice(0, maxResults)
    .map((m) => m.r);
}

export function webSearchTools(results: ReadonlyArray<WebResult>, opts: WebSearchOptions = {}): Tool[] {
  const latencyMs = opts.latencyMs ?? 0;
  const maxResults = opts.maxResults ?? 3;

  const searchWeb = defineTool({
    id: "search_web",
    description: "Search the public web (status pages, forums, documentation)",
    parameters: {
      query: z.string().min(1).describe("Search query"),
    },
    async execute({ query }, ctx) {
      if (latencyMs > 0) {
        await sleep(latencyMs, undefined, { signal: ctx.signal });
      }

      const hits = matchWebResults(results, query, maxResults);
      const top = hits[0];
      return {
        result: {
          results: hits.map(({ title, url, snippet }) => ({ title, url, snippet })),
          summary: top ? `Web: ${top.title} (${top.url}): ${top.snippet}` : "Web search found nothing relevant.",
        },
      };
    },
  });

  return [searchWeb];
}
