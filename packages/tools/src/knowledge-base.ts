import { z } from "zod";
import type { Tool } from "@helpdesk/types";
import { defineTool } from "@helpdesk/runtime";
import type { Article } from "./data.js";

export interface ScoredArticle extends Article {
  relevanceScore: number;
}

/**
 * Keyword scoring over the article set:
 * whole query in title +10, each keyword in the query +5, whole query in
 * content +3, and per query word longer than three characters +1 in
 * content / +2 in title. Zero scores are dropped; ties keep fixture order.
 */
export function scoreArticles(articles: ReadonlyArray<Article>, query: string, maxResults: number): ScoredArticle[] {
  const q = query.toLowerCase();
  const words = new Set(q.split(/\s+/).filter(Boolean));

  const scored: ScoredArticle[] = [];
  for (const article of articles) {
    const title = article.title.toLowerCase();
    const content = article.content.toLowerCase();
    let score = 0;

    if (title.includes(q)) score += 10;
    for (const keyword of article.keywords) {
      if (q.includes(keyword) || words.has(keyword)) score += 5;
    }
    if (content.includes(q)) score += 3;
    for (const word of words) {
      if (word.length <= 3) continue;
      if (content.includes(word)) score += 1;
      if (title.includes(word)) score += 2;
    }

    if (score > 0) scored.push({ ...article, relevanceScore: score });
  }

  return scored.sort((a, b) => b.relevanceScore - a.relevanceScore).slice(0, maxResults);
}

export type FaqMatch = { found: true; topic: string; answer: string } | { found: false };

/** Topic contained in the question wins; otherwise the topic sharing the most words (at least one). */
export function matchFaq(faq: Readonly<Record<string, string>>, question: string): FaqMatch {
  const q = question.toLowerCase();
  for (const [topic, answer] of Object.entries(faq)) {
    if (q.includes(topic)) return { found: true, topic, answer };
  }

  const words = new Set(q.split(/\s+/).filter(Boolean));
  let best: { topic: string; answer: string; overlap: number } | undefined;
  for (const [topic, answer] of Object.entries(faq)) {
    const overlap = topic.split(" ").filter((w) => words.has(w)).length;
    if (overlap > (best?.overlap ?? 0)) best = { topic, answer, overlap };
  }
  return best ? { found: true, topic: best.topic, answer: best.answer } : { found: false };
}

export function knowledgeBaseTools(articles: ReadonlyArray<Article>, faq: Readonly<Record<string, string>>): Tool[] {
  const searchKnowledgeBase = defineTool({
    id: "search_knowledge_base",
    description: "Search support articles and help documentation by keywords",
    parameters: {
      query: z.string().min(1).describe("Search terms, e.g. 'webhook signature error'"),
      maxResults: z.number().int().min(1).max(10).default(3).describe("Maximum number of articles to return"),
    },
    execute({ query, maxResults }, ctx) {
      ctx.scratch.set("lastKbSearch", query);
      const matches = scoreArticles(articles, query, maxResults);
      const best = matches[0];
      return {
        result: {
          articles: matches,
          totalFound: matches.length,
          summary: best
            ? `Knowledge base article ${best.id} "${best.title}": ${firstStep(best.content)}`
            : "The knowledge base has no article matching this question.",
        },
      };
    },
  });

  const getFaqAnswer = defineTool({
    id: "get_faq_answer",
    description: "Quick answer for a common question (password reset, rate limits, billing cycle, ...)",
    parameters: {
      question: z.string().min(1).describe("The customer's question"),
    },
    execute({ question }) {
      const match = matchFaq(faq, question);
      if (!match.found) {
        return {
          result: {
            found: false,
            summary: "No FAQ entry matches this question. Searching the knowledge base may help.",
          },
        };
      }
      return { result: { found: true, topic: match.topic, answer: match.answer, summary: match.answer } };
    },
  });

  return [searchKnowledgeBase, getFaqAnswer];
}

/** First numbered step of an article, or its first line. */
function firstStep(content: string): string {
  const lines = content.split("\n").map((l) => l.trim());
  const step = lines.find((l) => /^1\.\s/.test(l));
  return (step ?? lines[0]).replace(/^1\.\s*/, "");
}
