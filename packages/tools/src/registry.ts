import { ToolRegistry } from "@helpdesk/runtime";
import type { SupportData } from "./data.js";
import { knowledgeBaseTools } from "./knowledge-base.js";
import { orderTools } from "./orders.js";
import { TicketStore, ticketTools } from "./tickets.js";
import { userContextTools } from "./user-context.js";
import { webSearchTools, type WebSearchOptions } from "./web-search.js";
import { solutionTools } from "./solutions.js";

export interface SupportToolOptions {
  web?: WebSearchOptions;
}

export interface SupportTools {
  registry: ToolRegistry;
  /** Backing ticket system, shared by the ticket tools. */
  tickets: TicketStore;
}

/** Every support backend registered under its tool id. */
export function createSupportToolRegistry(data: SupportData, opts: SupportToolOptions = {}): SupportTools {
  const tickets = new TicketStore(data.tickets, data.teams);
  const registry = new ToolRegistry([
    ...knowledgeBaseTools(data.articles, data.faq),
    ...orderTools(data.orders),
    ...ticketTools(tickets),
    ...userContextTools(data.users),
    ...webSearchTools(data.webResults, opts.web),
    ...solutionTools(),
  ]);
  return { registry, tickets };
}
