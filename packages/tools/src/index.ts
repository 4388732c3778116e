export { loadSupportData, DEFAULT_DATA_DIR } from "./data.js";
export type { SupportData, Article, Order, Ticket, Teams, UserRecord, WebResult } from "./data.js";
export { knowledgeBaseTools, scoreArticles, matchFaq } from "./knowledge-base.js";
export type { ScoredArticle, FaqMatch } from "./knowledge-base.js";
export { orderTools } from "./orders.js";
export { TicketStore, ticketTools, findSimilarTickets } from "./tickets.js";
export type { SimilarTicket } from "./tickets.js";
export { CrmProfileLoader, userContextTools, toProfile } from "./user-context.js";
export { webSearchTools, matchWebResults } from "./web-search.js";
export type { WebSearchOptions } from "./web-search.js";
export { solutionTools, solutionSteps } from "./solutions.js";
export { createSupportToolRegistry } from "./registry.js";
export type { SupportToolOptions, SupportTools } from "./registry.js";
