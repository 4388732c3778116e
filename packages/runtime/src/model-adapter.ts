import { z } from "zod";
import type {
  ChatMessage,
  ClassificationRequest,
  Completion,
  CompletionRequest,
  LanguageModel,
  ToolCall,
} from "@helpdesk/types";

/**
 * A scripted language model for tests and offline runs.
 *
 * Classification:
 * - escalation wording ("human", "manager", "open a ticket") → escalation
 * - tickets, account, plan or profile questions → front desk
 * - order, shipping, delivery, refund, tracking → order
 * - billing, invoice, charge, payment, subscription → billing
 * - crashes, errors, login trouble, webhooks, API, slowness → technical
 * - anything else → front desk
 *
 * The chosen intent is answered with the first label whose name contains
 * it; when no label does, the bare intent comes back unchanged.
 *
 * Completion:
 * - after tool results → a reply joining their `summary` fields (prefixed
 *   with the previous step's reply, if any)
 * - otherwise → one call to the most specific declared tool for the input
 * - no usable tool → the previous step's reply, or a clarifying question
 */
export class MockLanguageModel implements LanguageModel {
  private nextCallId = 1;

  async classify(request: ClassificationRequest, signal: AbortSignal): Promise<string> {
    signal.throwIfAborted();
    const intent = detectIntent(request.input);
    const label = request.labels.find((l) => l.name.toLowerCase().includes(intent));
    return label?.name ?? intent;
  }

  async complete(request: CompletionRequest, signal: AbortSignal): Promise<Completion> {
    signal.throwIfAborted();

    const last = request.messages[request.messages.length - 1];
    if (last?.role === "tool") {
      const results = trailingToolResults(request.messages).map(summaryOf);
      const previous = request.context.previous?.reply;
      return { text: (previous ? [previous, ...results] : results).join("\n\n") };
    }

    const call = this.chooseTool(request);
    if (call) {
      return { text: "", toolCalls: [call] };
    }

    if (request.context.previous) {
      return { text: request.context.previous.reply };
    }
    return {
      text: `Hi ${request.context.profile.name}, thanks for reaching out. Could you tell me a bit more about what you need help with?`,
    };
  }

  private chooseTool(request: CompletionRequest): ToolCall | undefined {
    const available = new Set(request.tools.map((t) => t.id));
    const input = request.input;

    const order = input.match(/(?:#|\border\s+)(\d{3,})/i);
    if (available.has("get_order_status") && order) {
      return this.call("get_order_status", { orderId: order[1] });
    }

    if (available.has("create_ticket")) {
      return this.call("create_ticket", {
        summary: input.length > 80 ? `${input.slice(0, 77)}...` : input,
        category: guessCategory(input),
        priority: guessPriority(input),
        description: input,
      });
    }

    if (available.has("get_ticket_status")) {
      const ticketId = input.match(/TICKET-\d+/i)?.[0].toUpperCase() ?? stringValue(request.context.scratch.lastTicketId);
      if (ticketId) {
        return this.call("get_ticket_status", { ticketId });
      }
    }

    if (available.has("get_faq_answer")) {
      return this.call("get_faq_answer", { question: input });
    }
    if (available.has("search_knowledge_base")) {
      return this.call("search_knowledge_base", { query: input });
    }
    if (available.has("search_web")) {
      return this.call("search_web", { query: input });
    }
    if (available.has("search_similar_tickets")) {
      return this.call("search_similar_tickets", { description: input });
    }

    if (available.has("generate_solution_steps")) {
      const previous = request.context.previous?.reply;
      return this.call(
        "generate_solution_steps",
        previous ? { errorType: guessCategory(input), context: previous } : { errorType: guessCategory(input) }
      );
    }

    if (available.has("get_user_context")) {
      return this.call("get_user_context", {});
    }
    return undefined;
  }

  private call(name: string, args: Record<string, unknown>): ToolCall {
    return { id: `call_${this.nextCallId++}`, name, arguments: args };
  }
}

const INTENTS: ReadonlyArray<[RegExp, string]> = [
  [/\bhuman\b|escalat|\btalk to\b|\bspeak to\b|\bmanager\b|\b(create|open|file) a ticket\b/i, "escalation"],
  [/\bticket\b|\baccount\b|\bmy plan\b|\bprofile\b/i, "frontdesk"],
  [/\border\b|shipping|deliver|refund|package|tracking/i, "order"],
  [/\bbill|invoice|charge|payment|subscription/i, "billing"],
  [/crash|error|\bbug|\blog ?in\b|broken|not working|fail|webhook|\bapi\b|\bslow\b|timeout/i, "technical"],
];

export function detectIntent(input: string): string {
  for (const [pattern, intent] of INTENTS) {
    if (pattern.test(input)) return intent;
  }
  return "frontdesk";
}

function guessCategory(input: string): string {
  if (/password/i.test(input)) return "password_reset";
  if (/security|hack|breach|phish/i.test(input)) return "security";
  if (/\bslow\b|performance|latency|timeout/i.test(input)) return "performance";
  if (/\bbill|invoice|charge|payment|refund/i.test(input)) return "billing";
  if (/\border\b|shipping|deliver|package/i.test(input)) return "order";
  if (/crash|error|\bbug|broken|not working|fail/i.test(input)) return "bug_report";
  if (/feature|how do i|can i/i.test(input)) return "feature_question";
  return "other";
}

function guessPriority(input: string): string {
  if (/critical|outage|emergency/i.test(input)) return "critical";
  if (/urgent|asap|\bdown\b/i.test(input)) return "high";
  return "medium";
}

function trailingToolResults(messages: ReadonlyArray<ChatMessage>): ChatMessage[] {
  const results: ChatMessage[] = [];
  for (let i = messages.length - 1; i >= 0 && messages[i].role === "tool"; i--) {
    results.unshift(messages[i]);
  }
  return results;
}

const SummarySchema = z.object({ summary: z.string() });

function summaryOf(message: ChatMessage): string {
  if (message.content.startsWith("Error:")) return message.content;
  try {
    const parsed = SummarySchema.safeParse(JSON.parse(message.content));
    return parsed.success ? parsed.data.summary : message.content;
  } catch {
    return message.content;
  }
}

function stringValue(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}
