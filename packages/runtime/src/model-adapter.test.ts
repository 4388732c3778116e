import { describe, it, expect } from "vitest";
import type { ClassificationRequest, CompletionRequest, PromptContext, UserId } from "@helpdesk/types";
import { MockLanguageModel, detectIntent } from "./model-adapter.js";

const context: PromptContext = {
  agent: "Agent",
  profile: {
    userId: "demo_user" as UserId,
    name: "Jack Sparrow",
    email: "demo@example.com",
    plan: "Standard",
    accountStatus: "active",
    createdAt: "2024-11-01",
    recentTickets: [],
    purchases: [],
  },
  scratch: {},
  history: [],
};

const signal = new AbortController().signal;

const labels = [
  { name: "FrontDesk", description: "" },
  { name: "BillingAgent", description: "" },
  { name: "OrderAgent", description: "" },
  { name: "TechnicalSupport", description: "" },
  { name: "EscalationAgent", description: "" },
];

function classification(input: string, only = labels): ClassificationRequest {
  return { router: "Coordinator", instructions: "", input, context, labels: only };
}

function completion(input: string, tools: string[], extra: Partial<CompletionRequest> = {}): CompletionRequest {
  return {
    agent: "Agent",
    instructions: "",
    input,
    context,
    tools: tools.map((id) => ({ id, description: "", parameters: [] })),
    messages: [
      { role: "system", content: "" },
      { role: "user", content: input },
    ],
    ...extra,
  };
}

describe("MockLanguageModel.classify", () => {
  it.each([
    ["Where is my order #12345?", "OrderAgent"],
    ["My app crashes on login", "TechnicalSupport"],
    ["Why was I charged twice on my invoice?", "BillingAgent"],
    ["I want to talk to a human", "EscalationAgent"],
    ["What's the status of my last ticket?", "FrontDesk"],
    ["Hello there", "FrontDesk"],
  ])("routes %s to %s", async (input, expected) => {
    expect(await new MockLanguageModel().classify(classification(input), signal)).toBe(expected);
  });

  it("returns the bare intent when no label matches", async () => {
    const model = new MockLanguageModel();
    expect(await model.classify(classification("Where is my order?", [{ name: "BillingAgent", description: "" }]), signal)).toBe(
      "order"
    );
    expect(detectIntent("refund please")).toBe("order");
  });
});

describe("MockLanguageModel.complete", () => {
  it("requests an order lookup for an order number", async () => {
    const result = await new MockLanguageModel().complete(
      completion("Where is my order #12345?", ["get_order_status"]),
      signal
    );
    expect(result).toEqual({
      text: "",
      toolCalls: [{ id: "call_1", name: "get_order_status", arguments: { orderId: "12345" } }],
    });
  });

  it("looks up the remembered ticket", async () => {
    const result = await new MockLanguageModel().complete(
      completion("what's the status of my last ticket?", ["get_user_context", "get_ticket_status"], {
        context: { ...context, scratch: { lastTicketId: "TICKET-1001" } },
      }),
      signal
    );
    expect(result.toolCalls?.[0]).toMatchObject({ name: "get_ticket_status", arguments: { ticketId: "TICKET-1001" } });
  });

  it("files a ticket with a guessed category", async () => {
    const result = await new MockLanguageModel().complete(
      completion("Please open a ticket, my login is broken", ["create_ticket", "get_ticket_status"]),
      signal
    );
    expect(result.toolCalls?.[0]).toMatchObject({
      name: "create_ticket",
      arguments: {
        summary: "Please open a ticket, my login is broken",
        category: "bug_report",
        priority: "medium",
        description: "Please open a ticket, my login is broken",
      },
    });
  });

  it("replies with tool summaries after results arrive", async () => {
    const request = completion("order?", ["get_order_status"], {
      messages: [
        { role: "system", content: "" },
        { role: "user", content: "order?" },
        { role: "assistant", content: "", toolCalls: [{ id: "c1", name: "get_order_status", arguments: {} }] },
        { role: "tool", toolCallId: "c1", name: "get_order_status", content: '{"summary":"Order 1 is In Transit."}' },
      ],
    });
    expect(await new MockLanguageModel().complete(request, signal)).toEqual({ text: "Order 1 is In Transit." });
  });

  it("prefixes the previous step when replying after tools", async () => {
    const request = completion("help", ["generate_solution_steps"], {
      context: { ...context, previous: { reply: "- KB: found", handledBy: "Gather" } },
      messages: [
        { role: "system", content: "" },
        { role: "user", content: "help" },
        { role: "assistant", content: "", toolCalls: [{ id: "c1", name: "generate_solution_steps", arguments: {} }] },
        { role: "tool", toolCallId: "c1", name: "generate_solution_steps", content: "Error: boom" },
      ],
    });
    expect(await new MockLanguageModel().complete(request, signal)).toEqual({ text: "- KB: found\n\nError: boom" });
  });

  it("asks a clarifying question without tools", async () => {
    const result = await new MockLanguageModel().complete(completion("hmm", []), signal);
    expect(result.text).toBe(
      "Hi Jack Sparrow, thanks for reaching out. Could you tell me a bit more about what you need help with?"
    );
  });
});
