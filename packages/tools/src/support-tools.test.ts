import { describe, it, expect, beforeAll } from "vitest";
import os from "node:os";
import path from "node:path";
import type { SessionId, Tool, ToolExecutionContext, UserId } from "@helpdesk/types";
import { ScratchScope, ToolError } from "@helpdesk/core";
import { loadSupportData, type SupportData } from "./data.js";
import { matchFaq, scoreArticles } from "./knowledge-base.js";
import { findSimilarTickets, TicketStore } from "./tickets.js";
import { CrmProfileLoader, toProfile } from "./user-context.js";
import { matchWebResults, webSearchTools } from "./web-search.js";
import { createSupportToolRegistry } from "./registry.js";

let data: SupportData;

beforeAll(async () => {
  data = await loadSupportData();
});

function toolContext(userId = "demo_user", signal = new AbortController().signal) {
  const store = new Map<string, unknown>();
  const ctx: ToolExecutionContext = {
    sessionId: "session-1" as SessionId,
    profile: toProfile(userId as UserId, data.users[userId] ?? data.users.demo_user),
    scratch: ScratchScope.root(store).forNode("TestAgent"),
    signal,
    node: "TestAgent",
  };
  return { ctx, store };
}

function tool(id: string): Tool {
  const found = createSupportToolRegistry(data).registry.get(id);
  if (!found) throw new Error(`missing tool ${id}`);
  return found;
}

describe("loadSupportData", () => {
  it("loads every fixture", () => {
    expect(data.articles.map((a) => a.id)).toEqual(["KB001", "KB002", "KB003", "KB004", "KB005", "KB006"]);
    expect(Object.keys(data.faq)).toHaveLength(8);
    expect(data.orders["12345"].status).toBe("In Transit");
    expect(data.teams.responseSlaHours.critical).toBe(1);
  });

  it("rejects a directory without fixtures", async () => {
    await expect(loadSupportData(path.join(os.tmpdir(), "helpdesk-no-fixtures"))).rejects.toThrow();
  });
});

describe("knowledge base", () => {
  it("scores articles by title, keyword and word matches", () => {
    const ranked = scoreArticles(data.articles, "My app crashes on login", 3);
    expect(ranked.map((a) => [a.id, a.relevanceScore])).toEqual([
      ["KB006", 21],
      ["KB001", 6],
      ["KB005", 5],
    ]);
  });

  it("search_knowledge_base records the query and summarizes the best match", async () => {
    const { ctx, store } = toolContext();
    const outcome = await tool("search_knowledge_base").run({ query: "My app crashes on login", maxResults: 1 }, ctx);

    expect(outcome).toMatchObject({
      result: {
        totalFound: 1,
        summary: 'Knowledge base article KB006 "App Crashes on Login": Update the app to the latest version',
      },
    });
    expect(store.get("lastKbSearch")).toBe("My app crashes on login");
  });

  it("reports when nothing matches", async () => {
    const { ctx } = toolContext();
    const outcome = await tool("search_knowledge_base").run({ query: "zzzz qqqq" }, ctx);
    expect(outcome).toMatchObject({
      result: { totalFound: 0, summary: "The knowledge base has no article matching this question." },
    });
  });

  it("rejects an empty query", async () => {
    const { ctx } = toolContext();
    const err = await tool("search_knowledge_base")
      .run({ query: "" }, ctx)
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ToolError);
    expect(err).toMatchObject({ kind: "InvalidArgs", toolId: "search_knowledge_base" });
  });

  it("matches FAQ topics directly, then by word overlap", () => {
    expect(matchFaq(data.faq, "How do I do a password reset?")).toMatchObject({ found: true, topic: "password reset" });
    expect(matchFaq(data.faq, "what is the billing policy")).toMatchObject({ found: true, topic: "billing cycle" });
    expect(matchFaq(data.faq, "hello there")).toEqual({ found: false });
  });
});

describe("orders", () => {
  it("returns the status, records the order and emits an effect", async () => {
    const { ctx, store } = toolContext();
    const outcome = await tool("get_order_status").run({ orderId: "#12345" }, ctx);

    expect(outcome.effect).toEqual({ type: "order_fetched", data: { orderId: "12345", status: "In Transit" } });
    expect(outcome).toMatchObject({
      result: {
        summary: "Order 12345 (Noise-Cancelling Headphones) is In Transit. Estimated delivery: 2025-01-20.",
      },
    });
    expect(store.get("lastOrderId")).toBe("12345");
  });

  it("leaves out the delivery estimate when there is none", async () => {
    const { ctx } = toolContext();
    const outcome = await tool("get_order_status").run({ orderId: "101" }, ctx);
    expect(outcome).toMatchObject({ result: { summary: "Order 101 (Smart Speaker) is Delivered." } });
  });

  it("throws NotFound for unknown orders", async () => {
    const { ctx, store } = toolContext();
    await expect(tool("get_order_status").run({ orderId: "999" }, ctx)).rejects.toMatchObject({
      kind: "NotFound",
      message: "Order 999 not found",
    });
    expect(store.has("lastOrderId")).toBe(false);
  });
});

describe("tickets", () => {
  it("creates tickets with sequential ids, team and SLA", async () => {
    const { registry } = createSupportToolRegistry(data);
    const create = registry.get("create_ticket");
    if (!create) throw new Error("create_ticket missing");
    const { ctx, store } = toolContext("user_123");

    const first = await create.run(
      { summary: "Charged twice", category: "billing", priority: "high", description: "Two charges in January" },
      ctx
    );
    const second = await create.run(
      { summary: "Question", category: "other", priority: "low", description: "Something else" },
      ctx
    );

    expect(first).toEqual({
      result: {
        ticketId: "TICKET-1001",
        assignedTeam: "finance_team",
        priority: "high",
        estimatedResponse: "4 hour(s)",
        summary: "Ticket TICKET-1001 created and assigned to finance_team. Expected response within 4 hour(s).",
      },
      effect: { type: "ticket_created", data: { ticketId: "TICKET-1001", team: "finance_team", priority: "high" } },
    });
    expect(second).toMatchObject({
      result: { ticketId: "TICKET-1002", assignedTeam: "general_support", estimatedResponse: "24 hour(s)" },
    });
    expect(store.get("lastTicketId")).toBe("TICKET-1002");
  });

  it("stores the creating user on the ticket", async () => {
    const { registry, tickets } = createSupportToolRegistry(data);
    const { ctx } = toolContext("user_456");
    await registry
      .get("create_ticket")
      ?.run({ summary: "Dock", category: "order", priority: "medium", description: "Dock arrived damaged" }, ctx);

    expect(tickets.get("TICKET-1001")).toMatchObject({
      userId: "user_456",
      status: "open",
      assignedTeam: "order_fulfillment_team",
      attemptedSolutions: [],
    });
  });

  it("rejects an unknown priority", async () => {
    const { ctx } = toolContext();
    await expect(
      tool("create_ticket").run({ summary: "x", category: "billing", priority: "urgent", description: "x" }, ctx)
    ).rejects.toMatchObject({ kind: "InvalidArgs" });
  });

  it("reports status with the resolution of resolved tickets", async () => {
    const { ctx } = toolContext();
    const resolved = await tool("get_ticket_status").run({ ticketId: "ticket-789" }, ctx);
    const open = await tool("get_ticket_status").run({ ticketId: "TICKET-880" }, ctx);

    expect(resolved).toMatchObject({
      result: {
        ticket: { id: "TICKET-789", resolution: "API key was for test environment, provided production key" },
        summary:
          'Ticket TICKET-789 "Cannot connect to API" is resolved with integration_team. Resolution: API key was for test environment, provided production key.',
      },
    });
    expect(open).toMatchObject({
      result: { summary: 'Ticket TICKET-880 "Invoice PDF download fails" is open with finance_team.' },
    });
  });

  it("throws NotFound for unknown tickets", async () => {
    const { ctx } = toolContext();
    await expect(tool("get_ticket_status").run({ ticketId: "TICKET-1" }, ctx)).rejects.toMatchObject({
      kind: "NotFound",
      message: "Ticket TICKET-1 not found",
    });
  });

  it("finds similar resolved tickets only", () => {
    const store = new TicketStore(data.tickets, data.teams);
    expect(findSimilarTickets(store.all(), "My app crashes on login", undefined, 3)).toEqual([
      {
        ticketId: "TICKET-612",
        title: "Mobile app crashes after login",
        category: "bug_report",
        description: "App closes immediately after login on Android 14",
        resolution: "Fixed in app version 4.2.1; updating the app and clearing its cache resolves it",
        relevanceScore: 7,
      },
    ]);
  });

  it("boosts tickets in the requested category", () => {
    const similar = findSimilarTickets(data.tickets, "webhook events stopped", "integration", 3);
    expect(similar.map((t) => [t.ticketId, t.relevanceScore])).toEqual([
      ["TICKET-456", 11],
      ["TICKET-789", 2],
    ]);
  });

  it("search_similar_tickets records the ticket ids it found", async () => {
    const { ctx, store } = toolContext();
    const outcome = await tool("search_similar_tickets").run({ description: "My app crashes on login" }, ctx);

    expect(outcome).toMatchObject({
      result: {
        totalFound: 1,
        summary:
          'Similar resolved ticket TICKET-612 "Mobile app crashes after login": Fixed in app version 4.2.1; updating the app and clearing its cache resolves it.',
      },
    });
    expect(store.get("similarTickets")).toEqual(["TICKET-612"]);
  });

  it("assigns teams with escalation path and urgency note", async () => {
    const { ctx } = toolContext();
    const critical = await tool("assign_to_team").run({ category: "security", priority: "critical" }, ctx);
    const low = await tool("assign_to_team").run({ category: "billing", priority: "low" }, ctx);

    expect(critical).toEqual({
      result: {
        team: "security_team",
        teamDescription: "The Security Team handles security issues",
        responseSla: "1 hours",
        escalationPath: "security_officer",
        urgencyNote: "This is a critical priority issue - team will be notified immediately",
        summary: "Security Team handles security issues with a 1 hour response target.",
      },
    });
    expect(low.result).not.toHaveProperty("urgencyNote");
  });
});

describe("user context", () => {
  it("loads CRM profiles", async () => {
    const loader = new CrmProfileLoader(data.users);
    await expect(loader.loadProfile("user_123" as UserId)).resolves.toMatchObject({
      userId: "user_123",
      name: "John Smith",
      plan: "Pro",
      recentTickets: ["TICKET-456", "TICKET-234"],
    });
    await expect(loader.loadProfile("ghost" as UserId)).rejects.toThrow("User ghost not found in the CRM");
  });

  it("describes the current user by default", async () => {
    const { ctx } = toolContext("demo_user");
    const outcome = await tool("get_user_context").run({}, ctx);
    expect(outcome).toMatchObject({
      result: {
        summary: "Jack Sparrow is on the Standard plan (account active) with recent tickets TICKET-789.",
      },
    });
  });

  it("looks up another user by id", async () => {
    const { ctx } = toolContext("demo_user");
    const outcome = await tool("get_user_context").run({ userId: "user_456" }, ctx);
    expect(outcome).toMatchObject({
      result: {
        supportContext: { recentTickets: [], ticketCount: 0 },
        summary: "Jane Doe is on the Enterprise plan (account active) with no recent tickets.",
      },
    });
  });

  it("throws NotFound for unknown users", async () => {
    const { ctx } = toolContext();
    await expect(tool("get_user_context").run({ userId: "ghost" }, ctx)).rejects.toMatchObject({
      kind: "NotFound",
    });
  });
});

describe("web search", () => {
  it("ranks canned results by keyword hits", () => {
    expect(matchWebResults(data.webResults, "webhook signature failing", 3).map((r) => r.url)).toEqual([
      "https://docs.example.com/webhooks/signatures",
    ]);
  });

  it("summarizes the top result", async () => {
    const { ctx } = toolContext();
    const outcome = await tool("search_web").run({ query: "webhook signature failing" }, ctx);
    expect(outcome).toMatchObject({
      result: {
        summary:
          "Web: Webhook signature verification explained (https://docs.example.com/webhooks/signatures): Compute an HMAC-SHA256 of the raw request body with your webhook secret and compare it to the signature header.",
      },
    });
  });

  it("stops waiting when its signal aborts", async () => {
    const [search] = webSearchTools(data.webResults, { latencyMs: 10_000 });
    const controller = new AbortController();
    const { ctx } = toolContext("demo_user", controller.signal);

    const pending = search.run({ query: "login crash" }, ctx);
    controller.abort();
    await expect(pending).rejects.toMatchObject({ name: "AbortError" });
  });

  it("reports when nothing matches", async () => {
    const { ctx } = toolContext();
    const outcome = await tool("search_web").run({ query: "zzz" }, ctx);
    expect(outcome).toMatchObject({ result: { results: [], summary: "Web search found nothing relevant." } });
  });
});

describe("solution steps", () => {
  it("puts the category-specific step first", async () => {
    const { ctx } = toolContext();
    const outcome = await tool("generate_solution_steps").run({ errorType: "bug_report" }, ctx);
    expect(outcome).toMatchObject({
      result: {
        errorType: "bug_report",
        context: null,
        summary:
          "Suggested next steps: 1. Update to the latest version and clear cached data. 2. Review the full error message and recent changes. 3. Check relevant logs or dashboards for more details.",
      },
    });
  });
});

describe("createSupportToolRegistry", () => {
  it("registers every support tool", () => {
    expect(createSupportToolRegistry(data).registry.ids().sort()).toEqual([
      "assign_to_team",
      "create_ticket",
      "generate_solution_steps",
      "get_faq_answer",
      "get_order_status",
      "get_ticket_status",
      "get_user_context",
      "search_knowledge_base",
      "search_similar_tickets",
      "search_web",
    ]);
  });
});
