import { z } from "zod";
import type { Tool } from "@helpdesk/types";
import { ToolError } from "@helpdesk/core";
import { defineTool } from "@helpdesk/runtime";
import type { Teams, Ticket } from "./data.js";

const PRIORITIES = ["low", "medium", "high", "critical"] as const;
const DEFAULT_TEAM = "general_support";
const DEFAULT_SLA_HOURS = 24;
const FIRST_TICKET_NUMBER = 1001;

/**
 * In-memory ticket system. Seeded from fixtures; new tickets get
 * sequential ids starting at TICKET-1001, skipping ids already taken.
 */
export class TicketStore {
  private tickets = new Map<string, Ticket>();
  private nextNumber = FIRST_TICKET_NUMBER;

  constructor(
    seed: ReadonlyArray<Ticket>,
    private readonly teams: Teams
  ) {
    for (const ticket of seed) this.tickets.set(ticket.id, { ...ticket });
  }

  get(id: string): Ticket | undefined {
    return this.tickets.get(id.toUpperCase());
  }

  all(): Ticket[] {
    return [...this.tickets.values()];
  }

  teamFor(category: string): string {
    return this.teams.assignments[category] ?? DEFAULT_TEAM;
  }

  slaHours(priority: string): number {
    return this.teams.responseSlaHours[priority] ?? DEFAULT_SLA_HOURS;
  }

  escalationPath(team: string): string {
    return this.teams.escalationPaths[team] ?? "support_manager";
  }

  create(fields: Pick<Ticket, "title" | "category" | "priority" | "description" | "userId" | "attemptedSolutions">): Ticket {
    let id = `TICKET-${this.nextNumber++}`;
    while (this.tickets.has(id)) id = `TICKET-${this.nextNumber++}`;

    const ticket: Ticket = {
      ...fields,
      id,
      status: "open",
      assignedTeam: this.teamFor(fields.category),
      createdAt: new Date().toISOString(),
      resolvedAt: null,
      resolution: null,
    };
    this.tickets.set(id, ticket);
    return ticket;
  }
}

export interface SimilarTicket {
  ticketId: string;
  title: string;
  category: string;
  description: string;
  resolution: string;
  relevanceScore: number;
}

/**
 * Resolved tickets scored against a description: per word longer than
 * three characters +3 in the title and +1 in the description, +2 when a
 * requested category matches.
 */
export function findSimilarTickets(
  tickets: ReadonlyArray<Ticket>,
  description: string,
  category: string | undefined,
  limit: number
): SimilarTicket[] {
  const words = [...new Set(description.toLowerCase().split(/\s+/))].filter((w) => w.length > 3);
  const scored: SimilarTicket[] = [];

  for (const ticket of tickets) {
    if (ticket.status !== "resolved") continue;
    if (category && ticket.category !== category) continue;

    const title = ticket.title.toLowerCase();
    const desc = ticket.description.toLowerCase();
    let score = 0;
    for (const word of words) {
      if (title.includes(word)) score += 3;
      if (desc.includes(word)) score += 1;
    }
    if (category) score += 2;

    if (score > 0) {
      scored.push({
        ticketId: ticket.id,
        title: ticket.title,
        category: ticket.category,
        description: ticket.description,
        resolution: ticket.resolution ?? "No resolution recorded",
        relevanceScore: score,
      });
    }
  }

  return scored.sort((a, b) => b.relevanceScore - a.relevanceScore).slice(0, limit);
}

export function ticketTools(store: TicketStore): Tool[] {
  const createTicket = defineTool({
    id: "create_ticket",
    description: "Open a support ticket for human review",
    parameters: {
      summary: z.string().min(1).describe("Brief summary of the issue"),
      category: z.string().min(1).describe("Issue category, e.g. 'integration', 'billing', 'bug_report'"),
      priority: z.enum(PRIORITIES).describe("low, medium, high or critical"),
      description: z.string().min(1).describe("Full description including error messages"),
      attemptedSolutions: z.array(z.string()).optional().describe("Solutions already tried"),
    },
    execute(args, ctx) {
      const ticket = store.create({
        title: args.summary,
        category: args.category,
        priority: args.priority,
        description: args.description,
        userId: ctx.profile.userId,
        attemptedSolutions: args.attemptedSolutions ?? [],
      });
      const hours = store.slaHours(ticket.priority);
      ctx.scratch.set("lastTicketId", ticket.id);

      return {
        result: {
          ticketId: ticket.id,
          assignedTeam: ticket.assignedTeam,
          priority: ticket.priority,
          estimatedResponse: `${hours} hour(s)`,
          summary: `Ticket ${ticket.id} created and assigned to ${ticket.assignedTeam}. Expected response within ${hours} hour(s).`,
        },
        effect: {
          type: "ticket_created",
          data: { ticketId: ticket.id, team: ticket.assignedTeam, priority: ticket.priority },
        },
      };
    },
  });

  const assignToTeam = defineTool({
    id: "assign_to_team",
    description: "Work out which team handles an issue and its response SLA",
    parameters: {
      category: z.string().min(1).describe("Issue category"),
      priority: z.enum(PRIORITIES).describe("low, medium, high or critical"),
    },
    execute({ category, priority }) {
      const team = store.teamFor(category);
      const hours = store.slaHours(priority);
      const urgent = priority === "critical" || priority === "high";
      return {
        result: {
          team,
          teamDescription: `The ${titleCase(team)} handles ${category} issues`,
          responseSla: `${hours} hours`,
          escalationPath: store.escalationPath(team),
          ...(urgent && { urgencyNote: `This is a ${priority} priority issue - team will be notified immediately` }),
          summary: `${titleCase(team)} handles ${category} issues with a ${hours} hour response target.`,
        },
      };
    },
  });

  const getTicketStatus = defineTool({
    id: "get_ticket_status",
    description: "Current status of a support ticket",
    parameters: {
      ticketId: z.string().min(1).describe("Ticket id, e.g. 'TICKET-789'"),
    },
    execute({ ticketId }) {
      const ticket = store.get(ticketId);
      if (!ticket) {
        throw new ToolError("NotFound", "get_ticket_status", `Ticket ${ticketId} not found`);
      }

      let summary = `Ticket ${ticket.id} "${ticket.title}" is ${ticket.status.replace("_", " ")} with ${ticket.assignedTeam}.`;
      if (ticket.resolution) summary += ` Resolution: ${sentence(ticket.resolution)}`;
      return {
        result: {
          ticket: {
            id: ticket.id,
            title: ticket.title,
            status: ticket.status,
            priority: ticket.priority,
            assignedTeam: ticket.assignedTeam,
            createdAt: ticket.createdAt,
            ...(ticket.status === "resolved" && { resolvedAt: ticket.resolvedAt, resolution: ticket.resolution }),
          },
          summary,
        },
      };
    },
  });

  const searchSimilarTickets = defineTool({
    id: "search_similar_tickets",
    description: "Find previously resolved tickets similar to an issue",
    parameters: {
      description: z.string().min(1).describe("Description of the current issue"),
      category: z.string().optional().describe("Only tickets in this category"),
      limit: z.number().int().min(1).max(10).default(3).describe("Maximum number of tickets"),
    },
    execute({ description, category, limit }, ctx) {
      const similar = findSimilarTickets(store.all(), description, category, limit);
      const best = similar[0];
      if (best) ctx.scratch.set("similarTickets", similar.map((t) => t.ticketId));

      return {
        result: {
          similarTickets: similar,
          totalFound: similar.length,
          summary: best
            ? `Similar resolved ticket ${best.ticketId} "${best.title}": ${sentence(best.resolution)}`
            : "No similar resolved tickets found. This may be a new issue.",
        },
      };
    },
  });

  return [createTicket, assignToTeam, getTicketStatus, searchSimilarTickets];
}

function sentence(text: string): string {
  return text.endsWith(".") ? text : `${text}.`;
}

function titleCase(snake: string): string {
  return snake
    .split("_")
    .map((w) => w.charAt(0).toUpperCase() + w.slice(1))
    .join(" ");
}
