import { z } from "zod";
import type { ProfileLoader, Tool, UserId, UserProfile } from "@helpdesk/types";
import { ToolError } from "@helpdesk/core";
import { defineTool } from "@helpdesk/runtime";
import type { UserRecord } from "./data.js";

/** CRM lookup used to bootstrap sessions. */
export class CrmProfileLoader implements ProfileLoader {
  constructor(private readonly users: Readonly<Record<string, UserRecord>>) {}

  async loadProfile(userId: UserId): Promise<UserProfile> {
    const user = this.users[userId];
    if (!user) {
      throw new Error(`User ${userId} not found in the CRM`);
    }
    return toProfile(userId, user);
  }
}

export function toProfile(userId: UserId, user: UserRecord): UserProfile {
  return {
    userId,
    name: user.name,
    email: user.email,
    plan: user.plan,
    accountStatus: user.accountStatus,
    createdAt: user.createdAt,
    recentTickets: [...user.recentTickets],
    purchases: [...user.purchases],
  };
}

export function userContextTools(users: Readonly<Record<string, UserRecord>>): Tool[] {
  const getUserContext = defineTool({
    id: "get_user_context",
    description: "Account details and recent support history for a user (defaults to the current user)",
    parameters: {
      userId: z.string().optional().describe("User id; omit for the user in this conversation"),
    },
    execute({ userId }, ctx) {
      const lookupId = userId ?? ctx.profile.userId;
      const user = users[lookupId];
      if (!user) {
        throw new ToolError("NotFound", "get_user_context", `User ${lookupId} not found`);
      }

      const tickets = user.recentTickets;
      return {
        result: {
          user: { name: user.name, email: user.email, plan: user.plan, accountStatus: user.accountStatus },
          supportContext: { recentTickets: tickets, ticketCount: tickets.length },
          summary:
            `${user.name} is on the ${user.plan} plan (account ${user.accountStatus})` +
            (tickets.length > 0 ? ` with recent tickets ${tickets.join(", ")}.` : " with no recent tickets."),
        },
      };
    },
  });

  return [getUserContext];
}
