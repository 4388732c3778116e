import type { ClassificationRequest, PromptContext, ToolDescriptor, TurnSummary } from "@helpdesk/types";

/**
 * Builds the system prompt for a leaf: its instructions, the customer
 * profile, the scratch slice it may see, recent turns, and the preceding
 * sibling's output.
 */
export function buildSystemPrompt(
  instructions: string,
  context: PromptContext,
  tools: ReadonlyArray<ToolDescriptor>
): string {
  const toolList =
    tools.length > 0
      ? tools
          .map((t) => {
            const params = t.parameters
              .map((p) => `${p.name}${p.required ? "" : "?"}: ${p.description}`)
              .join(", ");
            return `- **${t.id}**(${params}): ${t.description}`;
          })
          .join("\n")
      : "- (no tools available)";

  const previous = context.previous
    ? `\n# Previous Step (${context.previous.handledBy})\n${context.previous.reply}\n`
    : "";

  return `You are ${context.agent}, part of a customer-support team.

# Instructions
${instructions.trim()}

# Customer
${renderProfile(context)}

# Working Notes
${renderScratch(context.scratch)}

# Recent Conversation
${renderHistory(context.history)}
${previous}
# Tools
${toolList}

# Tool Protocol
To call a tool, reply with a single line:
TOOL: tool_name {"arg": "value"}
When you have what you need, reply to the customer in plain text.
`;
}

/** Prompt for a router's classification call. */
export function buildClassificationPrompt(request: ClassificationRequest): string {
  const labels = request.labels.map((l) => `- ${l.name}: ${l.description}`).join("\n");

  return `You are ${request.router}, routing customer messages to the right specialist.

# Instructions
${request.instructions.trim()}

# Customer
${renderProfile(request.context)}

# Working Notes
${renderScratch(request.context.scratch)}

# Recent Conversation
${renderHistory(request.context.history)}

# Specialists
${labels}

Answer with the name of exactly one specialist and nothing else.
`;
}

function renderProfile(context: PromptContext): string {
  const p = context.profile;
  return [
    `Name: ${p.name}`,
    `Email: ${p.email}`,
    `Plan: ${p.plan}`,
    `Account status: ${p.accountStatus}`,
    `Recent tickets: ${p.recentTickets.join(", ") || "none"}`,
  ].join("\n");
}

function renderScratch(scratch: Readonly<Record<string, unknown>>): string {
  const entries = Object.entries(scratch);
  if (entries.length === 0) return "(none)";
  return entries.map(([key, value]) => `- ${key}: ${JSON.stringify(value)}`).join("\n");
}

function renderHistory(history: ReadonlyArray<TurnSummary>): string {
  if (history.length === 0) return "(this is the first message)";
  return history.map((t) => `Customer: ${t.input}\nAgent: ${t.reply}`).join("\n");
}
