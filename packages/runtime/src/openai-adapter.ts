import { z } from "zod";
import type {
  ChatMessage,
  ClassificationRequest,
  Completion,
  CompletionRequest,
  LanguageModel,
  ToolCall,
} from "@helpdesk/types";
import { silentLogger, type Logger } from "@helpdesk/core";
import { buildClassificationPrompt } from "./prompt-builder.js";

const ChatCompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }),
      })
    )
    .min(1),
});

const ToolArgumentsSchema = z.record(z.unknown());

export interface OpenAIModelOptions {
  apiKey: string;
  model?: string;
  baseUrl?: string;
  temperature?: number;
  log?: Logger;
}

/**
 * LanguageModel over the OpenAI chat-completions REST API.
 * Tool calls use the text protocol from the system prompt:
 * `TOOL: name {json}` on its own line.
 */
export class OpenAIAdapter implements LanguageModel {
  private readonly apiKey: string;
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly temperature: number;
  private readonly log: Logger;
  private nextCallId = 1;

  constructor(opts: OpenAIModelOptions) {
    if (!opts.apiKey) throw new Error("OpenAI API key is required");
    this.apiKey = opts.apiKey;
    this.model = opts.model ?? "gpt-4o-mini";
    this.baseUrl = opts.baseUrl ?? "https://api.openai.com/v1";
    this.temperature = opts.temperature ?? 0.2;
    this.log = (opts.log ?? silentLogger()).child({ component: "openai" });
  }

  async complete(request: CompletionRequest, signal: AbortSignal): Promise<Completion> {
    const content = await this.chat(this.convertMessages(request.messages), signal);
    return this.parseToolCalls(content);
  }

  async classify(request: ClassificationRequest, signal: AbortSignal): Promise<string> {
    const content = await this.chat(
      [
        { role: "system", content: buildClassificationPrompt(request) },
        { role: "user", content: request.input },
      ],
      signal
    );
    return content.trim().split("\n")[0].replace(/[*`"'.]/g, "").trim();
  }

  private async chat(messages: Array<{ role: string; content: string }>, signal: AbortSignal): Promise<string> {
    const response = await fetch(`${this.baseUrl}/chat/completions`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({ model: this.model, messages, temperature: this.temperature }),
      signal,
    });

    if (!response.ok) {
      const errorText = await response.text();
      throw new Error(`OpenAI API error ${response.status}: ${errorText}`);
    }

    const parsed = ChatCompletionSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Unexpected OpenAI response: ${parsed.error.message}`);
    }
    return parsed.data.choices[0].message.content ?? "";
  }

  private parseToolCalls(content: string): Completion {
    const toolRegex = /TOOL:\s*([a-zA-Z0-9_.]+)\s*(\{.*\})/g;
    const toolCalls: ToolCall[] = [];
    let text = content;

    for (const match of content.matchAll(toolRegex)) {
      const [fullMatch, name, argsJson] = match;
      const args = parseArguments(argsJson);
      if (!args) {
        this.log.warn({ call: fullMatch }, "failed to parse tool call");
        continue;
      }
      toolCalls.push({ id: `call_${this.nextCallId++}`, name, arguments: args });
      text = text.replace(fullMatch, "").trim();
    }

    return toolCalls.length > 0 ? { text, toolCalls } : { text };
  }

  /** Tool results go back as user messages, since the text protocol has no tool role. */
  private convertMessages(messages: ReadonlyArray<ChatMessage>): Array<{ role: string; content: string }> {
    return messages.map((m) => {
      if (m.role === "tool") {
        return { role: "user", content: `[Tool Result: ${m.name ?? "unknown"}] ${m.content}` };
      }
      if (m.role === "assistant" && m.toolCalls?.length) {
        const calls = m.toolCalls.map((c) => `TOOL: ${c.name} ${JSON.stringify(c.arguments)}`).join("\n");
        return { role: "assistant", content: [m.content, calls].filter(Boolean).join("\n") };
      }
      return { role: m.role, content: m.content };
    });
  }
}

function parseArguments(json: string): Record<string, unknown> | undefined {
  try {
    const parsed = ToolArgumentsSchema.safeParse(JSON.parse(json));
    return parsed.success ? parsed.data : undefined;
  } catch {
    return undefined;
  }
}
