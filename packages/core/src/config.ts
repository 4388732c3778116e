import fs from "node:fs/promises";
import yaml from "js-yaml";
import { z } from "zod";
import { ConfigError } from "./errors.js";

const ToolOverrideSchema = z.object({
  timeoutMs: z.number().int().positive().optional(),
  retries: z.number().int().min(0).max(5).optional(),
});

export const GatewayConfigSchema = z.object({
  logging: z
    .object({
      level: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
      pretty: z.boolean().default(false),
    })
    .default({}),
  model: z
    .object({
      provider: z.enum(["mock", "openai"]).default("mock"),
      name: z.string().default("gpt-4o-mini"),
      timeoutMs: z.number().int().positive().default(20_000),
      apiKey: z.string().optional(),
    })
    .default({}),
  routing: z
    .object({
      classifyTimeoutMs: z.number().int().positive().default(10_000),
    })
    .default({}),
  tools: z
    .object({
      timeoutMs: z.number().int().positive().default(5_000),
      overrides: z.record(ToolOverrideSchema).default({}),
    })
    .default({}),
  scratch: z
    .object({
      /** Keys (or `prefix*` patterns) kept across turns. Everything else is turn-scoped. */
      retain: z.array(z.string().min(1)).default([]),
    })
    .default({}),
  tree: z
    .object({
      /** Agent tree definition; relative paths resolve against the config file. */
      path: z.string().optional(),
      maxDepth: z.number().int().positive().default(6),
    })
    .default({}),
  persistence: z
    .object({
      driver: z.enum(["memory", "sqlite"]).default("memory"),
      path: z.string().default("helpdesk.db"),
    })
    .default({}),
  history: z
    .object({
      /** Past turns shown to the model. */
      window: z.number().int().min(0).default(6),
    })
    .default({}),
});

export type GatewayConfig = z.infer<typeof GatewayConfigSchema>;
export type ToolOverride = z.infer<typeof ToolOverrideSchema>;

/** Defaults for every key; what `loadGatewayConfig` returns for a missing file. */
export function defaultGatewayConfig(): GatewayConfig {
  return GatewayConfigSchema.parse({});
}

/**
 * Load config from a YAML file, then apply environment overrides.
 * A missing file yields the defaults; an unreadable or invalid one throws.
 */
export async function loadGatewayConfig(
  path: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<GatewayConfig> {
  let raw: unknown = {};
  try {
    raw = yaml.load(await fs.readFile(path, "utf8")) ?? {};
  } catch (err) {
    if (!isMissingFile(err)) {
      throw new ConfigError(`Could not read config ${path}: ${String(err)}`, { cause: err });
    }
  }

  const parsed = GatewayConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; ");
    throw new ConfigError(`Invalid config ${path}: ${issues}`);
  }

  return applyEnvOverrides(parsed.data, env);
}

function applyEnvOverrides(config: GatewayConfig, env: NodeJS.ProcessEnv): GatewayConfig {
  const level = GatewayConfigSchema.shape.logging.removeDefault().shape.level.safeParse(env.HELPDESK_LOG_LEVEL);
  const provider = GatewayConfigSchema.shape.model.removeDefault().shape.provider.safeParse(env.HELPDESK_MODEL_PROVIDER);

  return {
    ...config,
    logging: {
      ...config.logging,
      level: env.HELPDESK_LOG_LEVEL && level.success ? level.data : config.logging.level,
    },
    model: {
      ...config.model,
      provider: env.HELPDESK_MODEL_PROVIDER && provider.success ? provider.data : config.model.provider,
      apiKey: config.model.apiKey ?? env.OPENAI_API_KEY,
    },
  };
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
