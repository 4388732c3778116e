import fs from "node:fs";
import path from "node:path";
import type {
  AgentNode,
  EventBus,
  LanguageModel,
  ProfileLoader,
  Session,
  SessionId,
  SessionRepository,
  Turn,
  UserId,
} from "@helpdesk/types";
import {
  ConfigError,
  InMemoryEventBus,
  InMemorySessionRepository,
  SessionNotFoundError,
  SessionStateStore,
  createEvent,
  createLogger,
  createTraceContext,
  type GatewayConfig,
  type Logger,
} from "@helpdesk/core";
import {
  CompositionRuntime,
  MockLanguageModel,
  OpenAIAdapter,
  ToolInvocationAdapter,
  TurnProcessor,
} from "@helpdesk/runtime";
import { SQLiteSessionRepository } from "@helpdesk/persistence";
import {
  CrmProfileLoader,
  createSupportToolRegistry,
  loadSupportData,
  type SupportData,
  type SupportToolOptions,
} from "@helpdesk/tools";
import { DEFAULT_TREE_PATH, loadAgentTree } from "./tree-loader.js";

/** Collaborators that replace the ones built from config. */
export interface GatewayOptions {
  /** Relative config paths resolve against this directory. Default: cwd. */
  baseDir?: string;
  model?: LanguageModel;
  profiles?: ProfileLoader;
  repository?: SessionRepository;
  data?: SupportData;
  tools?: SupportToolOptions;
  bus?: EventBus;
  log?: Logger;
}

export interface IncomingMessage {
  userId: UserId;
  /** Absent on the first message of a conversation. */
  sessionId?: SessionId;
  message: string;
  signal?: AbortSignal;
}

export interface GatewayReply {
  sessionId: SessionId;
  reply: string;
  turn: Turn;
}

/**
 * Entry point for front-ends: wires config into the runtime, keeps
 * sessions, and runs one turn per message. Turns on the same session run
 * one after another; different sessions run concurrently.
 */
export class SupportGateway {
  private queues = new Map<SessionId, Promise<void>>();
  private stopped = false;

  private constructor(
    readonly root: AgentNode,
    readonly sessions: SessionStateStore,
    readonly bus: EventBus,
    private readonly processor: TurnProcessor,
    private readonly repository: SessionRepository,
    private readonly log: Logger
  ) {}

  static async start(config: GatewayConfig, opts: GatewayOptions = {}): Promise<SupportGateway> {
    const baseDir = opts.baseDir ?? process.cwd();
    const log = opts.log ?? createLogger({ level: config.logging.level, pretty: config.logging.pretty });
    const bus = opts.bus ?? new InMemoryEventBus(log.child({ component: "bus" }));

    const data = opts.data ?? (await loadSupportData());
    const { registry } = createSupportToolRegistry(data, opts.tools);

    const treePath = config.tree.path ? path.resolve(baseDir, config.tree.path) : DEFAULT_TREE_PATH;
    const root = await loadAgentTree(treePath, { registry, maxDepth: config.tree.maxDepth });

    const model = opts.model ?? createModel(config, log);
    const runtime = new CompositionRuntime({
      model,
      tools: new ToolInvocationAdapter({
        registry,
        defaultTimeoutMs: config.tools.timeoutMs,
        overrides: config.tools.overrides,
        bus,
        log,
      }),
      registry,
      bus,
      modelTimeoutMs: config.model.timeoutMs,
      classifyTimeoutMs: config.routing.classifyTimeoutMs,
      historyWindow: config.history.window,
    });

    const repository = opts.repository ?? createRepository(config, baseDir);
    const sessions = new SessionStateStore(
      opts.profiles ?? new CrmProfileLoader(data.users),
      repository,
      log.child({ component: "sessions" })
    );
    const processor = new TurnProcessor({ root, runtime, retain: config.scratch.retain, bus, log });

    log.info(
      { tree: treePath, tools: registry.ids().length, model: opts.model ? "custom" : config.model.provider },
      "support gateway started"
    );
    return new SupportGateway(root, sessions, bus, processor, repository, log);
  }

  /**
   * Process one customer message. Starts a session when `sessionId` is
   * absent; throws SessionNotFoundError for an id that is unknown or
   * belongs to another user, and BootstrapError when the profile cannot be
   * loaded. Turn failures come back inside the reply, never as throws.
   */
  async handleMessage(msg: IncomingMessage): Promise<GatewayReply> {
    if (this.stopped) throw new Error("Support gateway is stopped");

    let sessionId = msg.sessionId;
    if (!sessionId) {
      const session = await this.sessions.bootstrap(msg.userId);
      await this.bus.publish(
        createEvent("session.created", { userId: msg.userId }, createTraceContext(), { sessionId: session.id })
      );
      sessionId = session.id;
    }
    const id = sessionId;

    return this.serialize(id, async () => {
      const session = await this.sessions.load(id);
      if (session.userId !== msg.userId) throw new SessionNotFoundError(id);

      const turn = await this.processor.process(session, msg.message, { signal: msg.signal });
      await this.sessions.save(session);
      return { sessionId: id, reply: turn.output.reply, turn };
    });
  }

  /** Waits for queued turns, then closes the repository. */
  async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;
    await Promise.all(this.queues.values());
    await this.repository.close();
    this.log.info("support gateway stopped");
  }

  async session(id: SessionId): Promise<Session | undefined> {
    return this.sessions.find(id);
  }

  private serialize<T>(id: SessionId, task: () => Promise<T>): Promise<T> {
    const previous = this.queues.get(id) ?? Promise.resolve();
    const run = previous.then(task);
    const tail: Promise<void> = run
      .then(
        () => undefined,
        () => undefined
      )
      .then(() => {
        if (this.queues.get(id) === tail) this.queues.delete(id);
      });
    this.queues.set(id, tail);
    return run;
  }
}

function createModel(config: GatewayConfig, log: Logger): LanguageModel {
  switch (config.model.provider) {
    case "mock":
      return new MockLanguageModel();
    case "openai": {
      const apiKey = config.model.apiKey;
      if (!apiKey) {
        throw new ConfigError("model.apiKey (or OPENAI_API_KEY) is required for the openai provider");
      }
      return new OpenAIAdapter({ apiKey, model: config.model.name, log });
    }
  }
}

function createRepository(config: GatewayConfig, baseDir: string): SessionRepository {
  if (config.persistence.driver === "memory") {
    return new InMemorySessionRepository();
  }
  const dbPath = path.resolve(baseDir, config.persistence.path);
  fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  return new SQLiteSessionRepository(dbPath);
}
