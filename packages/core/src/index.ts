export { InMemoryEventBus, createEvent, createTraceContext } from "./bus.js";
export {
  HelpdeskError,
  ToolError,
  RoutingError,
  CompletionError,
  SynthesisError,
  CancellationError,
  TreeDefinitionError,
  BootstrapError,
  SessionNotFoundError,
  ConfigError,
  ProcessingError,
  toProcessingError,
  describeError,
} from "./errors.js";
export { createLogger, silentLogger } from "./logger.js";
export type { Logger, LoggerConfig } from "./logger.js";
export { ScratchScope, applyRetention, matchesKeyPattern, matchesAnyPattern, SCRATCH_SEPARATOR } from "./scratch.js";
export { SessionStateStore, InMemorySessionRepository, deepFreeze } from "./session-state.js";
export { withTimeout, throwIfCancelled } from "./timeout.js";
export { GatewayConfigSchema, loadGatewayConfig, defaultGatewayConfig } from "./config.js";
export type { GatewayConfig, ToolOverride } from "./config.js";
