import type {
  CompletionErrorKind,
  ErrorInfo,
  HelpdeskErrorCode,
  ProcessingErrorKind,
  RoutingErrorKind,
  ToolErrorKind,
} from "@helpdesk/types";

/**
 * Base class for every error the core raises. `code` discriminates the
 * family; subclasses add a `kind` within the family.
 */
export class HelpdeskError extends Error {
  constructor(
    readonly code: HelpdeskErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }

  toInfo(): ErrorInfo {
    return { code: this.code, message: this.message };
  }
}

export class ToolError extends HelpdeskError {
  constructor(
    readonly kind: ToolErrorKind,
    readonly toolId: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super("TOOL_ERROR", message, options);
  }

  /** Failures a leaf hands back to the model instead of aborting. */
  get recoverable(): boolean {
    return this.kind === "NotFound" || this.kind === "InvalidArgs";
  }

  /** Failures the per-tool retry policy may retry. */
  get transient(): boolean {
    return this.kind === "Timeout" || this.kind === "Upstream";
  }

  override toInfo(): ErrorInfo {
    return { code: this.code, kind: this.kind, message: this.message };
  }
}

export class RoutingError extends HelpdeskError {
  constructor(
    readonly kind: RoutingErrorKind,
    readonly router: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super("ROUTING_ERROR", message, options);
  }

  override toInfo(): ErrorInfo {
    return { code: this.code, kind: this.kind, message: this.message };
  }
}

export class CompletionError extends HelpdeskError {
  constructor(
    readonly kind: CompletionErrorKind,
    readonly node: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super("COMPLETION_ERROR", message, options);
  }

  override toInfo(): ErrorInfo {
    return { code: this.code, kind: this.kind, message: this.message };
  }
}

export class SynthesisError extends HelpdeskError {
  constructor(readonly node: string, message: string, options?: { cause?: unknown }) {
    super("SYNTHESIS_ERROR", message, options);
  }
}

export class CancellationError extends HelpdeskError {
  constructor(message = "Operation cancelled", options?: { cause?: unknown }) {
    super("CANCELLED", message, options);
  }
}

export class TreeDefinitionError extends HelpdeskError {
  constructor(message: string) {
    super("TREE_DEFINITION_ERROR", message);
  }
}

export class BootstrapError extends HelpdeskError {
  constructor(readonly userId: string, message: string, options?: { cause?: unknown }) {
    super("BOOTSTRAP_ERROR", message, options);
  }
}

export class SessionNotFoundError extends HelpdeskError {
  constructor(readonly sessionId: string) {
    super("SESSION_NOT_FOUND", `Session not found: ${sessionId}`);
  }
}

export class ConfigError extends HelpdeskError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CONFIG_ERROR", message, options);
  }
}

export class ProcessingError extends HelpdeskError {
  constructor(readonly kind: ProcessingErrorKind, message: string, options?: { cause?: unknown }) {
    super("PROCESSING_ERROR", message, options);
  }

  override toInfo(): ErrorInfo {
    return { code: this.code, kind: this.kind, message: this.message };
  }
}

/** Collapse any failure reaching the turn processor into a processing error. */
export function toProcessingError(err: unknown): ProcessingError {
  if (err instanceof ProcessingError) return err;
  const message = err instanceof Error ? err.message : String(err);
  if (err instanceof RoutingError) {
    return new ProcessingError("RoutingFailed", message, { cause: err });
  }
  if (err instanceof ToolError) {
    return new ProcessingError("ToolFailure", message, { cause: err });
  }
  if (err instanceof CancellationError) {
    return new ProcessingError("Cancelled", message, { cause: err });
  }
  return new ProcessingError("SynthesisFailure", message, { cause: err });
}

/** Serializable description of any thrown value. */
export function describeError(err: unknown): ErrorInfo {
  if (err instanceof HelpdeskError) return err.toInfo();
  return {
    code: "PROCESSING_ERROR",
    message: err instanceof Error ? err.message : String(err),
  };
}
