/**
 * Error codes for every failure the orchestration core can raise.
 * Uses discriminated union pattern for exhaustive error handling.
 */
export type HelpdeskErrorCode =
  | "TOOL_ERROR"            // Tool invocation failed (see ToolErrorKind)
  | "ROUTING_ERROR"         // Router could not dispatch (see RoutingErrorKind)
  | "COMPLETION_ERROR"      // Language-model completion failed inside a leaf
  | "SYNTHESIS_ERROR"       // Parallel synthesis step failed
  | "CANCELLED"             // Turn aborted by the caller
  | "TREE_DEFINITION_ERROR" // Authored agent tree violates an invariant
  | "BOOTSTRAP_ERROR"       // Session bootstrap collaborator failed
  | "SESSION_NOT_FOUND"     // Referenced session does not exist
  | "CONFIG_ERROR"          // Configuration file could not be loaded
  | "PROCESSING_ERROR";     // Unrecovered failure surfaced by the turn processor

export type ToolErrorKind = "NotFound" | "InvalidArgs" | "Timeout" | "Upstream" | "Unauthorized";

export type RoutingErrorKind = "UnknownTarget" | "Timeout" | "NoDefault";

export type CompletionErrorKind = "Timeout" | "Upstream" | "MaxIterations";

export type ProcessingErrorKind = "RoutingFailed" | "ToolFailure" | "SynthesisFailure" | "Cancelled";

/** Serializable shape of an error, safe to put in events and branch results. */
export interface ErrorInfo {
  readonly code: HelpdeskErrorCode;
  readonly kind?: string;
  readonly message: string;
}
