export { SupportGateway } from "./gateway.js";
export type { GatewayOptions, IncomingMessage, GatewayReply } from "./gateway.js";
export { loadAgentTree, parseAgentTree, DEFAULT_TREE_PATH } from "./tree-loader.js";
export type {
  TreeLoadOptions,
  NodeDefinition,
  LeafDefinition,
  SequentialDefinition,
  ParallelDefinition,
  RouterDefinition,
} from "./tree-loader.js";
export { digestFindings, listBranches, SYNTHESIS_FUNCTIONS } from "./synthesis.js";
