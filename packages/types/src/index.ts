export type * from "./foundational.js";
export type * from "./observability.js";
export type * from "./error.js";
export type * from "./session.js";
export type * from "./agent.js";
export type * from "./tool.js";
export type * from "./model.js";
export type * from "./turn.js";
export type * from "./event-bus.js";
