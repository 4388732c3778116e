export { SQLiteSessionRepository } from "./session-repository.js";
