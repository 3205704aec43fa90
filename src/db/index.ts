export { pool } from "./pool.js";
export { createPgStore, createRepositories } from "./store.js";

export * from "./types.js";
