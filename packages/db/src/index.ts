export { db, closeDb } from "./client.js";
export * from "./schema.js";
