export * from "./sqlite/connection.js";
export * from "./migrations/index/IndexMigrations.js";
export * from "./collections/SqliteVectorCollection.js";
export type { Database } from "sqlite";
