import { Database } from "sqlite";

/**
 * Schema for the semantic index. Every collection shares one records table;
 * embeddings and metadata are stored as JSON text.
 */
export class IndexMigrations {
  static async run(db: Database): Promise<void> {
    await db.exec(`
      CREATE TABLE IF NOT EXISTS collections (
        name TEXT PRIMARY KEY,
        created_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS vector_records (
        collection TEXT NOT NULL REFERENCES collections(name) ON DELETE CASCADE,
        id TEXT NOT NULL,
        document TEXT NOT NULL,
        metadata_json TEXT NOT NULL,
        embedding_json TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        PRIMARY KEY (collection, id)
      );

      CREATE INDEX IF NOT EXISTS idx_vector_records_collection ON vector_records(collection);
    `);
  }
}
