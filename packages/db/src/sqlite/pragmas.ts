import { Database } from "sqlite";

export class Pragmas {
  static async apply(db: Database, options: { inMemory?: boolean } = {}): Promise<void> {
    await db.exec("PRAGMA foreign_keys = ON;");
    if (!options.inMemory) {
      await db.exec("PRAGMA journal_mode = WAL;");
    }
  }
}
