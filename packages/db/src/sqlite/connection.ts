import { Database, open } from "sqlite";
import sqlite3 from "sqlite3";
import { PathHelper } from "@lectern/shared";
import { Pragmas } from "./pragmas.js";
import path from "node:path";

const IN_MEMORY = ":memory:";

export class Connection {
  constructor(private database: Database, public readonly dbPath: string) {}

  get db(): Database {
    return this.database;
  }

  static async open(dbPath: string): Promise<Connection> {
    if (dbPath !== IN_MEMORY) {
      await PathHelper.ensureDir(path.dirname(dbPath));
    }
    const database = await open({
      filename: dbPath,
      driver: sqlite3.Database,
    });
    await Pragmas.apply(database, { inMemory: dbPath === IN_MEMORY });
    return new Connection(database, dbPath);
  }

  static async openInMemory(): Promise<Connection> {
    return this.open(IN_MEMORY);
  }

  static async openWorkspace(cwd?: string): Promise<Connection> {
    return this.open(PathHelper.getIndexPath(cwd));
  }

  async close(): Promise<void> {
    await this.database.close();
  }
}
