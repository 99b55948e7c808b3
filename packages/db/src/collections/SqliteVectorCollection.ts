import { Database } from "sqlite";
import {
  isAndFilter,
  isMetadataValue,
  isRecord,
  type Embedder,
  type MetadataFilter,
  type MetadataValue,
  type RecordMetadata,
  type VectorCollection,
  type VectorMatch,
  type VectorQuery,
  type VectorRecord,
} from "@lectern/shared";

interface VectorRow {
  id: string;
  document: string;
  metadata_json: string;
  embedding_json: string;
}

interface CompiledFilter {
  sql: string;
  params: MetadataValue[];
}

const FILTER_KEY = /^[A-Za-z_][A-Za-z0-9_]*$/;

const parseMetadata = (raw: string): RecordMetadata => {
  const parsed: unknown = JSON.parse(raw);
  const metadata: RecordMetadata = {};
  if (!isRecord(parsed)) return metadata;
  for (const [key, value] of Object.entries(parsed)) {
    if (isMetadataValue(value)) metadata[key] = value;
  }
  return metadata;
};

const parseEmbedding = (raw: string): number[] => {
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) return [];
  return parsed.filter((value): value is number => typeof value === "number");
};

export const cosineDistance = (a: number[], b: number[]): number => {
  if (a.length !== b.length) {
    throw new Error(`Embedding dimension mismatch: expected ${a.length}, received ${b.length}`);
  }
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i += 1) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }
  if (normA === 0 || normB === 0) return 1;
  return 1 - dot / (Math.sqrt(normA) * Math.sqrt(normB));
};

export const compileFilter = (filter: MetadataFilter): CompiledFilter => {
  if (isAndFilter(filter)) {
    const parts = filter.$and.map(compileFilter);
    if (!parts.length) return { sql: "1 = 1", params: [] };
    return {
      sql: `(${parts.map((part) => part.sql).join(" AND ")})`,
      params: parts.flatMap((part) => part.params),
    };
  }
  const clauses: string[] = [];
  const params: MetadataValue[] = [];
  for (const [key, value] of Object.entries(filter)) {
    if (!FILTER_KEY.test(key)) {
      throw new Error(`Invalid metadata filter key: ${key}`);
    }
    if (!isMetadataValue(value)) {
      throw new Error(`Invalid metadata filter value for ${key}`);
    }
    clauses.push(`json_extract(metadata_json, '$.${key}') = ?`);
    params.push(typeof value === "boolean" ? Number(value) : value);
  }
  if (!clauses.length) return { sql: "1 = 1", params: [] };
  return { sql: clauses.join(" AND "), params };
};

export class SqliteVectorCollection implements VectorCollection {
  private constructor(
    private db: Database,
    readonly name: string,
    private embedder: Embedder,
  ) {}

  static async open(db: Database, name: string, embedder: Embedder): Promise<SqliteVectorCollection> {
    await db.run(
      "INSERT OR IGNORE INTO collections (name, created_at) VALUES (?, ?)",
      name,
      new Date().toISOString(),
    );
    return new SqliteVectorCollection(db, name, embedder);
  }

  async upsert(records: VectorRecord[]): Promise<void> {
    if (!records.length) return;
    const embeddings = await this.embedder.embed(records.map((record) => record.document));
    if (embeddings.length !== records.length) {
      throw new Error(
        `Embedder ${this.embedder.name} returned ${embeddings.length} vectors for ${records.length} documents`,
      );
    }
    const now = new Date().toISOString();
    await this.db.exec("BEGIN");
    try {
      for (const [index, record] of records.entries()) {
        await this.db.run(
          `INSERT INTO vector_records (collection, id, document, metadata_json, embedding_json, updated_at)
           VALUES (?, ?, ?, ?, ?, ?)
           ON CONFLICT(collection, id) DO UPDATE SET
             document = excluded.document,
             metadata_json = excluded.metadata_json,
             embedding_json = excluded.embedding_json,
             updated_at = excluded.updated_at`,
          this.name,
          record.id,
          record.document,
          JSON.stringify(record.metadata),
          JSON.stringify(embeddings[index]),
          now,
        );
      }
      await this.db.exec("COMMIT");
    } catch (error) {
      await this.db.exec("ROLLBACK");
      throw error;
    }
  }

  async query(query: VectorQuery): Promise<VectorMatch[]> {
    if (query.limit <= 0) return [];
    const [embedding] = await this.embedder.embed([query.text]);
    if (!embedding) {
      throw new Error(`Embedder ${this.embedder.name} returned no vector for the query`);
    }
    const filter = query.where ? compileFilter(query.where) : undefined;
    const rows = await this.db.all<VectorRow[]>(
      `SELECT id, document, metadata_json, embedding_json FROM vector_records
       WHERE collection = ?${filter ? ` AND ${filter.sql}` : ""}
       ORDER BY rowid ASC`,
      this.name,
      ...(filter?.params ?? []),
    );
    return rows
      .map((row) => ({
        id: row.id,
        document: row.document,
        metadata: parseMetadata(row.metadata_json),
        distance: cosineDistance(embedding, parseEmbedding(row.embedding_json)),
      }))
      .sort((a, b) => a.distance - b.distance)
      .slice(0, query.limit);
  }

  async get(ids?: string[]): Promise<VectorRecord[]> {
    if (ids && !ids.length) return [];
    const placeholders = ids ? ids.map(() => "?").join(", ") : "";
    const rows = await this.db.all<VectorRow[]>(
      `SELECT id, document, metadata_json, embedding_json FROM vector_records
       WHERE collection = ?${ids ? ` AND id IN (${placeholders})` : ""}
       ORDER BY rowid ASC`,
      this.name,
      ...(ids ?? []),
    );
    const records = rows.map((row) => ({
      id: row.id,
      document: row.document,
      metadata: parseMetadata(row.metadata_json),
    }));
    if (!ids) return records;
    const byId = new Map(records.map((record) => [record.id, record]));
    return ids.flatMap((id) => {
      const record = byId.get(id);
      return record ? [record] : [];
    });
  }

  async count(): Promise<number> {
    const row = await this.db.get<{ total: number }>(
      "SELECT COUNT(*) AS total FROM vector_records WHERE collection = ?",
      this.name,
    );
    return row?.total ?? 0;
  }

  async clear(): Promise<void> {
    await this.db.run("DELETE FROM vector_records WHERE collection = ?", this.name);
  }
}
