export type MetadataValue = string | number | boolean;

export type RecordMetadata = Record<string, MetadataValue>;

export type MetadataFilter =
  | { $and: MetadataFilter[] }
  | { [key: string]: MetadataValue };

export interface VectorRecord {
  id: string;
  document: string;
  metadata: RecordMetadata;
}

export interface VectorMatch extends VectorRecord {
  distance: number;
}

export interface VectorQuery {
  text: string;
  limit: number;
  where?: MetadataFilter;
}

/**
 * A named similarity-search collection. Distances are non-negative and lower
 * means more similar; matches come back sorted ascending.
 */
export interface VectorCollection {
  readonly name: string;
  upsert(records: VectorRecord[]): Promise<void>;
  query(query: VectorQuery): Promise<VectorMatch[]>;
  get(ids?: string[]): Promise<VectorRecord[]>;
  count(): Promise<number>;
  clear(): Promise<void>;
}

export interface Embedder {
  readonly name: string;
  readonly dimensions: number;
  embed(texts: string[]): Promise<number[][]>;
}

export const isAndFilter = (filter: MetadataFilter): filter is { $and: MetadataFilter[] } =>
  "$and" in filter && Array.isArray(filter.$and);
