import {
  IndexEntry,
  IndexManifest,
  RetrievalHit,
  StoredEntry,
  TransactionFilter,
} from "./types.js";

export interface VectorQuery {
  vector: number[];
  k: number;
  filter?: TransactionFilter;
}

export interface ListEntriesInput {
  limit?: number;
  offset?: number;
}

export interface VectorIndex {
  upsert(entry: IndexEntry): Promise<void>;
  upsertMany(entries: IndexEntry[]): Promise<void>;
  query(input: VectorQuery): Promise<RetrievalHit[]>;
  delete(id: string): Promise<boolean>;
  get(id: string): Promise<StoredEntry | null>;
  getMany(ids: string[]): Promise<Map<string, StoredEntry>>;
  list(input?: ListEntriesInput): Promise<StoredEntry[]>;
  count(): Promise<number>;
  getManifest(): Promise<IndexManifest | null>;
  bindManifest(manifest: IndexManifest): Promise<IndexManifest>;
  clear(): Promise<{ cleared_entries: number }>;
}
