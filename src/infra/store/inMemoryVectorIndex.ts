import {
  DimensionMismatchError,
  EmbeddingModelMismatchError,
} from "../../domain/errors.js";
import {
  IndexEntry,
  IndexManifest,
  RetrievalHit,
  StoredEntry,
  TransactionFilter,
} from "../../domain/types.js";
import { ListEntriesInput, VectorIndex, VectorQuery } from "../../domain/vectorIndex.js";
import { cosineSimilarity } from "../../utils/vector.js";

export interface InMemoryVectorIndexSnapshot {
  manifest: IndexManifest | null;
  entries: IndexEntry[];
}

export class InMemoryVectorIndex implements VectorIndex {
  protected entries = new Map<string, IndexEntry>();

  protected manifest: IndexManifest | null = null;

  async upsert(entry: IndexEntry): Promise<void> {
    await this.upsertMany([entry]);
  }

  async upsertMany(entries: IndexEntry[]): Promise<void> {
    // Validate the whole batch first so a bad vector leaves the index untouched.
    let dimension = this.resolveDimension();
    for (const entry of entries) {
      if (dimension === null) {
        dimension = entry.vector.length;
      }
      if (entry.vector.length !== dimension) {
        throw new DimensionMismatchError(dimension, entry.vector.length);
      }
    }

    for (const entry of entries) {
      this.entries.set(entry.id, cloneEntry(entry));
    }
  }

  async query({ vector, k, filter }: VectorQuery): Promise<RetrievalHit[]> {
    if (k <= 0 || this.entries.size === 0) {
      return [];
    }

    const dimension = this.resolveDimension();
    if (dimension !== null && vector.length !== dimension) {
      throw new DimensionMismatchError(dimension, vector.length);
    }

    const candidates: RetrievalHit[] = [];
    for (const entry of this.entries.values()) {
      if (!matchesFilter(entry, filter)) {
        continue;
      }
      candidates.push({
        entry: { id: entry.id, payload: entry.payload },
        score: cosineSimilarity(vector, entry.vector),
      });
    }

    return candidates.sort(compareHits).slice(0, Math.floor(k));
  }

  async delete(id: string): Promise<boolean> {
    return this.entries.delete(id);
  }

  async get(id: string): Promise<StoredEntry | null> {
    const entry = this.entries.get(id);
    return entry ? { id: entry.id, payload: entry.payload } : null;
  }

  async getMany(ids: string[]): Promise<Map<string, StoredEntry>> {
    const found = new Map<string, StoredEntry>();
    for (const id of ids) {
      const entry = this.entries.get(id);
      if (entry) {
        found.set(id, { id: entry.id, payload: entry.payload });
      }
    }
    return found;
  }

  async list(input?: ListEntriesInput): Promise<StoredEntry[]> {
    const offset = Math.max(0, Math.floor(input?.offset ?? 0));
    const limit = input?.limit && input.limit > 0 ? Math.floor(input.limit) : undefined;

    const sorted = [...this.entries.values()].sort((a, b) => a.id.localeCompare(b.id));
    return sorted
      .slice(offset, limit === undefined ? undefined : offset + limit)
      .map((entry) => ({ id: entry.id, payload: entry.payload }));
  }

  async count(): Promise<number> {
    return this.entries.size;
  }

  async getManifest(): Promise<IndexManifest | null> {
    return this.manifest ? { ...this.manifest } : null;
  }

  async bindManifest(manifest: IndexManifest): Promise<IndexManifest> {
    if (this.manifest) {
      assertCompatibleManifest(this.manifest, manifest);
      return { ...this.manifest };
    }

    const storedDimension = this.resolveDimension();
    if (storedDimension !== null && storedDimension !== manifest.dimension) {
      throw new DimensionMismatchError(storedDimension, manifest.dimension);
    }
    this.manifest = { ...manifest };
    return { ...manifest };
  }

  async clear(): Promise<{ cleared_entries: number }> {
    const cleared = this.entries.size;
    this.entries.clear();
    this.manifest = null;
    return { cleared_entries: cleared };
  }

  protected exportSnapshot(): InMemoryVectorIndexSnapshot {
    return {
      manifest: this.manifest ? { ...this.manifest } : null,
      entries: [...this.entries.values()]
        .sort((a, b) => a.id.localeCompare(b.id))
        .map(cloneEntry),
    };
  }

  protected importSnapshot(snapshot: InMemoryVectorIndexSnapshot): void {
    this.entries.clear();
    this.manifest = snapshot.manifest ? { ...snapshot.manifest } : null;
    for (const entry of snapshot.entries) {
      this.entries.set(entry.id, cloneEntry(entry));
    }
  }

  private resolveDimension(): number | null {
    if (this.manifest) {
      return this.manifest.dimension;
    }
    const first = this.entries.values().next();
    return first.done ? null : first.value.vector.length;
  }
}

export function assertCompatibleManifest(stored: IndexManifest, requested: IndexManifest): void {
  if (stored.embeddingModel !== requested.embeddingModel) {
    throw new EmbeddingModelMismatchError(stored.embeddingModel, requested.embeddingModel);
  }
  if (stored.dimension !== requested.dimension) {
    throw new DimensionMismatchError(stored.dimension, requested.dimension);
  }
}

export function matchesFilter(entry: StoredEntry, filter: TransactionFilter | undefined): boolean {
  if (!filter) {
    return true;
  }

  const tx = entry.payload.transaction;
  if (filter.fuelTypes && !includesIgnoreCase(filter.fuelTypes, tx.fuelType)) {
    return false;
  }
  if (filter.stationIds && !includesIgnoreCase(filter.stationIds, tx.stationId)) {
    return false;
  }
  if (filter.paymentMethods && !includesIgnoreCase(filter.paymentMethods, tx.paymentMethod)) {
    return false;
  }
  if (filter.from && tx.timestamp < filter.from) {
    return false;
  }
  if (filter.to && tx.timestamp > filter.to) {
    return false;
  }
  return true;
}

/** Descending score; equal scores fall back to ascending id. */
export function compareHits(a: RetrievalHit, b: RetrievalHit): number {
  if (b.score !== a.score) {
    return b.score - a.score;
  }
  return a.entry.id < b.entry.id ? -1 : a.entry.id > b.entry.id ? 1 : 0;
}

function includesIgnoreCase(values: string[], candidate: string | null): boolean {
  if (candidate === null) {
    return false;
  }
  const lowered = candidate.toLowerCase();
  return values.some((value) => value.toLowerCase() === lowered);
}

function cloneEntry(entry: IndexEntry): IndexEntry {
  return {
    id: entry.id,
    vector: [...entry.vector],
    payload: {
      text: entry.payload.text,
      transaction: { ...entry.payload.transaction },
    },
  };
}
