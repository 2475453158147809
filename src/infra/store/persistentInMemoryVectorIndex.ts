import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { IndexWriteFailedError } from "../../domain/errors.js";
import { IndexEntry, IndexManifest, RetrievalHit, StoredEntry } from "../../domain/types.js";
import { ListEntriesInput, VectorQuery } from "../../domain/vectorIndex.js";
import { createComponentLogger } from "../../utils/logger.js";
import { InMemoryVectorIndex, InMemoryVectorIndexSnapshot } from "./inMemoryVectorIndex.js";

const CURRENT_FORMAT_VERSION = 1;

const log = createComponentLogger("persistent-index");

const transactionSchema = z.object({
  id: z.string(),
  timestamp: z.string(),
  fuelType: z.string(),
  quantity: z.number(),
  unitPrice: z.number(),
  totalAmount: z.number(),
  stationId: z.string(),
  pumpId: z.string().nullable(),
  paymentMethod: z.string().nullable(),
});

const snapshotSchema = z.object({
  manifest: z
    .object({
      embeddingModel: z.string(),
      dimension: z.number().int().positive(),
    })
    .nullable(),
  entries: z.array(
    z.object({
      id: z.string(),
      vector: z.array(z.number()),
      payload: z.object({
        text: z.string(),
        transaction: transactionSchema,
      }),
    }),
  ),
});

const persistedSchema = z.object({
  format_version: z.number().int(),
  saved_at: z.string(),
  snapshot: z.unknown(),
});

export interface PersistentInMemoryOptions {
  maxBytes: number;
}

export interface InMemoryIndexStorageInfo {
  path: string;
  exists: boolean;
  format_version: number;
  max_bytes: number;
  size_bytes: number;
  utilization_ratio: number;
}

/**
 * In-memory index mirrored to a JSON snapshot on every mutation. Mutations are
 * serialized with their writes, which land through a temp file plus rename; a
 * mutation whose write fails is rolled back in memory.
 */
export class PersistentInMemoryVectorIndex extends InMemoryVectorIndex {
  private initialized = false;

  private writeChain: Promise<unknown> = Promise.resolve();

  private readonly absolutePath: string;

  constructor(
    filePath: string,
    private readonly options: PersistentInMemoryOptions,
  ) {
    super();
    this.absolutePath = path.resolve(filePath);
  }

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    await fs.mkdir(path.dirname(this.absolutePath), { recursive: true });

    try {
      const raw = await fs.readFile(this.absolutePath, "utf-8");
      this.importSnapshot(parseSnapshotFromDisk(JSON.parse(raw)));
      log.info(
        { path: this.absolutePath, entries: this.entries.size },
        "Loaded vector index snapshot",
      );
    } catch (error) {
      if (!isFileMissing(error)) {
        throw error;
      }
    }

    this.initialized = true;
  }

  async upsertMany(entries: IndexEntry[]): Promise<void> {
    await this.initialize();
    await this.mutate(() => super.upsertMany(entries));
  }

  async query(input: VectorQuery): Promise<RetrievalHit[]> {
    await this.initialize();
    return super.query(input);
  }

  async delete(id: string): Promise<boolean> {
    await this.initialize();
    return this.mutate(
      () => super.delete(id),
      (removed) => removed,
    );
  }

  async get(id: string): Promise<StoredEntry | null> {
    await this.initialize();
    return super.get(id);
  }

  async getMany(ids: string[]): Promise<Map<string, StoredEntry>> {
    await this.initialize();
    return super.getMany(ids);
  }

  async list(input?: ListEntriesInput): Promise<StoredEntry[]> {
    await this.initialize();
    return super.list(input);
  }

  async count(): Promise<number> {
    await this.initialize();
    return super.count();
  }

  async getManifest(): Promise<IndexManifest | null> {
    await this.initialize();
    return super.getManifest();
  }

  async bindManifest(manifest: IndexManifest): Promise<IndexManifest> {
    await this.initialize();
    const { bound } = await this.mutate(
      async () => {
        const wasBound = this.manifest !== null;
        return { bound: await super.bindManifest(manifest), wasBound };
      },
      ({ wasBound }) => !wasBound,
    );
    return bound;
  }

  async clear(): Promise<{ cleared_entries: number }> {
    await this.initialize();
    return this.mutate(() => super.clear());
  }

  async getStorageInfo(): Promise<InMemoryIndexStorageInfo> {
    await this.initialize();
    const stats = await this.readStorageStat();
    return {
      path: this.absolutePath,
      exists: stats.exists,
      format_version: CURRENT_FORMAT_VERSION,
      max_bytes: this.options.maxBytes,
      size_bytes: stats.sizeBytes,
      utilization_ratio:
        this.options.maxBytes > 0 ? Number((stats.sizeBytes / this.options.maxBytes).toFixed(4)) : 0,
    };
  }

  async close(): Promise<void> {
    await this.initialize();
    await this.enqueueWrite(() => this.persistNow());
  }

  private enqueueWrite<T>(task: () => Promise<T>): Promise<T> {
    const run = this.writeChain.then(task, task);
    this.writeChain = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private mutate<T>(
    change: () => Promise<T>,
    shouldPersist: (result: T) => boolean = () => true,
  ): Promise<T> {
    return this.enqueueWrite(async () => {
      const before = this.exportSnapshot();
      const result = await change();
      if (!shouldPersist(result)) {
        return result;
      }
      try {
        await this.persistNow();
      } catch (error) {
        this.importSnapshot(before);
        throw new IndexWriteFailedError(this.absolutePath, error);
      }
      return result;
    });
  }

  private async persistNow(): Promise<void> {
    const serialized = JSON.stringify({
      format_version: CURRENT_FORMAT_VERSION,
      saved_at: new Date().toISOString(),
      snapshot: this.exportSnapshot(),
    });
    const bytes = Buffer.byteLength(serialized, "utf-8");
    if (bytes > this.options.maxBytes) {
      throw new Error(
        `In-memory index snapshot exceeds size limit (${bytes} > ${this.options.maxBytes} bytes).`,
      );
    }

    await fs.mkdir(path.dirname(this.absolutePath), { recursive: true });
    const tempPath = `${this.absolutePath}.tmp`;
    await fs.writeFile(tempPath, serialized, "utf-8");
    await replaceFileSafely(tempPath, this.absolutePath, serialized);
  }

  private async readStorageStat(): Promise<{ exists: boolean; sizeBytes: number }> {
    try {
      const stat = await fs.stat(this.absolutePath);
      return { exists: true, sizeBytes: stat.size };
    } catch (error) {
      if (isFileMissing(error)) {
        return { exists: false, sizeBytes: 0 };
      }
      throw error;
    }
  }
}

function errorCode(error: unknown): string | undefined {
  if (!(error instanceof Error) || !("code" in error)) {
    return undefined;
  }
  return typeof error.code === "string" ? error.code : undefined;
}

function isFileMissing(error: unknown): boolean {
  return errorCode(error) === "ENOENT";
}

function isReplaceableRenameError(error: unknown): boolean {
  const code = errorCode(error);
  return code === "EPERM" || code === "EEXIST" || code === "EBUSY";
}

async function replaceFileSafely(
  tempPath: string,
  targetPath: string,
  content: string,
): Promise<void> {
  try {
    await fs.rename(tempPath, targetPath);
    return;
  } catch (error) {
    if (!isReplaceableRenameError(error)) {
      throw error;
    }
  }

  try {
    await fs.rm(targetPath, { force: true });
    await fs.rename(tempPath, targetPath);
    return;
  } catch (error) {
    if (!isReplaceableRenameError(error)) {
      throw error;
    }
  }

  // Last fallback for Windows file-lock edge cases.
  await fs.writeFile(targetPath, content, "utf-8");
  await fs.rm(tempPath, { force: true });
}

function parseSnapshotFromDisk(raw: unknown): InMemoryVectorIndexSnapshot {
  const envelope = persistedSchema.safeParse(raw);
  if (!envelope.success) {
    throw new Error("Invalid in-memory index snapshot format.");
  }
  if (envelope.data.format_version !== CURRENT_FORMAT_VERSION) {
    throw new Error(
      `Unsupported in-memory index format version: ${envelope.data.format_version}. Expected ${CURRENT_FORMAT_VERSION}.`,
    );
  }

  const snapshot = snapshotSchema.safeParse(envelope.data.snapshot);
  if (!snapshot.success) {
    throw new Error("Invalid in-memory index snapshot contents.");
  }
  return snapshot.data;
}
