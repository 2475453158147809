import { Pool } from "pg";
import {
  DimensionMismatchError,
  FuelQaError,
  RequestTimeoutError,
  ServiceUnavailableError,
  errorMessage,
} from "../../domain/errors.js";
import {
  IndexEntry,
  IndexManifest,
  RetrievalHit,
  StoredEntry,
  TransactionFilter,
  TransactionPayload,
} from "../../domain/types.js";
import { ListEntriesInput, VectorIndex, VectorQuery } from "../../domain/vectorIndex.js";
import { assertCompatibleManifest } from "./inMemoryVectorIndex.js";

const SERVICE = "PostgreSQL";

// Class 08 is connection exceptions; 57P0x are server shutdowns.
const CONNECTION_ERROR_CODES = new Set(["ECONNREFUSED", "ECONNRESET", "ENOTFOUND", "EPIPE", "57P01", "57P02", "57P03"]);
const QUERY_CANCELED = "57014";

export interface PgVectorIndexOptions {
  /** Upper bound for every index operation, connection wait included. */
  timeoutMs: number;
}

interface PgEntryRow {
  id: string;
  payload: TransactionPayload;
}

interface PgHitRow extends PgEntryRow {
  score: number | string;
}

interface PgManifestRow {
  embedding_model: string;
  dimension: number;
}

/**
 * Exact cosine search over pgvector. Rows are ordered by distance, then id, so there
 * is no ANN index: pgvector only uses one when ordering by distance alone.
 */
export class PgVectorIndex implements VectorIndex {
  private initialized = false;

  constructor(
    private readonly pool: Pool,
    private readonly vectorDimension: number,
    private readonly options: PgVectorIndexOptions,
  ) {}

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }
    await this.run(() => this.createSchema());
    this.initialized = true;
  }

  private async createSchema(): Promise<void> {
    await this.pool.query(`CREATE EXTENSION IF NOT EXISTS vector`);
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS fuel_transactions (
        id TEXT PRIMARY KEY,
        occurred_at TIMESTAMPTZ NOT NULL,
        payload JSONB NOT NULL,
        embedding VECTOR(${this.vectorDimension}) NOT NULL,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS index_manifest (
        singleton BOOLEAN PRIMARY KEY DEFAULT TRUE CHECK (singleton),
        embedding_model TEXT NOT NULL,
        dimension INTEGER NOT NULL
      )
    `);
    await this.pool.query(
      `CREATE INDEX IF NOT EXISTS idx_fuel_transactions_occurred_at ON fuel_transactions(occurred_at)`,
    );
  }

  async upsert(entry: IndexEntry): Promise<void> {
    await this.upsertMany([entry]);
  }

  async upsertMany(entries: IndexEntry[]): Promise<void> {
    await this.initialize();
    for (const entry of entries) {
      this.assertDimension(entry.vector);
    }
    if (entries.length === 0) {
      return;
    }

    await this.run(() => this.writeEntries(entries));
  }

  private async writeEntries(entries: IndexEntry[]): Promise<void> {
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      for (const entry of entries) {
        await client.query(
          `
            INSERT INTO fuel_transactions (id, occurred_at, payload, embedding, updated_at)
            VALUES ($1, $2::timestamptz, $3::jsonb, $4::vector, NOW())
            ON CONFLICT (id)
            DO UPDATE SET
              occurred_at = EXCLUDED.occurred_at,
              payload = EXCLUDED.payload,
              embedding = EXCLUDED.embedding,
              updated_at = NOW()
          `,
          [
            entry.id,
            entry.payload.transaction.timestamp,
            JSON.stringify(entry.payload),
            toVectorLiteral(entry.vector),
          ],
        );
      }
      await client.query("COMMIT");
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }
  }

  async query({ vector, k, filter }: VectorQuery): Promise<RetrievalHit[]> {
    if (k <= 0) {
      return [];
    }
    await this.initialize();
    this.assertDimension(vector);

    const params: unknown[] = [toVectorLiteral(vector), Math.floor(k)];
    const where = buildFilterClause(filter, params);
    const result = await this.run(() =>
      this.pool.query<PgHitRow>(
        `
          SELECT id, payload, (1 - (embedding <=> $1::vector)) AS score
          FROM fuel_transactions
          ${where}
          ORDER BY embedding <=> $1::vector ASC, id ASC
          LIMIT $2
        `,
        params,
      ),
    );

    return result.rows.map((row) => ({
      entry: { id: row.id, payload: row.payload },
      score: Number(row.score),
    }));
  }

  async delete(id: string): Promise<boolean> {
    await this.initialize();
    const result = await this.run(() =>
      this.pool.query(`DELETE FROM fuel_transactions WHERE id = $1`, [id]),
    );
    return (result.rowCount ?? 0) > 0;
  }

  async get(id: string): Promise<StoredEntry | null> {
    const found = await this.getMany([id]);
    return found.get(id) ?? null;
  }

  async getMany(ids: string[]): Promise<Map<string, StoredEntry>> {
    const found = new Map<string, StoredEntry>();
    if (ids.length === 0) {
      return found;
    }
    await this.initialize();
    const result = await this.run(() =>
      this.pool.query<PgEntryRow>(
        `SELECT id, payload FROM fuel_transactions WHERE id = ANY($1::text[])`,
        [ids],
      ),
    );
    for (const row of result.rows) {
      found.set(row.id, { id: row.id, payload: row.payload });
    }
    return found;
  }

  async list(input?: ListEntriesInput): Promise<StoredEntry[]> {
    await this.initialize();
    const limit = input?.limit && input.limit > 0 ? Math.floor(input.limit) : null;
    const offset = Math.max(0, Math.floor(input?.offset ?? 0));
    const result = await this.run(() =>
      this.pool.query<PgEntryRow>(
        `SELECT id, payload FROM fuel_transactions ORDER BY id ASC LIMIT $1 OFFSET $2`,
        [limit, offset],
      ),
    );
    return result.rows.map((row) => ({ id: row.id, payload: row.payload }));
  }

  async count(): Promise<number> {
    await this.initialize();
    const result = await this.run(() =>
      this.pool.query<{ count: string }>(`SELECT COUNT(*)::text AS count FROM fuel_transactions`),
    );
    return Number(result.rows[0]?.count ?? 0);
  }

  async getManifest(): Promise<IndexManifest | null> {
    await this.initialize();
    const result = await this.run(() =>
      this.pool.query<PgManifestRow>(
        `SELECT embedding_model, dimension FROM index_manifest WHERE singleton`,
      ),
    );
    const row = result.rows[0];
    return row ? { embeddingModel: row.embedding_model, dimension: row.dimension } : null;
  }

  async bindManifest(manifest: IndexManifest): Promise<IndexManifest> {
    await this.initialize();
    if (manifest.dimension !== this.vectorDimension) {
      throw new DimensionMismatchError(this.vectorDimension, manifest.dimension);
    }

    await this.run(() =>
      this.pool.query(
        `
          INSERT INTO index_manifest (singleton, embedding_model, dimension)
          VALUES (TRUE, $1, $2)
          ON CONFLICT (singleton) DO NOTHING
        `,
        [manifest.embeddingModel, manifest.dimension],
      ),
    );

    const stored = await this.getManifest();
    if (!stored) {
      throw new Error("Index manifest could not be recorded.");
    }
    assertCompatibleManifest(stored, manifest);
    return stored;
  }

  async clear(): Promise<{ cleared_entries: number }> {
    await this.initialize();
    return this.run(() => this.truncate());
  }

  private async truncate(): Promise<{ cleared_entries: number }> {
    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");
      const countResult = await client.query<{ count: string }>(
        "SELECT COUNT(*)::text AS count FROM fuel_transactions",
      );
      await client.query("TRUNCATE TABLE fuel_transactions, index_manifest");
      await client.query("COMMIT");
      return { cleared_entries: Number(countResult.rows[0]?.count ?? 0) };
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }
  }

  /**
   * Bounds `task` by the configured timeout and maps driver failures onto the error
   * taxonomy, so callers can retry timeouts and dropped connections.
   */
  private async run<T>(task: () => Promise<T>): Promise<T> {
    const { timeoutMs } = this.options;
    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => reject(new RequestTimeoutError(SERVICE, timeoutMs)), timeoutMs);
    });

    try {
      return await Promise.race([task(), deadline]);
    } catch (error) {
      throw toPgFailure(error, timeoutMs);
    } finally {
      clearTimeout(timer);
    }
  }

  private assertDimension(vector: number[]): void {
    if (vector.length !== this.vectorDimension) {
      throw new DimensionMismatchError(this.vectorDimension, vector.length);
    }
  }
}

export function toPgFailure(error: unknown, timeoutMs: number): unknown {
  if (error instanceof FuelQaError) {
    return error;
  }

  const code = readErrorCode(error);
  const message = errorMessage(error);
  if (code === QUERY_CANCELED || /timeout/i.test(message)) {
    return new RequestTimeoutError(SERVICE, timeoutMs);
  }
  if (
    (code !== null && (CONNECTION_ERROR_CODES.has(code) || code.startsWith("08"))) ||
    /connection terminated/i.test(message)
  ) {
    return new ServiceUnavailableError(SERVICE, message, { cause: error });
  }
  return error;
}

function readErrorCode(error: unknown): string | null {
  if (typeof error !== "object" || error === null || !("code" in error)) {
    return null;
  }
  return typeof error.code === "string" ? error.code : null;
}

/** Appends filter values to `params` and returns the matching WHERE clause. */
export function buildFilterClause(filter: TransactionFilter | undefined, params: unknown[]): string {
  if (!filter) {
    return "";
  }

  const conditions: string[] = [];
  const addList = (field: string, values: string[] | undefined) => {
    if (!values?.length) {
      return;
    }
    params.push(values.map((value) => value.toLowerCase()));
    conditions.push(`lower(payload->'transaction'->>'${field}') = ANY($${params.length}::text[])`);
  };

  addList("fuelType", filter.fuelTypes);
  addList("stationId", filter.stationIds);
  addList("paymentMethod", filter.paymentMethods);
  if (filter.from) {
    params.push(filter.from);
    conditions.push(`occurred_at >= $${params.length}::timestamptz`);
  }
  if (filter.to) {
    params.push(filter.to);
    conditions.push(`occurred_at <= $${params.length}::timestamptz`);
  }

  return conditions.length > 0 ? `WHERE ${conditions.join(" AND ")}` : "";
}

export function toVectorLiteral(values: number[]): string {
  return `[${values.join(",")}]`;
}
