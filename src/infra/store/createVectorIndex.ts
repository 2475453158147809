import { AppConfig } from "../../config/env.js";
import { VectorIndex } from "../../domain/vectorIndex.js";
import { createPostgresPool } from "../db/postgres.js";
import { InMemoryVectorIndex } from "./inMemoryVectorIndex.js";
import { PersistentInMemoryVectorIndex } from "./persistentInMemoryVectorIndex.js";
import { PgVectorIndex } from "./pgVectorIndex.js";

export interface VectorIndexBootstrapResult {
  vectorIndex: VectorIndex;
  close: () => Promise<void>;
}

export async function createVectorIndex(config: AppConfig): Promise<VectorIndexBootstrapResult> {
  if (!config.enablePgvector) {
    if (config.persistInMemoryIndex) {
      const vectorIndex = new PersistentInMemoryVectorIndex(config.inMemoryIndexPath, {
        maxBytes: config.maxInMemoryIndexBytes,
      });
      await vectorIndex.initialize();
      return {
        vectorIndex,
        close: async () => {
          await vectorIndex.close();
        },
      };
    }

    return {
      vectorIndex: new InMemoryVectorIndex(),
      close: async () => {},
    };
  }

  if (!config.databaseUrl) {
    throw new Error("DATABASE_URL is required when pgvector is enabled.");
  }

  const pool = createPostgresPool(config.databaseUrl, { timeoutMs: config.requestTimeoutMs });
  const vectorIndex = new PgVectorIndex(pool, config.vectorDimension, {
    timeoutMs: config.requestTimeoutMs,
  });
  await vectorIndex.initialize();

  return {
    vectorIndex,
    close: async () => {
      await pool.end();
    },
  };
}
