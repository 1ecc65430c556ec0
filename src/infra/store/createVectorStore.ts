import { AppConfig } from "../../config/env.js";
import { VectorStore } from "../../domain/vectorStore.js";
import { createPostgresPool } from "../db/postgres.js";
import { InMemoryVectorStore } from "./inMemoryVectorStore.js";
import { PersistentInMemoryVectorStore } from "./persistentInMemoryVectorStore.js";
import { PgVectorStore } from "./pgVectorStore.js";

export type VectorStoreBackend = "memory" | "persistent" | "pgvector";

export interface VectorStoreBootstrapResult {
  vectorStore: VectorStore;
  backend: VectorStoreBackend;
}

export async function createVectorStore(config: AppConfig): Promise<VectorStoreBootstrapResult> {
  if (!config.enablePgvector) {
    if (config.persistVectorDb) {
      const vectorStore = new PersistentInMemoryVectorStore(config.vectorDbPath, {
        maxBytes: config.maxVectorDbBytes,
      });
      await vectorStore.initialize();
      return { vectorStore, backend: "persistent" };
    }

    return { vectorStore: new InMemoryVectorStore(), backend: "memory" };
  }

  if (!config.databaseUrl) {
    throw new Error("DATABASE_URL is required when pgvector is enabled.");
  }

  const vectorStore = new PgVectorStore(
    createPostgresPool(config.databaseUrl),
    config.vectorDimension,
  );
  await vectorStore.initialize();
  return { vectorStore, backend: "pgvector" };
}
