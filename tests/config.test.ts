import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config/env.js";

describe("loadConfig", () => {
  it("falls back to extractive answers without an API key", () => {
    const config = loadConfig({});

    expect(config.embeddingProvider).toBe("none");
    expect(config.generationProvider).toBe("extractive");
    expect(config.chunkSize).toBe(800);
    expect(config.chunkOverlap).toBe(100);
    expect(config.maxResults).toBe(5);
    expect(config.maxHistory).toBe(2);
    expect(config.port).toBe(8000);
    expect(config.persistVectorDb).toBe(true);
    expect(config.clearVectorDbOnStartup).toBe(false);
  });

  it("switches both providers to openai when a key is set", () => {
    const config = loadConfig({ OPENAI_API_KEY: "test-secret" });

    expect(config.openaiApiKey).toBe("test-secret");
    expect(config.embeddingProvider).toBe("openai");
    expect(config.generationProvider).toBe("openai");
  });

  it("keeps an explicit provider over the key default", () => {
    const config = loadConfig({ OPENAI_API_KEY: "test-secret", GENERATION_PROVIDER: "extractive" });

    expect(config.embeddingProvider).toBe("openai");
    expect(config.generationProvider).toBe("extractive");
  });

  it("treats blank values as unset", () => {
    const config = loadConfig({ PORT: "", OPENAI_API_KEY: "  ", PERSIST_VECTOR_DB: "false" });

    expect(config.port).toBe(8000);
    expect(config.openaiApiKey).toBeNull();
    expect(config.persistVectorDb).toBe(false);
  });

  it("strips trailing slashes from base URLs", () => {
    const config = loadConfig({ OLLAMA_BASE_URL: "http://localhost:11434//" });

    expect(config.ollamaBaseUrl).toBe("http://localhost:11434");
  });

  it("rejects an overlap that is not smaller than the chunk size", () => {
    expect(() => loadConfig({ CHUNK_SIZE: "100", CHUNK_OVERLAP: "100" })).toThrow(
      "CHUNK_OVERLAP (100) must be smaller than CHUNK_SIZE (100).",
    );
  });

  it("requires a key for the openai provider", () => {
    expect(() => loadConfig({ GENERATION_PROVIDER: "openai" })).toThrow(
      "The openai provider requires OPENAI_API_KEY.",
    );
  });

  it("requires a database URL and embeddings for pgvector", () => {
    expect(() => loadConfig({ ENABLE_PGVECTOR: "true", OPENAI_API_KEY: "test-secret" })).toThrow(
      "ENABLE_PGVECTOR=true requires DATABASE_URL.",
    );
    expect(() =>
      loadConfig({ ENABLE_PGVECTOR: "true", DATABASE_URL: "postgres://localhost/courses" }),
    ).toThrow("pgvector mode requires an embedding provider (openai or ollama).");
  });
});
