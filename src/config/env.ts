import { z } from "zod";

const booleanFlag = z.enum(["true", "false"]).optional();

const envSchema = z.object({
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().default("https://api.openai.com/v1"),
  OPENAI_EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  OPENAI_CHAT_MODEL: z.string().default("gpt-4o-mini"),
  EMBEDDING_PROVIDER: z.enum(["none", "openai", "ollama"]).optional(),
  GENERATION_PROVIDER: z.enum(["extractive", "openai", "ollama"]).optional(),
  OLLAMA_BASE_URL: z.string().default("http://127.0.0.1:11434"),
  OLLAMA_CHAT_MODEL: z.string().default("qwen2.5:7b-instruct"),
  OLLAMA_EMBEDDING_MODEL: z.string().default("nomic-embed-text"),
  CHUNK_SIZE: z.coerce.number().int().positive().default(800),
  CHUNK_OVERLAP: z.coerce.number().int().min(0).default(100),
  MAX_RESULTS: z.coerce.number().int().positive().default(5),
  MAX_HISTORY: z.coerce.number().int().min(0).default(2),
  MAX_TOOL_ROUNDS: z.coerce.number().int().positive().default(2),
  VECTOR_DB_PATH: z.string().default("./vector_db"),
  PERSIST_VECTOR_DB: booleanFlag,
  MAX_VECTOR_DB_BYTES: z.coerce.number().int().positive().default(50 * 1024 * 1024),
  CLEAR_VECTOR_DB_ON_STARTUP: booleanFlag,
  ENABLE_PGVECTOR: booleanFlag,
  DATABASE_URL: z.string().optional(),
  VECTOR_DIMENSION: z.coerce.number().int().positive().default(1536),
  DOCS_PATH: z.string().default("./docs"),
  FRONTEND_PATH: z.string().default("./frontend"),
  TRANSPORT: z.enum(["stdio", "http"]).default("http"),
  HOST: z.string().default("0.0.0.0"),
  PORT: z.coerce.number().int().positive().default(8000),
});

export type EmbeddingProvider = "none" | "openai" | "ollama";
export type GenerationProvider = "extractive" | "openai" | "ollama";

export interface AppConfig {
  openaiApiKey: string | null;
  openaiBaseUrl: string;
  embeddingModel: string;
  chatModel: string;
  embeddingProvider: EmbeddingProvider;
  generationProvider: GenerationProvider;
  ollamaBaseUrl: string;
  ollamaChatModel: string;
  ollamaEmbeddingModel: string;
  chunkSize: number;
  chunkOverlap: number;
  maxResults: number;
  maxHistory: number;
  maxToolRounds: number;
  vectorDbPath: string;
  persistVectorDb: boolean;
  maxVectorDbBytes: number;
  clearVectorDbOnStartup: boolean;
  enablePgvector: boolean;
  databaseUrl: string | null;
  vectorDimension: number;
  docsPath: string;
  frontendPath: string;
  transport: "stdio" | "http";
  host: string;
  port: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(stripEmpty(env));
  const openaiApiKey = parsed.OPENAI_API_KEY ?? null;
  const enablePgvector = parsed.ENABLE_PGVECTOR === "true";

  if (parsed.CHUNK_OVERLAP >= parsed.CHUNK_SIZE) {
    throw new Error(
      `CHUNK_OVERLAP (${parsed.CHUNK_OVERLAP}) must be smaller than CHUNK_SIZE (${parsed.CHUNK_SIZE}).`,
    );
  }

  const embeddingProvider =
    parsed.EMBEDDING_PROVIDER ?? (openaiApiKey ? "openai" : "none");
  const generationProvider =
    parsed.GENERATION_PROVIDER ?? (openaiApiKey ? "openai" : "extractive");

  if ((embeddingProvider === "openai" || generationProvider === "openai") && !openaiApiKey) {
    throw new Error("The openai provider requires OPENAI_API_KEY.");
  }
  if (enablePgvector && !parsed.DATABASE_URL) {
    throw new Error("ENABLE_PGVECTOR=true requires DATABASE_URL.");
  }
  if (enablePgvector && embeddingProvider === "none") {
    throw new Error("pgvector mode requires an embedding provider (openai or ollama).");
  }

  return {
    openaiApiKey,
    openaiBaseUrl: parsed.OPENAI_BASE_URL.replace(/\/+$/, ""),
    embeddingModel: parsed.OPENAI_EMBEDDING_MODEL,
    chatModel: parsed.OPENAI_CHAT_MODEL,
    embeddingProvider,
    generationProvider,
    ollamaBaseUrl: parsed.OLLAMA_BASE_URL.replace(/\/+$/, ""),
    ollamaChatModel: parsed.OLLAMA_CHAT_MODEL,
    ollamaEmbeddingModel: parsed.OLLAMA_EMBEDDING_MODEL,
    chunkSize: parsed.CHUNK_SIZE,
    chunkOverlap: parsed.CHUNK_OVERLAP,
    maxResults: parsed.MAX_RESULTS,
    maxHistory: parsed.MAX_HISTORY,
    maxToolRounds: parsed.MAX_TOOL_ROUNDS,
    vectorDbPath: parsed.VECTOR_DB_PATH,
    persistVectorDb: parsed.PERSIST_VECTOR_DB !== "false",
    maxVectorDbBytes: parsed.MAX_VECTOR_DB_BYTES,
    clearVectorDbOnStartup: parsed.CLEAR_VECTOR_DB_ON_STARTUP === "true",
    enablePgvector,
    databaseUrl: parsed.DATABASE_URL ?? null,
    vectorDimension: parsed.VECTOR_DIMENSION,
    docsPath: parsed.DOCS_PATH,
    frontendPath: parsed.FRONTEND_PATH,
    transport: parsed.TRANSPORT,
    host: parsed.HOST,
    port: parsed.PORT,
  };
}

// Blank lines in .env files arrive as empty strings; treat them as unset.
function stripEmpty(env: NodeJS.ProcessEnv): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      cleaned[key] = value;
    }
  }
  return cleaned;
}
