import { AppConfig, GenerationProvider } from "../../config/env.js";
import { OpenAiClient } from "./openAiClient.js";
import { OllamaClient } from "./ollamaClient.js";
import { AiClient, ChatModel, EmbeddingClient } from "./types.js";

/**
 * Routes embeddings and chat to the providers picked in config. Either side
 * may be absent: no embedder means lexical retrieval only, no chat model
 * means extractive answers.
 */
export class DefaultAiClient implements AiClient {
  private readonly embedder: EmbeddingClient | null;

  private readonly chatModel: ChatModel | null;

  private readonly generationProvider: GenerationProvider;

  constructor(config: AppConfig) {
    const openAi = new OpenAiClient({
      apiKey: config.openaiApiKey,
      baseUrl: config.openaiBaseUrl,
      embeddingModel: config.embeddingModel,
      chatModel: config.chatModel,
    });
    const ollama = new OllamaClient({
      baseUrl: config.ollamaBaseUrl,
      chatModel: config.ollamaChatModel,
      embeddingModel: config.ollamaEmbeddingModel,
    });

    const providers = { openai: openAi, ollama };
    this.embedder = config.embeddingProvider === "none" ? null : providers[config.embeddingProvider];
    this.chatModel =
      config.generationProvider === "extractive" ? null : providers[config.generationProvider];
    this.generationProvider = config.generationProvider;
  }

  isEmbeddingConfigured(): boolean {
    return this.embedder?.isEmbeddingConfigured() ?? false;
  }

  async embedTexts(texts: string[]): Promise<number[][]> {
    if (!this.embedder || texts.length === 0) {
      return [];
    }
    return this.embedder.embedTexts(texts);
  }

  async embedQuery(query: string): Promise<number[]> {
    if (!this.embedder) {
      throw new Error("Embedding provider is disabled.");
    }
    return this.embedder.embedQuery(query);
  }

  getGenerationProvider(): GenerationProvider {
    return this.generationProvider;
  }

  getChatModel(): ChatModel | null {
    return this.chatModel;
  }
}
