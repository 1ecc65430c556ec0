import { GenerationProvider } from "../../config/env.js";

export interface ToolInputSchema {
  type: "object";
  properties: Record<string, unknown>;
  required?: string[];
}

export interface ToolDefinition {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
}

export interface ToolCall {
  id: string;
  name: string;
  input: Record<string, unknown>;
}

export type ChatMessage =
  | { role: "user"; content: string }
  | { role: "assistant"; content: string; toolCalls: ToolCall[] }
  | { role: "tool"; toolCallId: string; name: string; content: string };

export interface ChatCompletionRequest {
  system: string;
  messages: ChatMessage[];
  tools?: ToolDefinition[];
}

export interface ChatCompletion {
  text: string;
  toolCalls: ToolCall[];
}

export interface ChatModel {
  complete(request: ChatCompletionRequest): Promise<ChatCompletion>;
}

export interface EmbeddingClient {
  isEmbeddingConfigured(): boolean;
  embedTexts(texts: string[]): Promise<number[][]>;
  embedQuery(query: string): Promise<number[]>;
}

export interface AiClient extends EmbeddingClient {
  getGenerationProvider(): GenerationProvider;
  /** `null` when answers are built without an LLM. */
  getChatModel(): ChatModel | null;
}
