import { z } from "zod";
import {
  ChatCompletion,
  ChatCompletionRequest,
  ChatMessage,
  ChatModel,
  EmbeddingClient,
  ToolCall,
} from "./types.js";

interface OllamaClientOptions {
  baseUrl: string;
  chatModel: string;
  embeddingModel: string;
}

const embeddingsResponseSchema = z.object({
  embedding: z.array(z.number()).optional(),
});

const chatResponseSchema = z.object({
  message: z
    .object({
      content: z.string().optional(),
      tool_calls: z
        .array(
          z.object({
            function: z.object({
              name: z.string(),
              arguments: z.record(z.unknown()).default({}),
            }),
          }),
        )
        .optional(),
    })
    .optional(),
});

const EMBEDDING_CONCURRENCY = 4;

export class OllamaClient implements ChatModel, EmbeddingClient {
  constructor(private readonly options: OllamaClientOptions) {}

  // A local server needs no credentials.
  isEmbeddingConfigured(): boolean {
    return true;
  }

  async embedTexts(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const workers = Math.min(EMBEDDING_CONCURRENCY, texts.length);
    const embeddings: number[][] = new Array(texts.length);
    let cursor = 0;

    const runWorker = async () => {
      while (true) {
        const index = cursor;
        cursor += 1;
        if (index >= texts.length) {
          return;
        }
        embeddings[index] = await this.embedQuery(texts[index]);
      }
    };

    await Promise.all(Array.from({ length: workers }, () => runWorker()));
    return embeddings;
  }

  async embedQuery(query: string): Promise<number[]> {
    const response = await fetch(`${this.options.baseUrl}/api/embeddings`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.options.embeddingModel,
        prompt: query,
      }),
    });

    if (!response.ok) {
      throw new Error(
        `Ollama embeddings failed (${response.status}): ${await response.text()}`,
      );
    }

    const data = embeddingsResponseSchema.parse(await response.json());
    if (!data.embedding || data.embedding.length === 0) {
      throw new Error("Ollama embeddings returned empty vector.");
    }
    return data.embedding;
  }

  async complete(request: ChatCompletionRequest): Promise<ChatCompletion> {
    const tools = request.tools ?? [];
    const response = await fetch(`${this.options.baseUrl}/api/chat`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.options.chatModel,
        stream: false,
        keep_alive: "30m",
        options: {
          temperature: 0,
          num_predict: 800,
        },
        messages: [
          { role: "system", content: request.system },
          ...request.messages.map(toOllamaMessage),
        ],
        ...(tools.length > 0
          ? {
              tools: tools.map((tool) => ({
                type: "function",
                function: {
                  name: tool.name,
                  description: tool.description,
                  parameters: tool.inputSchema,
                },
              })),
            }
          : {}),
      }),
    });

    if (!response.ok) {
      throw new Error(`Ollama chat failed (${response.status}): ${await response.text()}`);
    }

    const data = chatResponseSchema.parse(await response.json());
    // Ollama does not assign call ids; number them so results can be paired up.
    const toolCalls: ToolCall[] = (data.message?.tool_calls ?? []).map((call, index) => ({
      id: `call_${index}`,
      name: call.function.name,
      input: call.function.arguments,
    }));

    return {
      text: data.message?.content?.trim() ?? "",
      toolCalls,
    };
  }
}

function toOllamaMessage(message: ChatMessage) {
  switch (message.role) {
    case "user":
      return { role: "user", content: message.content };
    case "assistant":
      return {
        role: "assistant",
        content: message.content,
        ...(message.toolCalls.length > 0
          ? {
              tool_calls: message.toolCalls.map((call) => ({
                function: { name: call.name, arguments: call.input },
              })),
            }
          : {}),
      };
    case "tool":
      return { role: "tool", tool_name: message.name, content: message.content };
  }
}
